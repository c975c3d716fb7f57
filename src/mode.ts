/**
 * Wire-format options for one serialize or deserialize call.
 *
 * A Mode is immutable: the `with*` builders return a new instance. Both
 * sides of a buffer must agree on it, since nothing in the output records
 * which features were active.
 *
 * @example
 * ```typescript
 * const mode = Mode.dedup().withFixedSizeUseVarint(true);
 * const data = serialize(codec, value, mode);
 * const copy = deserialize(codec, data, mode);
 * ```
 */
export class Mode {
  /** Prefix the payload with a string table and write strings as indices. */
  readonly useDedup: boolean;
  /** Write 16/32/64-bit integers as (zig-zag) varints instead of fixed width. */
  readonly fixedSizeUseVarint: boolean;

  private static readonly DEFAULT = new Mode(false, false);
  private static readonly DEDUP = new Mode(true, false);

  private constructor(useDedup: boolean, fixedSizeUseVarint: boolean) {
    this.useDedup = useDedup;
    this.fixedSizeUseVarint = fixedSizeUseVarint;
    Object.freeze(this);
  }

  static default(): Mode {
    return Mode.DEFAULT;
  }

  static dedup(): Mode {
    return Mode.DEDUP;
  }

  withUseDedup(useDedup: boolean): Mode {
    if (useDedup === this.useDedup) {
      return this;
    }
    return new Mode(useDedup, this.fixedSizeUseVarint);
  }

  withFixedSizeUseVarint(fixedSizeUseVarint: boolean): Mode {
    if (fixedSizeUseVarint === this.fixedSizeUseVarint) {
      return this;
    }
    return new Mode(this.useDedup, fixedSizeUseVarint);
  }

  equals(other: Mode): boolean {
    return (
      this.useDedup === other.useDedup && this.fixedSizeUseVarint === other.fixedSizeUseVarint
    );
  }

  toString(): string {
    return `Mode(useDedup=${this.useDedup}, fixedSizeUseVarint=${this.fixedSizeUseVarint})`;
  }
}
