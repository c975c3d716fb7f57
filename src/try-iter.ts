/**
 * Outcome of one step of a {@link TryIter}.
 */
export type TryResult<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * A lazy, finite, single-pass sequence of decoded elements.
 *
 * The element count is known up front (it was read from the stream), but
 * each element is only decoded when asked for. The first failure ends the
 * sequence: nothing after it is decoded.
 *
 * Elements come off a shared stream, so a TryIter must be drained before
 * anything else is read from the deserializer that produced it.
 *
 * @example
 * ```typescript
 * const items = deserializer.readSeq(u32);
 * for (let r = items.tryNext(); r !== undefined; r = items.tryNext()) {
 *   if (!r.ok) {
 *     // stop here; the rest of the stream is unusable
 *     throw r.error;
 *   }
 *   consume(r.value);
 * }
 * ```
 */
export class TryIter<T> implements Iterable<T> {
  private readonly count: number;
  private readonly step: (index: number) => T;
  private index = 0;
  private finished = false;

  constructor(count: number, step: (index: number) => T) {
    this.count = count;
    this.step = step;
  }

  /**
   * Number of elements not yet produced. Zero once the sequence has failed.
   */
  get remaining(): number {
    return this.finished ? 0 : this.count - this.index;
  }

  /**
   * Decodes the next element. Returns undefined when the sequence is
   * exhausted, including after a failure.
   */
  tryNext(): TryResult<T> | undefined {
    if (this.finished || this.index >= this.count) {
      this.finished = true;
      return undefined;
    }
    const index = this.index++;
    try {
      return { ok: true, value: this.step(index) };
    } catch (e) {
      this.finished = true;
      return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
    }
  }

  /**
   * Yields each element, throwing the first error.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    for (let result = this.tryNext(); result !== undefined; result = this.tryNext()) {
      if (!result.ok) {
        throw result.error;
      }
      yield result.value;
    }
  }

  /**
   * Collects the remaining elements into a new array.
   */
  toArray(): T[] {
    return this.collectInto([]);
  }

  /**
   * Collects the remaining elements into `target`, overwriting it from
   * index 0 and truncating whatever is left over.
   */
  collectInto(target: T[]): T[] {
    let length = 0;
    for (const value of this) {
      target[length++] = value;
    }
    target.length = length;
    return target;
  }
}
