import type { Codec } from "./codec";
import type { FieldFlags } from "./ser";

// The field loop fills every key of `F`; the compiler cannot see that.
function assemble<T>(parts: unknown): T {
  return parts as T;
}

/**
 * One field of a {@link struct}: its codec, its markers and, for skipped
 * fields, the value decoding fills in.
 */
export interface FieldSpec<T> {
  readonly codec: Codec<T>;
  readonly flags: FieldFlags;
  readonly fallback?: () => T;
}

export interface FieldOptions {
  /** Write this field's strings inline even when the mode deduplicates. */
  noDedup?: boolean;
}

/**
 * A field encoded with `codec`.
 */
export function field<T>(codec: Codec<T>, options: FieldOptions = {}): FieldSpec<T> {
  return { codec, flags: { noDedup: options.noDedup ?? false } };
}

/**
 * A field that is never written. Decoding sets it to `fallback()`, whatever
 * the encoded value held.
 */
export function skip<T>(codec: Codec<T>, fallback: () => T): FieldSpec<T> {
  return { codec, flags: { skip: true }, fallback };
}

export type StructFields = Record<string, FieldSpec<unknown>>;

/**
 * The object type described by a set of fields.
 */
export type StructValue<F extends StructFields> = {
  -readonly [K in keyof F]: F[K] extends FieldSpec<infer T> ? T : never;
};

function getField(target: object, name: string): unknown {
  return Reflect.get(target, name);
}

/**
 * A product type: its fields in declaration order, back to back. Neither
 * names nor a field count are written.
 *
 * Field order is the key order of `fields`. Integer-like keys ("0", "1")
 * sort ahead of the others in JavaScript, so avoid them.
 *
 * @example
 * ```typescript
 * const Person = struct({
 *   name: field(str),
 *   email: field(option(str), { noDedup: true }),
 *   cachedScore: skip(u32, () => 0),
 * });
 * type Person = Infer<typeof Person>;
 * ```
 */
export function struct<F extends StructFields>(fields: F): Codec<StructValue<F>> {
  const entries: ReadonlyArray<readonly [string, FieldSpec<unknown>]> = Object.keys(fields).map(
    (name) => [name, fields[name]] as const
  );

  return {
    serialize(value, serializer) {
      for (const [name, spec] of entries) {
        serializer.writeField(getField(value, name), spec.codec, spec.flags);
      }
    },
    deserialize(deserializer) {
      const out: Record<string, unknown> = {};
      for (const [name, spec] of entries) {
        out[name] = deserializer.readField(spec.codec, spec.flags, spec.fallback);
      }
      return assemble<StructValue<F>>(out);
    },
    deserializeInPlace(target, deserializer) {
      for (const [name, spec] of entries) {
        const next = deserializer.readFieldInPlace(
          getField(target, name),
          spec.codec,
          spec.flags,
          spec.fallback
        );
        Reflect.set(target, name, next);
      }
      return target;
    },
  };
}
