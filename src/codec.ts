import type { BinDeserialize, BinDeserializer } from "./de";
import { OverflowError } from "./errors";
import type { BinSerialize, BinSerializer } from "./ser";

/**
 * A type's complete description: how to write it, how to read it, and how
 * to read it into an existing value.
 *
 * Codecs are usually composed from the built-ins below and `struct` /
 * `enumeration`, but any object with these three methods works. A
 * hand-written codec must make the same calls, in the same order, on every
 * run for a given value.
 */
export interface Codec<T> extends BinSerialize<T>, BinDeserialize<T> {}

/**
 * The value type a codec handles.
 */
export type Infer<C> = C extends Codec<infer T> ? T : never;

/**
 * Reassembles a tuple whose elements were decoded separately. The element
 * codecs fix its shape; the type system cannot follow them through a loop.
 */
function assemble<T>(parts: unknown): T {
  return parts as T;
}

function primitive<T>(
  write: (serializer: BinSerializer, value: T) => void,
  read: (deserializer: BinDeserializer) => T
): Codec<T> {
  return {
    serialize(value, serializer) {
      write(serializer, value);
    },
    deserialize(deserializer) {
      return read(deserializer);
    },
    deserializeInPlace(_target, deserializer) {
      return read(deserializer);
    },
  };
}

export const bool: Codec<boolean> = primitive(
  (s, v) => s.writeBool(v),
  (d) => d.readBool()
);
export const u8: Codec<number> = primitive(
  (s, v) => s.writeU8(v),
  (d) => d.readU8()
);
export const i8: Codec<number> = primitive(
  (s, v) => s.writeI8(v),
  (d) => d.readI8()
);
export const u16: Codec<number> = primitive(
  (s, v) => s.writeU16(v),
  (d) => d.readU16()
);
export const i16: Codec<number> = primitive(
  (s, v) => s.writeI16(v),
  (d) => d.readI16()
);
export const u32: Codec<number> = primitive(
  (s, v) => s.writeU32(v),
  (d) => d.readU32()
);
export const i32: Codec<number> = primitive(
  (s, v) => s.writeI32(v),
  (d) => d.readI32()
);
export const u64: Codec<bigint> = primitive(
  (s, v) => s.writeU64(v),
  (d) => d.readU64()
);
export const i64: Codec<bigint> = primitive(
  (s, v) => s.writeI64(v),
  (d) => d.readI64()
);
export const usize: Codec<number> = primitive(
  (s, v) => s.writeUsize(v),
  (d) => d.readUsize()
);
export const isize: Codec<number> = primitive(
  (s, v) => s.writeIsize(v),
  (d) => d.readIsize()
);
export const f32: Codec<number> = primitive(
  (s, v) => s.writeF32(v),
  (d) => d.readF32()
);
export const f64: Codec<number> = primitive(
  (s, v) => s.writeF64(v),
  (d) => d.readF64()
);
export const str: Codec<string> = primitive(
  (s, v) => s.writeStr(v),
  (d) => d.readStr()
);
export const bytes: Codec<Uint8Array> = primitive(
  (s, v) => s.writeBytes(v),
  (d) => d.readBytes()
);

/**
 * The empty value. Writes nothing.
 */
export const unit: Codec<null> = primitive(
  () => {},
  () => null
);

export interface PrecisionOptions {
  /**
   * Log a warning when a decoded value lies outside the safe integer range
   * (default true).
   */
  warnOnPrecisionLoss?: boolean;
}

function warnIfUnsafe(name: string, value: bigint, warn: boolean): number {
  if (
    warn &&
    (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER))
  ) {
    console.warn(
      `tersebin: ${name} value ${value} exceeds safe integer range ` +
        `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
        `precision may be lost. Use the bigint codec for full precision.`
    );
  }
  return Number(value);
}

function toBigInt(name: string, value: number): bigint {
  if (!Number.isInteger(value)) {
    throw new OverflowError(`Value ${value} does not fit in ${name}`);
  }
  return BigInt(value);
}

/**
 * A u64 carried as a JavaScript number. Same bytes as {@link u64}.
 *
 * WARNING: JavaScript numbers can only safely represent integers
 * up to Number.MAX_SAFE_INTEGER (2^53-1). Larger values lose precision.
 */
export function u64Number(options: PrecisionOptions = {}): Codec<number> {
  const warn = options.warnOnPrecisionLoss ?? true;
  return primitive(
    (s, v) => s.writeU64(toBigInt("u64", v)),
    (d) => warnIfUnsafe("u64", d.readU64(), warn)
  );
}

/**
 * An i64 carried as a JavaScript number. Same bytes as {@link i64}.
 */
export function i64Number(options: PrecisionOptions = {}): Codec<number> {
  const warn = options.warnOnPrecisionLoss ?? true;
  return primitive(
    (s, v) => s.writeI64(toBigInt("i64", v)),
    (d) => warnIfUnsafe("i64", d.readI64(), warn)
  );
}

/**
 * An optional value, `undefined` when absent. Nested options cannot be
 * told apart and are not supported.
 */
export function option<T>(element: Codec<T>): Codec<T | undefined> {
  return {
    serialize(value, serializer) {
      serializer.writeOption(value, element);
    },
    deserialize(deserializer) {
      return deserializer.readOption(element);
    },
    deserializeInPlace(target, deserializer) {
      return deserializer.readOptionInPlace(target, element);
    },
  };
}

/**
 * A length-prefixed array.
 */
export function vec<T>(element: Codec<T>): Codec<T[]> {
  return {
    serialize(value, serializer) {
      serializer.writeSeq(value, element);
    },
    deserialize(deserializer) {
      return deserializer.readSeq(element).toArray();
    },
    deserializeInPlace(target, deserializer) {
      return deserializer.readSeqInPlace(target, element);
    },
  };
}

/**
 * A length-prefixed map, entries in iteration order.
 */
export function map<K, V>(key: Codec<K>, value: Codec<V>): Codec<Map<K, V>> {
  return {
    serialize(m, serializer) {
      serializer.writeMap(m, key, value);
    },
    deserialize(deserializer) {
      return deserializer.readMap(key, value);
    },
    deserializeInPlace(target, deserializer) {
      return deserializer.readMapInPlace(target, key, value);
    },
  };
}

/**
 * A length-prefixed set, members in iteration order.
 */
export function set<K>(key: Codec<K>): Codec<Set<K>> {
  return {
    serialize(value, serializer) {
      serializer.writeSet(value, key);
    },
    deserialize(deserializer) {
      return deserializer.readSet(key);
    },
    deserializeInPlace(target, deserializer) {
      return deserializer.readSetInPlace(target, key);
    },
  };
}

type CodecTuple<T extends unknown[]> = { [K in keyof T]: Codec<T[K]> };

/**
 * A fixed-arity tuple. Elements are written back to back with no length.
 */
export function tuple<T extends unknown[]>(...elements: CodecTuple<T>): Codec<T> {
  const codecs: readonly Codec<unknown>[] = elements;
  return {
    serialize(value, serializer) {
      codecs.forEach((codec, i) => codec.serialize(value[i], serializer));
    },
    deserialize(deserializer) {
      return assemble<T>(codecs.map((codec) => codec.deserialize(deserializer)));
    },
    deserializeInPlace(target, deserializer) {
      codecs.forEach((codec, i) => {
        target[i] = assemble<T[number]>(codec.deserializeInPlace(target[i], deserializer));
      });
      return target;
    },
  };
}

/**
 * Defers building a codec until first use, for recursive types.
 *
 * @example
 * ```typescript
 * interface Tree { label: string; children: Tree[] }
 * const tree: Codec<Tree> = struct({
 *   label: field(str),
 *   children: field(vec(lazy(() => tree))),
 * });
 * ```
 */
export function lazy<T>(factory: () => Codec<T>): Codec<T> {
  let resolved: Codec<T> | undefined;
  const get = (): Codec<T> => (resolved ??= factory());
  return {
    serialize(value, serializer) {
      get().serialize(value, serializer);
    },
    deserialize(deserializer) {
      return get().deserialize(deserializer);
    },
    deserializeInPlace(target, deserializer) {
      return get().deserializeInPlace(target, deserializer);
    },
  };
}
