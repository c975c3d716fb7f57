import { DedupContext } from "./dedup";
import { CustomError, IndexOutOfRangeError, IoError, OverflowError } from "./errors";
import type { ByteSource } from "./io";
import { Mode } from "./mode";
import type { FieldFlags } from "./ser";
import { TryIter } from "./try-iter";
import {
  I16,
  I32,
  ISIZE,
  type IntRange,
  U16,
  U32,
  zigzagDecode64,
} from "./types";
import { decodeUtf8 } from "./utf8";
import { decodeVarint, decodeVarintNumber } from "./varint";

/**
 * Something that can rebuild a value of type `T` from a
 * {@link BinDeserializer}.
 */
export interface BinDeserialize<T> {
  deserialize(deserializer: BinDeserializer): T;
  /**
   * Decodes into `target`, reusing its storage where the type allows it,
   * and returns the decoded value. For arrays, maps, sets and objects that
   * is `target` itself; immutable values are simply replaced.
   */
  deserializeInPlace(target: T, deserializer: BinDeserializer): T;
}

/**
 * The read half of the capability contract. Mirrors `BinSerializer`
 * call for call.
 */
export interface BinDeserializer {
  readonly mode: Mode;

  readBool(): boolean;
  readU8(): number;
  readI8(): number;
  readU16(): number;
  readI16(): number;
  readU32(): number;
  readI32(): number;
  readU64(): bigint;
  readI64(): bigint;
  readUsize(): number;
  readIsize(): number;
  readF32(): number;
  readF64(): number;
  readBytes(): Uint8Array;
  readStr(): string;

  readOption<T>(element: BinDeserialize<T>): T | undefined;
  readOptionInPlace<T>(target: T | undefined, element: BinDeserialize<T>): T | undefined;
  /** Reads the length, then decodes elements as the result is consumed. */
  readSeq<T>(element: BinDeserialize<T>): TryIter<T>;
  readSeqInPlace<T>(target: T[], element: BinDeserialize<T>): T[];
  readMap<K, V>(key: BinDeserialize<K>, value: BinDeserialize<V>): Map<K, V>;
  readMapInPlace<K, V>(
    target: Map<K, V>,
    key: BinDeserialize<K>,
    value: BinDeserialize<V>
  ): Map<K, V>;
  readSet<K>(key: BinDeserialize<K>): Set<K>;
  readSetInPlace<K>(target: Set<K>, key: BinDeserialize<K>): Set<K>;
  /**
   * Reads a struct field. A skipped field reads nothing and yields
   * `fallback()`.
   */
  readField<T>(element: BinDeserialize<T>, flags?: FieldFlags, fallback?: () => T): T;
  readFieldInPlace<T>(
    target: T,
    element: BinDeserialize<T>,
    flags?: FieldFlags,
    fallback?: () => T
  ): T;
  readVariant(): number;

  /** A deserializer over the same input that reads strings inline. */
  disableDedup(): BinDeserializer;
}

function skippedValue<T>(fallback: (() => T) | undefined): T {
  if (fallback === undefined) {
    throw new CustomError("Skipped field has no default value");
  }
  return fallback();
}

/**
 * The deserializer that consumes input.
 *
 * In dedup mode, string fields are indices into `context`, which must hold
 * the complete table read from the head of the same input.
 */
export class BinDeserializerBase implements BinDeserializer {
  readonly mode: Mode;
  readonly context: DedupContext;
  private readonly source: ByteSource;

  constructor(source: ByteSource, mode: Mode = Mode.default(), context: DedupContext = new DedupContext()) {
    this.source = source;
    this.mode = mode;
    this.context = context;
  }

  private pullByte(): number {
    try {
      return this.source.readByte();
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  private pullBytes(length: number): Uint8Array {
    try {
      return this.source.readBytes(length);
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  private pullView(length: number): DataView {
    const bytes = this.pullBytes(length);
    return new DataView(bytes.buffer, bytes.byteOffset, length);
  }

  private pullVarint(): bigint {
    try {
      return decodeVarint(this.source);
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  private pullUnsigned(range: IntRange): number {
    const value = this.pullVarint();
    if (value > BigInt(range.max)) {
      throw new OverflowError(`Value ${value} does not fit in ${range.name}`);
    }
    return Number(value);
  }

  private pullSigned(range: IntRange): number {
    const value = zigzagDecode64(this.pullVarint());
    if (value < BigInt(range.min) || value > BigInt(range.max)) {
      throw new OverflowError(`Value ${value} does not fit in ${range.name}`);
    }
    return Number(value);
  }

  readBool(): boolean {
    return this.pullByte() !== 0;
  }

  readU8(): number {
    return this.pullByte();
  }

  readI8(): number {
    const b = this.pullByte();
    return b > 0x7f ? b - 0x100 : b;
  }

  readU16(): number {
    if (this.mode.fixedSizeUseVarint) {
      return this.pullUnsigned(U16);
    }
    return this.pullView(2).getUint16(0, true);
  }

  readI16(): number {
    if (this.mode.fixedSizeUseVarint) {
      return this.pullSigned(I16);
    }
    return this.pullView(2).getInt16(0, true);
  }

  readU32(): number {
    if (this.mode.fixedSizeUseVarint) {
      return this.pullUnsigned(U32);
    }
    return this.pullView(4).getUint32(0, true);
  }

  readI32(): number {
    if (this.mode.fixedSizeUseVarint) {
      return this.pullSigned(I32);
    }
    return this.pullView(4).getInt32(0, true);
  }

  readU64(): bigint {
    if (this.mode.fixedSizeUseVarint) {
      return this.pullVarint();
    }
    return this.pullView(8).getBigUint64(0, true);
  }

  readI64(): bigint {
    if (this.mode.fixedSizeUseVarint) {
      return zigzagDecode64(this.pullVarint());
    }
    return this.pullView(8).getBigInt64(0, true);
  }

  readUsize(): number {
    try {
      return decodeVarintNumber(this.source);
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  readIsize(): number {
    return this.pullSigned(ISIZE);
  }

  readF32(): number {
    return this.pullView(4).getFloat32(0, true);
  }

  readF64(): number {
    return this.pullView(8).getFloat64(0, true);
  }

  readBytes(): Uint8Array {
    const length = this.readUsize();
    return this.pullBytes(length).slice();
  }

  readStr(): string {
    if (this.mode.useDedup) {
      // any index past the table is out of range, however wide
      const index = this.pullVarint();
      if (index >= BigInt(this.context.size)) {
        throw new IndexOutOfRangeError(index, this.context.size);
      }
      return this.context.lookup(Number(index));
    }
    const length = this.readUsize();
    return decodeUtf8(this.pullBytes(length));
  }

  readOption<T>(element: BinDeserialize<T>): T | undefined {
    return this.readBool() ? element.deserialize(this) : undefined;
  }

  readOptionInPlace<T>(target: T | undefined, element: BinDeserialize<T>): T | undefined {
    if (!this.readBool()) {
      return undefined;
    }
    return target === undefined ? element.deserialize(this) : element.deserializeInPlace(target, this);
  }

  readSeq<T>(element: BinDeserialize<T>): TryIter<T> {
    const length = this.readUsize();
    return new TryIter(length, () => element.deserialize(this));
  }

  readSeqInPlace<T>(target: T[], element: BinDeserialize<T>): T[] {
    const length = this.readUsize();
    const items = new TryIter(length, (i) =>
      i < target.length ? element.deserializeInPlace(target[i], this) : element.deserialize(this)
    );
    return items.collectInto(target);
  }

  readMap<K, V>(key: BinDeserialize<K>, value: BinDeserialize<V>): Map<K, V> {
    return this.readMapInPlace(new Map<K, V>(), key, value);
  }

  readMapInPlace<K, V>(
    target: Map<K, V>,
    key: BinDeserialize<K>,
    value: BinDeserialize<V>
  ): Map<K, V> {
    const size = this.readUsize();
    target.clear();
    const entries = new TryIter(size, (): [K, V] => {
      const k = key.deserialize(this);
      return [k, value.deserialize(this)];
    });
    for (const [k, v] of entries) {
      target.set(k, v);
    }
    return target;
  }

  readSet<K>(key: BinDeserialize<K>): Set<K> {
    return this.readSetInPlace(new Set<K>(), key);
  }

  readSetInPlace<K>(target: Set<K>, key: BinDeserialize<K>): Set<K> {
    const size = this.readUsize();
    target.clear();
    for (const k of new TryIter(size, () => key.deserialize(this))) {
      target.add(k);
    }
    return target;
  }

  readField<T>(element: BinDeserialize<T>, flags: FieldFlags = {}, fallback?: () => T): T {
    if (flags.skip) {
      return skippedValue(fallback);
    }
    return element.deserialize(flags.noDedup ? this.disableDedup() : this);
  }

  readFieldInPlace<T>(
    target: T,
    element: BinDeserialize<T>,
    flags: FieldFlags = {},
    fallback?: () => T
  ): T {
    if (flags.skip) {
      return skippedValue(fallback);
    }
    return element.deserializeInPlace(target, flags.noDedup ? this.disableDedup() : this);
  }

  readVariant(): number {
    return this.readUsize();
  }

  disableDedup(): BinDeserializerBase {
    if (!this.mode.useDedup) {
      return this;
    }
    return new BinDeserializerBase(this.source, this.mode.withUseDedup(false), this.context);
  }
}
