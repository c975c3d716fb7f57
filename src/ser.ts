import { DedupContext } from "./dedup";
import { IoError, OverflowError } from "./errors";
import type { ByteSink } from "./io";
import { Mode } from "./mode";
import {
  I16,
  I32,
  I8,
  ISIZE,
  type IntRange,
  MaxInt64,
  MaxVarint64,
  MinInt64,
  U16,
  U32,
  U8,
  USIZE,
  inRange,
  zigzagEncode,
  zigzagEncode64,
} from "./types";
import { encodeUtf8 } from "./utf8";
import { encodeVarint } from "./varint";

/**
 * Something that can describe a value of type `T` to a {@link BinSerializer}.
 */
export interface BinSerialize<T> {
  serialize(value: T, serializer: BinSerializer): void;
}

/**
 * Per-field markers of a struct.
 */
export interface FieldFlags {
  /** The field is never visited and contributes zero bytes. */
  readonly skip?: boolean;
  /** Strings under this field are written inline even in dedup mode. */
  readonly noDedup?: boolean;
}

/**
 * The write half of the capability contract.
 *
 * Every encodable type is described by calls against this interface, in a
 * fixed order. The same description runs once against a prescan (to collect
 * strings) and once against the real writer, so it must not depend on
 * anything but the value.
 */
export interface BinSerializer {
  readonly mode: Mode;

  writeBool(value: boolean): void;
  writeU8(value: number): void;
  writeI8(value: number): void;
  writeU16(value: number): void;
  writeI16(value: number): void;
  writeU32(value: number): void;
  writeI32(value: number): void;
  writeU64(value: bigint): void;
  writeI64(value: bigint): void;
  /** Lengths, counts and other machine-sized values; always a varint. */
  writeUsize(value: number): void;
  writeIsize(value: number): void;
  writeF32(value: number): void;
  writeF64(value: number): void;
  writeBytes(value: Uint8Array): void;
  writeStr(value: string): void;

  writeOption<T>(value: T | undefined, element: BinSerialize<T>): void;
  writeSeq<T>(items: readonly T[], element: BinSerialize<T>): void;
  writeMap<K, V>(map: ReadonlyMap<K, V>, key: BinSerialize<K>, value: BinSerialize<V>): void;
  writeSet<K>(set: ReadonlySet<K>, key: BinSerialize<K>): void;
  writeField<T>(value: T, element: BinSerialize<T>, flags?: FieldFlags): void;
  writeVariant(discriminant: number): void;

  /** A serializer over the same output that writes strings inline. */
  disableDedup(): BinSerializer;
}

function checkRange(value: number, range: IntRange): void {
  if (!inRange(value, range)) {
    throw new OverflowError(`Value ${value} does not fit in ${range.name}`);
  }
}

function checkBigRange(value: bigint, min: bigint, max: bigint, name: string): void {
  if (value < min || value > max) {
    throw new OverflowError(`Value ${value} does not fit in ${name}`);
  }
}

/**
 * Encoding shared by every serializer. Subclasses decide where bytes go and
 * how inline strings are handled; the traversal of options, sequences, maps,
 * fields and variants lives here once, so every realization visits a value
 * in exactly the same order.
 */
export abstract class SerializerBase implements BinSerializer {
  readonly mode: Mode;
  readonly context: DedupContext;

  private readonly scratch = new DataView(new ArrayBuffer(8));
  private readonly scratchBytes = new Uint8Array(this.scratch.buffer);

  protected constructor(mode: Mode, context: DedupContext) {
    this.mode = mode;
    this.context = context;
  }

  protected abstract emitByte(value: number): void;
  protected abstract emitBytes(data: Uint8Array): void;
  protected abstract withMode(mode: Mode): SerializerBase;

  protected writeInlineStr(value: string): void {
    const bytes = encodeUtf8(value);
    this.writeUsize(bytes.length);
    this.emitBytes(bytes);
  }

  private emitScratch(length: number): void {
    this.emitBytes(this.scratchBytes.subarray(0, length));
  }

  writeBool(value: boolean): void {
    this.emitByte(value ? 0xff : 0x00);
  }

  writeU8(value: number): void {
    checkRange(value, U8);
    this.emitByte(value);
  }

  writeI8(value: number): void {
    checkRange(value, I8);
    this.emitByte(value & 0xff);
  }

  writeU16(value: number): void {
    checkRange(value, U16);
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(value));
      return;
    }
    this.scratch.setUint16(0, value, true);
    this.emitScratch(2);
  }

  writeI16(value: number): void {
    checkRange(value, I16);
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(zigzagEncode(value)));
      return;
    }
    this.scratch.setInt16(0, value, true);
    this.emitScratch(2);
  }

  writeU32(value: number): void {
    checkRange(value, U32);
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(value));
      return;
    }
    this.scratch.setUint32(0, value, true);
    this.emitScratch(4);
  }

  writeI32(value: number): void {
    checkRange(value, I32);
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(zigzagEncode(value)));
      return;
    }
    this.scratch.setInt32(0, value, true);
    this.emitScratch(4);
  }

  writeU64(value: bigint): void {
    checkBigRange(value, 0n, MaxVarint64, "u64");
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(value));
      return;
    }
    this.scratch.setBigUint64(0, value, true);
    this.emitScratch(8);
  }

  writeI64(value: bigint): void {
    checkBigRange(value, MinInt64, MaxInt64, "i64");
    if (this.mode.fixedSizeUseVarint) {
      this.emitBytes(encodeVarint(zigzagEncode64(value)));
      return;
    }
    this.scratch.setBigInt64(0, value, true);
    this.emitScratch(8);
  }

  writeUsize(value: number): void {
    checkRange(value, USIZE);
    this.emitBytes(encodeVarint(value));
  }

  writeIsize(value: number): void {
    checkRange(value, ISIZE);
    this.emitBytes(encodeVarint(zigzagEncode64(BigInt(value))));
  }

  writeF32(value: number): void {
    this.scratch.setFloat32(0, value, true);
    this.emitScratch(4);
  }

  writeF64(value: number): void {
    this.scratch.setFloat64(0, value, true);
    this.emitScratch(8);
  }

  writeBytes(value: Uint8Array): void {
    this.writeUsize(value.length);
    this.emitBytes(value);
  }

  writeStr(value: string): void {
    if (this.mode.useDedup) {
      this.writeUsize(this.context.intern(value));
      return;
    }
    this.writeInlineStr(value);
  }

  writeOption<T>(value: T | undefined, element: BinSerialize<T>): void {
    if (value === undefined) {
      this.writeBool(false);
      return;
    }
    this.writeBool(true);
    element.serialize(value, this);
  }

  writeSeq<T>(items: readonly T[], element: BinSerialize<T>): void {
    this.writeUsize(items.length);
    for (const item of items) {
      element.serialize(item, this);
    }
  }

  writeMap<K, V>(map: ReadonlyMap<K, V>, key: BinSerialize<K>, value: BinSerialize<V>): void {
    this.writeUsize(map.size);
    for (const [k, v] of map) {
      key.serialize(k, this);
      value.serialize(v, this);
    }
  }

  writeSet<K>(set: ReadonlySet<K>, key: BinSerialize<K>): void {
    this.writeUsize(set.size);
    for (const k of set) {
      key.serialize(k, this);
    }
  }

  writeField<T>(value: T, element: BinSerialize<T>, flags: FieldFlags = {}): void {
    if (flags.skip) {
      return;
    }
    element.serialize(value, flags.noDedup ? this.disableDedup() : this);
  }

  writeVariant(discriminant: number): void {
    this.writeUsize(discriminant);
  }

  disableDedup(): SerializerBase {
    if (!this.mode.useDedup) {
      return this;
    }
    return this.withMode(this.mode.withUseDedup(false));
  }
}

/**
 * The serializer that produces output.
 *
 * In dedup mode it interns every string into its own context as it goes.
 * Because it walks the value exactly as the prescan did, the indices it
 * assigns match the table already written ahead of the payload.
 */
export class BinSerializerBase extends SerializerBase {
  private readonly sink: ByteSink;

  constructor(sink: ByteSink, mode: Mode = Mode.default(), context: DedupContext = new DedupContext()) {
    super(mode, context);
    this.sink = sink;
  }

  protected emitByte(value: number): void {
    try {
      this.sink.writeByte(value);
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  protected emitBytes(data: Uint8Array): void {
    try {
      this.sink.writeBytes(data);
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  protected withMode(mode: Mode): BinSerializerBase {
    return new BinSerializerBase(this.sink, mode, this.context);
  }
}
