/**
 * tersebin - compact binary encoding with string deduplication
 *
 * Values are described by codecs; the engine turns them into a dense,
 * non-self-describing byte stream and back.
 *
 * @example
 * ```typescript
 * import { Mode, deserialize, field, serialize, str, struct, u32, vec } from "tersebin";
 *
 * const Person = struct({
 *   name: field(str),
 *   age: field(u32),
 *   tags: field(vec(str)),
 * });
 *
 * const mode = Mode.dedup();
 * const data = serialize(Person, { name: "Ada", age: 36, tags: ["x", "x"] }, mode);
 * const person = deserialize(Person, data, mode);
 * ```
 */

// Core types
export {
  MaxVarint64,
  MinInt64,
  MaxInt64,
  zigzagEncode,
  zigzagEncode64,
  zigzagDecode,
  zigzagDecode64,
} from "./types";

// Varint codec
export {
  MAX_VARINT_BYTES,
  encodeVarint,
  varintSize,
  decodeVarint,
  decodeVarintNumber,
} from "./varint";

// Errors
export {
  type ErrorKind,
  TersebinError,
  IoError,
  UnexpectedEndError,
  OverflowError,
  VarintOverflowError,
  InvalidUtf8Error,
  IndexOutOfRangeError,
  CustomError,
  customError,
  isTersebinError,
} from "./errors";

// Configuration
export { Mode } from "./mode";

// Byte streams
export { type ByteSink, type ByteSource, CountingSink } from "./io";
export { Writer } from "./writer";
export { Reader } from "./reader";

// String table
export { DedupContext } from "./dedup";

// Capability contract
export { type BinSerialize, type BinSerializer, type FieldFlags, SerializerBase, BinSerializerBase } from "./ser";
export { PrescanSerializer } from "./prescan";
export { type BinDeserialize, type BinDeserializer, BinDeserializerBase } from "./de";
export { type TryResult, TryIter } from "./try-iter";

// Codecs
export {
  type Codec,
  type Infer,
  type PrecisionOptions,
  bool,
  u8,
  i8,
  u16,
  i16,
  u32,
  i32,
  u64,
  i64,
  usize,
  isize,
  f32,
  f64,
  str,
  bytes,
  unit,
  u64Number,
  i64Number,
  option,
  vec,
  map,
  set,
  tuple,
  lazy,
} from "./codec";
export {
  type FieldSpec,
  type FieldOptions,
  type StructFields,
  type StructValue,
  field,
  skip,
  struct,
} from "./struct";
export { type Variants, type EnumValue, enumeration } from "./enumeration";

// Entry points
export {
  serialize,
  serializeInto,
  serializedSize,
  deserialize,
  deserializeFrom,
  deserializeInPlace,
} from "./api";

/**
 * Library version.
 */
export const VERSION = "0.3.0";
