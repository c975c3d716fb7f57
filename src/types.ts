/**
 * Largest value a varint can carry.
 */
export const MaxVarint64 = BigInt("0xffffffffffffffff");

/**
 * Signed 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1

/**
 * Inclusive bounds of a number-backed integer type.
 */
export interface IntRange {
  name: string;
  min: number;
  max: number;
}

export const U8: IntRange = { name: "u8", min: 0, max: 0xff };
export const I8: IntRange = { name: "i8", min: -0x80, max: 0x7f };
export const U16: IntRange = { name: "u16", min: 0, max: 0xffff };
export const I16: IntRange = { name: "i16", min: -0x8000, max: 0x7fff };
export const U32: IntRange = { name: "u32", min: 0, max: 0xffffffff };
export const I32: IntRange = { name: "i32", min: -0x80000000, max: 0x7fffffff };
export const USIZE: IntRange = { name: "usize", min: 0, max: Number.MAX_SAFE_INTEGER };
export const ISIZE: IntRange = {
  name: "isize",
  min: Number.MIN_SAFE_INTEGER,
  max: Number.MAX_SAFE_INTEGER,
};

/**
 * Returns true if `value` is an integer within `range`.
 */
export function inRange(value: number, range: IntRange): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

/**
 * Encode a signed 32-bit integer using ZigZag encoding.
 * The result is an unsigned 32-bit number.
 */
export function zigzagEncode(n: number): number {
  return ((n << 1) ^ (n >> 31)) >>> 0;
}

/**
 * Encode a signed bigint using ZigZag encoding.
 * @throws RangeError if n is outside the valid 64-bit signed integer range
 */
export function zigzagEncode64(n: bigint): bigint {
  if (n < MinInt64 || n > MaxInt64) {
    throw new RangeError(
      `BigInt value ${n} is outside valid 64-bit signed integer range [${MinInt64}, ${MaxInt64}]`
    );
  }
  return (n << 1n) ^ (n >> 63n);
}

/**
 * Decode a ZigZag encoded 32-bit integer.
 */
export function zigzagDecode(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Decode a ZigZag encoded bigint.
 */
export function zigzagDecode64(n: bigint): bigint {
  return (n >> 1n) ^ -(n & 1n);
}
