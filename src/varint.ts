/**
 * Varint encoding/decoding using LEB128 format.
 *
 * LEB128 (Little Endian Base 128) stores 7 bits of data per byte,
 * using the high bit as a continuation flag.
 */

import { OverflowError, VarintOverflowError } from "./errors";
import type { ByteSource } from "./io";
import { MaxVarint64 } from "./types";

/**
 * Maximum number of bytes for a varint (64-bit value encoded as varint).
 * A uint64 has 64 bits, and each varint byte encodes 7 bits,
 * so we need ceil(64/7) = 10 bytes maximum.
 */
export const MAX_VARINT_BYTES = 10;

function toUnsigned(value: bigint | number): bigint {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new OverflowError(`Cannot encode ${value} as varint: not a safe integer`);
  }
  const v = typeof value === "bigint" ? value : BigInt(value);
  if (v < 0n || v > MaxVarint64) {
    throw new OverflowError(`Cannot encode ${v} as unsigned 64-bit varint`);
  }
  return v;
}

/**
 * Encodes an unsigned 64-bit integer using LEB128 varint encoding.
 *
 * @throws OverflowError if the value is negative or wider than 64 bits
 */
export function encodeVarint(value: bigint | number): Uint8Array {
  if (typeof value === "number" && value >= 0 && value <= 0x7fffffff && Number.isInteger(value)) {
    return encodeSmallVarint(value);
  }

  const result: number[] = [];
  let remaining = toUnsigned(value);
  do {
    let byte = Number(remaining & 0x7fn);
    remaining >>= 7n;
    if (remaining !== 0n) {
      byte |= 0x80;
    }
    result.push(byte);
  } while (remaining !== 0n);

  return new Uint8Array(result);
}

// Lengths and indices nearly always fit in 31 bits; skip bigint for them.
function encodeSmallVarint(value: number): Uint8Array {
  const result: number[] = [];
  while (value > 0x7f) {
    result.push((value & 0x7f) | 0x80);
    value >>>= 7;
  }
  result.push(value);
  return new Uint8Array(result);
}

/**
 * Returns the number of bytes {@link encodeVarint} produces for `value`.
 */
export function varintSize(value: bigint | number): number {
  let remaining = toUnsigned(value);
  let size = 1;
  while (remaining > 0x7fn) {
    remaining >>= 7n;
    size++;
  }
  return size;
}

/**
 * Decodes an unsigned 64-bit integer from LEB128 varint encoding.
 *
 * @throws VarintOverflowError if the encoding runs past 64 bits
 */
export function decodeVarint(source: ByteSource): bigint {
  let result = 0n;
  let shift = 0n;

  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const b = source.readByte();

    // At the 10th byte (index 9), we've consumed 63 bits.
    // The 10th byte can only contribute 1 more bit (bit 63 of uint64).
    if (i === 9) {
      if (b >= 0x80) {
        throw new VarintOverflowError("Varint overflow: exceeded 10 bytes");
      }
      if (b > 1) {
        throw new VarintOverflowError("Varint overflow: 10th byte must be 0 or 1");
      }
    }

    result |= BigInt(b & 0x7f) << shift;
    if ((b & 0x80) === 0) {
      return result;
    }
    shift += 7n;
  }

  throw new VarintOverflowError("Varint overflow: exceeded 10 bytes");
}

/**
 * Decodes an unsigned varint and returns it as a number.
 *
 * @throws OverflowError if the value doesn't fit in a safe integer
 */
export function decodeVarintNumber(source: ByteSource): number {
  const value = decodeVarint(source);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new OverflowError(`Varint value ${value} too large for number`);
  }
  return Number(value);
}
