import { InvalidUtf8Error } from "./errors";

// Module-level singletons to avoid repeated instantiation
const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

export function encodeUtf8(value: string): Uint8Array {
  return textEncoder.encode(value);
}

/**
 * Decodes UTF-8 bytes, rejecting malformed input rather than substituting
 * U+FFFD.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return textDecoder.decode(bytes);
  } catch (e) {
    throw new InvalidUtf8Error({ cause: e });
  }
}
