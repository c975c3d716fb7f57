/**
 * Category of a {@link TersebinError}, so callers can switch on one field
 * instead of chaining `instanceof` checks.
 */
export type ErrorKind = "io" | "overflow" | "utf8" | "out-of-range" | "custom";

/**
 * Base error class for tersebin errors.
 */
export class TersebinError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = "TersebinError";
  }
}

/**
 * Error thrown when the underlying sink or source fails.
 */
export class IoError extends TersebinError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("io", message, options);
    this.name = "IoError";
  }

  /**
   * Wraps a foreign error thrown by a sink or source. Engine errors pass
   * through unchanged.
   */
  static wrap(error: unknown): TersebinError {
    if (error instanceof TersebinError) {
      return error;
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new IoError(`I/O error: ${detail}`, { cause: error });
  }
}

/**
 * Error thrown when input ends before a value is complete.
 */
export class UnexpectedEndError extends IoError {
  constructor(needed: number, available: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`);
    this.name = "UnexpectedEndError";
  }
}

/**
 * Error thrown when a value does not fit the width it must be converted to.
 */
export class OverflowError extends TersebinError {
  constructor(message: string) {
    super("overflow", message);
    this.name = "OverflowError";
  }
}

/**
 * Error thrown when a varint runs past 64 bits.
 */
export class VarintOverflowError extends OverflowError {
  constructor(message: string = "Varint overflow: value exceeds 64 bits") {
    super(message);
    this.name = "VarintOverflowError";
  }
}

/**
 * Error thrown when string bytes are not valid UTF-8.
 */
export class InvalidUtf8Error extends TersebinError {
  constructor(options?: { cause?: unknown }) {
    super("utf8", "Invalid UTF-8 string", options);
    this.name = "InvalidUtf8Error";
  }
}

/**
 * Error thrown when a payload references a string past the end of the
 * dedup table.
 */
export class IndexOutOfRangeError extends TersebinError {
  readonly index: number | bigint;
  readonly count: number;

  constructor(index: number | bigint, count: number) {
    super("out-of-range", `Indexed string out of range: ${index} (table holds ${count})`);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.count = count;
  }
}

/**
 * Error raised by a codec with its own message.
 */
export class CustomError extends TersebinError {
  constructor(message: string) {
    super("custom", message);
    this.name = "CustomError";
  }
}

/**
 * Builds a {@link CustomError} from any displayable value.
 */
export function customError(message: unknown): CustomError {
  return new CustomError(String(message));
}

export function isTersebinError(error: unknown): error is TersebinError {
  return error instanceof TersebinError;
}
