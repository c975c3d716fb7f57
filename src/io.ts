/**
 * Destination of encoded bytes. Calls are synchronous; a sink that cannot
 * accept data throws, and the engine reports that as an IoError.
 * `Writer` is the in-memory implementation.
 */
export interface ByteSink {
  writeByte(value: number): void;
  /** `data` may be reused by the caller once this returns; copy what you keep. */
  writeBytes(data: Uint8Array): void;
}

/**
 * Origin of encoded bytes. Both reads either return exactly what was asked
 * for or throw. `Reader` is the in-memory implementation.
 */
export interface ByteSource {
  readByte(): number;
  readBytes(length: number): Uint8Array;
}

/**
 * A sink that only counts what passes through it.
 */
export class CountingSink implements ByteSink {
  private count = 0;

  get length(): number {
    return this.count;
  }

  writeByte(_value: number): void {
    this.count += 1;
  }

  writeBytes(data: Uint8Array): void {
    this.count += data.length;
  }
}
