import { IndexOutOfRangeError, IoError } from "./errors";
import type { ByteSink, ByteSource } from "./io";
import { decodeUtf8, encodeUtf8 } from "./utf8";
import { decodeVarintNumber, encodeVarint } from "./varint";

/**
 * The string pool of a deduplicated buffer.
 *
 * Built during encoding by interning every string in traversal order, then
 * written ahead of the payload as
 * `varint(count) (varint(byteLength) utf8Bytes){count}`. During decoding it
 * is read back in full before any payload byte, and strings are looked up
 * by index.
 */
export class DedupContext {
  private readonly table: string[] = [];
  private readonly indices = new Map<string, number>();

  /**
   * Returns the index of `value`, assigning the next free index the first
   * time a string is seen.
   */
  intern(value: string): number {
    const existing = this.indices.get(value);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.table.length;
    this.table.push(value);
    this.indices.set(value, index);
    return index;
  }

  /**
   * Returns the string stored at `index`.
   *
   * @throws IndexOutOfRangeError if the table has no such entry
   */
  lookup(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.table.length) {
      throw new IndexOutOfRangeError(index, this.table.length);
    }
    return this.table[index];
  }

  /** Number of distinct strings in the table. */
  get size(): number {
    return this.table.length;
  }

  /** The strings in index order. */
  strings(): readonly string[] {
    return this.table;
  }

  /**
   * Writes the table in index order.
   */
  writeTo(sink: ByteSink): void {
    try {
      sink.writeBytes(encodeVarint(this.table.length));
      for (const value of this.table) {
        const bytes = encodeUtf8(value);
        sink.writeBytes(encodeVarint(bytes.length));
        sink.writeBytes(bytes);
      }
    } catch (e) {
      throw IoError.wrap(e);
    }
  }

  /**
   * Reads a complete table from the head of `source`.
   */
  static readFrom(source: ByteSource): DedupContext {
    const context = new DedupContext();
    try {
      const count = decodeVarintNumber(source);
      for (let i = 0; i < count; i++) {
        const length = decodeVarintNumber(source);
        context.table.push(decodeUtf8(source.readBytes(length)));
      }
    } catch (e) {
      throw IoError.wrap(e);
    }
    return context;
  }
}
