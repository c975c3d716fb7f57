import { BinDeserializerBase, type BinDeserialize } from "./de";
import { DedupContext } from "./dedup";
import { CountingSink, type ByteSink, type ByteSource } from "./io";
import { Mode } from "./mode";
import { PrescanSerializer } from "./prescan";
import { Reader } from "./reader";
import { BinSerializerBase, type BinSerialize } from "./ser";
import { Writer } from "./writer";

/**
 * Encodes `value` into `sink`.
 *
 * In dedup mode the value is walked twice: a prescan collects its strings,
 * the table is written, then the payload follows with strings as indices.
 * Errors raised by the prescan leave the sink untouched.
 */
export function serializeInto<T>(
  sink: ByteSink,
  codec: BinSerialize<T>,
  value: T,
  mode: Mode = Mode.default()
): void {
  if (mode.useDedup) {
    const prescan = new PrescanSerializer(mode);
    codec.serialize(value, prescan);
    prescan.context.writeTo(sink);
  }
  codec.serialize(value, new BinSerializerBase(sink, mode));
}

/**
 * Encodes `value` into a new buffer.
 *
 * @example
 * ```typescript
 * const data = serialize(Person, { name: "Ada", age: 36 }, Mode.dedup());
 * ```
 */
export function serialize<T>(
  codec: BinSerialize<T>,
  value: T,
  mode: Mode = Mode.default()
): Uint8Array {
  const writer = new Writer();
  serializeInto(writer, codec, value, mode);
  return writer.toUint8Array();
}

/**
 * Returns the number of bytes `serialize` would produce, without keeping
 * them.
 */
export function serializedSize<T>(
  codec: BinSerialize<T>,
  value: T,
  mode: Mode = Mode.default()
): number {
  const counter = new CountingSink();
  serializeInto(counter, codec, value, mode);
  return counter.length;
}

function deserializerFor(source: ByteSource, mode: Mode): BinDeserializerBase {
  const context = mode.useDedup ? DedupContext.readFrom(source) : new DedupContext();
  return new BinDeserializerBase(source, mode, context);
}

function toSource(input: Uint8Array | ByteSource): ByteSource {
  return input instanceof Uint8Array ? new Reader(input) : input;
}

/**
 * Decodes one value from `source`, reading the string table first in dedup
 * mode. Bytes after the value are left unread.
 */
export function deserializeFrom<T>(
  source: ByteSource,
  codec: BinDeserialize<T>,
  mode: Mode = Mode.default()
): T {
  return codec.deserialize(deserializerFor(source, mode));
}

/**
 * Decodes one value from the start of `data`. Trailing bytes are ignored.
 */
export function deserialize<T>(
  codec: BinDeserialize<T>,
  data: Uint8Array,
  mode: Mode = Mode.default()
): T {
  return deserializeFrom(new Reader(data), codec, mode);
}

/**
 * Decodes into `target`, reusing its arrays, maps, sets and objects, and
 * returns the result. On failure `target` may be partly overwritten.
 */
export function deserializeInPlace<T>(
  codec: BinDeserialize<T>,
  target: T,
  input: Uint8Array | ByteSource,
  mode: Mode = Mode.default()
): T {
  return codec.deserializeInPlace(target, deserializerFor(toSource(input), mode));
}
