import { DedupContext } from "./dedup";
import { Mode } from "./mode";
import { SerializerBase } from "./ser";

/**
 * A serializer that writes nothing and only collects strings.
 *
 * Running a value through it before the real write fills {@link context}
 * with every deduplicated string in first-occurrence order, which is the
 * table that precedes the payload. Range checks still run, so a value that
 * cannot be encoded fails here, before any byte reaches the output.
 */
export class PrescanSerializer extends SerializerBase {
  constructor(mode: Mode = Mode.dedup(), context: DedupContext = new DedupContext()) {
    super(mode, context);
  }

  protected emitByte(_value: number): void {}

  protected emitBytes(_data: Uint8Array): void {}

  protected writeInlineStr(_value: string): void {}

  protected withMode(mode: Mode): PrescanSerializer {
    return new PrescanSerializer(mode, this.context);
  }
}
