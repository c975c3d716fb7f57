import type { Codec, Infer } from "./codec";
import { CustomError } from "./errors";

// Pairs a tag with the payload its own codec decoded.
function assemble<T>(parts: unknown): T {
  return parts as T;
}

export type Variants = Record<string, Codec<unknown>>;

/**
 * The tagged union described by a set of variants: `tag` names the
 * variant, `value` holds its payload (`null` for `unit` variants).
 */
export type EnumValue<V extends Variants> = {
  [K in keyof V & string]: { tag: K; value: Infer<V[K]> };
}[keyof V & string];

/**
 * A sum type. The discriminant of each variant is its zero-based position
 * in `variants`; it is written as a varint, followed by the payload.
 *
 * Reordering or inserting variants changes the wire format.
 *
 * @example
 * ```typescript
 * const Shape = enumeration({
 *   Empty: unit,
 *   Circle: struct({ radius: field(f64) }),
 *   Polygon: vec(tuple(f64, f64)),
 * });
 * serialize(Shape, { tag: "Circle", value: { radius: 2 } });
 * ```
 */
export function enumeration<V extends Variants>(variants: V): Codec<EnumValue<V>> {
  const tags = Object.keys(variants);
  const codecs: readonly Codec<unknown>[] = tags.map((tag) => variants[tag]);
  const discriminants = new Map<string, number>(tags.map((tag, i) => [tag, i]));

  const discriminantOf = (tag: string): number => {
    const discriminant = discriminants.get(tag);
    if (discriminant === undefined) {
      throw new CustomError(`Unknown variant "${tag}"`);
    }
    return discriminant;
  };

  const readDiscriminant = (discriminant: number): number => {
    if (discriminant >= tags.length) {
      throw new CustomError(
        `Invalid discriminant ${discriminant} for enum with ${tags.length} variants`
      );
    }
    return discriminant;
  };

  return {
    serialize(value, serializer) {
      const discriminant = discriminantOf(value.tag);
      serializer.writeVariant(discriminant);
      codecs[discriminant].serialize(value.value, serializer);
    },
    deserialize(deserializer) {
      const discriminant = readDiscriminant(deserializer.readVariant());
      const value = codecs[discriminant].deserialize(deserializer);
      return assemble<EnumValue<V>>({ tag: tags[discriminant], value });
    },
    deserializeInPlace(target, deserializer) {
      const discriminant = readDiscriminant(deserializer.readVariant());
      const codec = codecs[discriminant];
      const value =
        target.tag === tags[discriminant]
          ? codec.deserializeInPlace(target.value, deserializer)
          : codec.deserialize(deserializer);
      Reflect.set(target, "tag", tags[discriminant]);
      Reflect.set(target, "value", value);
      return target;
    },
  };
}
