/**
 * End-to-end tests through the public entry points.
 */

import { describe, it, expect } from 'vitest';
import {
  DedupContext,
  IndexOutOfRangeError,
  IoError,
  Mode,
  OverflowError,
  Reader,
  Writer,
  bool,
  bytes,
  deserialize,
  deserializeFrom,
  deserializeInPlace,
  encodeVarint,
  enumeration,
  f32,
  field,
  i8,
  i16,
  i64,
  isize,
  map,
  option,
  serialize,
  serializeInto,
  serializedSize,
  set,
  skip,
  str,
  struct,
  tuple,
  u8,
  u32,
  u64,
  unit,
  usize,
  vec,
  type ByteSink,
  type Codec,
  type Infer,
} from '../../src';

const Status = enumeration({
  Idle: unit,
  Busy: tuple(str, u32),
  Failed: struct({ reason: field(str), retries: field(u8) }),
});

const Entry = struct({
  id: field(u64),
  name: field(str),
  alias: field(option(str)),
  active: field(bool),
  delta: field(i16),
  offset: field(isize),
  ratio: field(f32),
  tags: field(vec(str)),
  counts: field(map(str, u32)),
  seen: field(set(usize)),
  raw: field(bytes),
  note: field(str, { noDedup: true }),
  status: field(Status),
  cache: skip(vec(i64), () => []),
});
type Entry = Infer<typeof Entry>;

function sample(): Entry {
  return {
    id: 2n ** 40n + 1n,
    name: 'shared-name',
    alias: 'shared-name',
    active: true,
    delta: -300,
    offset: -5,
    ratio: 0.5,
    tags: ['red', 'shared-name', 'red'],
    counts: new Map([
      ['red', 1],
      ['blue', 70000],
    ]),
    seen: new Set([1, 200]),
    raw: new Uint8Array([0xde, 0xad]),
    note: 'shared-name',
    status: { tag: 'Busy', value: ['red', 9] },
    cache: [],
  };
}

const modes: Array<[string, Mode]> = [
  ['default', Mode.default()],
  ['dedup', Mode.dedup()],
  ['dedup + varint', Mode.dedup().withFixedSizeUseVarint(true)],
  ['varint', Mode.default().withFixedSizeUseVarint(true)],
];

describe('round trip', () => {
  for (const [label, mode] of modes) {
    it(`restores the value in ${label} mode`, () => {
      const value = sample();
      expect(deserialize(Entry, serialize(Entry, value, mode), mode)).toEqual(value);
    });

    it(`reports the exact size in ${label} mode`, () => {
      const value = sample();
      expect(serializedSize(Entry, value, mode)).toBe(serialize(Entry, value, mode).length);
    });
  }

  it('drops skipped fields to their default', () => {
    const value = { ...sample(), cache: [1n, 2n] };
    const decoded = deserialize(Entry, serialize(Entry, value, Mode.dedup()), Mode.dedup());
    expect(decoded.cache).toEqual([]);
  });

  it('is smaller with dedup when strings repeat', () => {
    const value = sample();
    expect(serialize(Entry, value, Mode.dedup()).length).toBeLessThan(
      serialize(Entry, value).length
    );
  });

  it('pools strings in first-occurrence order', () => {
    const data = serialize(Entry, sample(), Mode.dedup());
    const table = DedupContext.readFrom(new Reader(data));
    expect(table.strings()).toEqual(['shared-name', 'red', 'blue']);
  });
});

describe('wire scenarios', () => {
  it('encodes "abc" inline', () => {
    expect(serialize(str, 'abc')).toEqual(new Uint8Array([3, 97, 98, 99]));
  });

  it('encodes vec<i16> as zig-zag varints', () => {
    const mode = Mode.default().withFixedSizeUseVarint(true);
    expect(serialize(vec(i16), [1, -3, -35], mode)).toEqual(
      new Uint8Array([0x03, 0x02, 0x05, 0x45])
    );
  });

  it('keeps i8 raw under varint mode', () => {
    const mode = Mode.default().withFixedSizeUseVarint(true);
    expect(serialize(vec(i8), [-1, 1], mode)).toEqual(new Uint8Array([2, 0xff, 0x01]));
  });

  it('ignores trailing bytes', () => {
    const data = new Uint8Array([1, 0x61, 0xee, 0xee]);
    expect(deserialize(str, data)).toBe('a');
  });

  it('rejects a payload index past the table', () => {
    // table holds one string, payload asks for index 1
    const data = new Uint8Array([1, 1, 0x61, 1]);
    expect(() => deserialize(str, data, Mode.dedup())).toThrow(IndexOutOfRangeError);
  });

  it('rejects a payload index beyond the safe integer range', () => {
    const data = new Uint8Array([1, 1, 0x61, ...encodeVarint(2n ** 60n)]);
    expect(() => deserialize(str, data, Mode.dedup())).toThrow(IndexOutOfRangeError);
  });

  it('fails when decoding with the wrong mode', () => {
    const data = serialize(str, 'abc', Mode.dedup());
    expect(deserialize(str, data)).not.toBe('abc');
    // inline strings read as a table leave nothing for the payload
    expect(() => deserialize(vec(str), serialize(vec(str), ['a', 'b']), Mode.dedup())).toThrow(
      IoError
    );
  });
});

describe('streams', () => {
  it('encodes into a caller sink and decodes from a caller source', () => {
    const writer = new Writer();
    serializeInto(writer, Entry, sample(), Mode.dedup());
    serializeInto(writer, u32, 77, Mode.dedup());

    const reader = new Reader(writer.bytes());
    expect(deserializeFrom(reader, Entry, Mode.dedup())).toEqual(sample());
    expect(deserializeFrom(reader, u32, Mode.dedup())).toBe(77);
    expect(reader.hasMore).toBe(false);
  });

  it('leaves the sink untouched when the prescan fails', () => {
    const writer = new Writer();
    const bad = { ...sample(), delta: 40000 };
    expect(() => serializeInto(writer, Entry, bad, Mode.dedup())).toThrow(OverflowError);
    expect(writer.position).toBe(0);
  });

  it('reports sink failures as IoError', () => {
    const failing: ByteSink = {
      writeByte() {
        throw new Error('quota exceeded');
      },
      writeBytes() {
        throw new Error('quota exceeded');
      },
    };
    expect(() => serializeInto(failing, Entry, sample(), Mode.dedup())).toThrow(IoError);
    expect(() => serializeInto(failing, str, 'x')).toThrow('I/O error: quota exceeded');
  });
});

describe('in-place decoding', () => {
  it('reuses nested containers', () => {
    const target = sample();
    const tags = target.tags;
    const counts = target.counts;
    const seen = target.seen;

    const next: Entry = {
      ...sample(),
      tags: ['green'],
      counts: new Map([['green', 3]]),
      seen: new Set([4]),
    };
    const data = serialize(Entry, next, Mode.dedup());
    const result = deserializeInPlace(Entry, target, data, Mode.dedup());

    expect(result).toBe(target);
    expect(target.tags).toBe(tags);
    expect(target.counts).toBe(counts);
    expect(target.seen).toBe(seen);
    expect(target).toEqual(next);
  });

  it('reads from a caller source', () => {
    const target = { ...sample(), name: 'old' };
    const reader = new Reader(serialize(Entry, sample()));
    deserializeInPlace(Entry, target, reader);
    expect(target.name).toBe('shared-name');
    expect(reader.hasMore).toBe(false);
  });
});

describe('hand-written codecs', () => {
  // A point stored as two u8 with no framing.
  interface Point {
    x: number;
    y: number;
  }

  const point: Codec<Point> = {
    serialize(value, s) {
      s.writeU8(value.x);
      s.writeU8(value.y);
    },
    deserialize(d) {
      const x = d.readU8();
      return { x, y: d.readU8() };
    },
    deserializeInPlace(target, d) {
      target.x = d.readU8();
      target.y = d.readU8();
      return target;
    },
  };

  it('compose with the built-ins', () => {
    const path = vec(point);
    const value = [
      { x: 1, y: 2 },
      { x: 3, y: 4 },
    ];
    expect(serialize(path, value)).toEqual(new Uint8Array([2, 1, 2, 3, 4]));
    expect(deserialize(path, serialize(path, value))).toEqual(value);
  });
});
