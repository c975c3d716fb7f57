import { describe, it, expect } from 'vitest';
import { BinDeserializerBase, type BinDeserialize } from './de';
import { DedupContext } from './dedup';
import {
  CustomError,
  IndexOutOfRangeError,
  InvalidUtf8Error,
  IoError,
  OverflowError,
  UnexpectedEndError,
} from './errors';
import type { ByteSource } from './io';
import { Mode } from './mode';
import { Reader } from './reader';
import { encodeVarint } from './varint';

function over(bytes: number[], mode: Mode = Mode.default(), context?: DedupContext): BinDeserializerBase {
  return new BinDeserializerBase(new Reader(new Uint8Array(bytes)), mode, context);
}

const text: BinDeserialize<string> = {
  deserialize(d) {
    return d.readStr();
  },
  deserializeInPlace(_target, d) {
    return d.readStr();
  },
};

const byte: BinDeserialize<number> = {
  deserialize(d) {
    return d.readU8();
  },
  deserializeInPlace(_target, d) {
    return d.readU8();
  },
};

describe('BinDeserializerBase', () => {
  describe('primitives', () => {
    it('reads any non-zero byte as true', () => {
      const d = over([0xff, 0x00, 0x01]);
      expect([d.readBool(), d.readBool(), d.readBool()]).toEqual([true, false, true]);
    });

    it('reads signed bytes', () => {
      expect(over([0x80]).readI8()).toBe(-128);
      expect(over([0x7f]).readI8()).toBe(127);
    });

    it('reads fixed-width integers little-endian', () => {
      expect(over([0x02, 0x01]).readU16()).toBe(0x0102);
      expect(over([0xfe, 0xff]).readI16()).toBe(-2);
      expect(over([0xff, 0xff, 0xff, 0xff]).readU32()).toBe(0xffffffff);
      expect(over([0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff]).readI64()).toBe(-1n);
      expect(over([1, 0, 0, 0, 0, 0, 0, 0]).readU64()).toBe(1n);
    });

    it('reads varint integers when asked', () => {
      const varint = Mode.default().withFixedSizeUseVarint(true);
      expect(over([0xac, 0x02], varint).readU32()).toBe(300);
      expect(over([0x45], varint).readI16()).toBe(-35);
      expect(over([0x03], varint).readI64()).toBe(-2n);
    });

    it('rejects varints wider than the target type', () => {
      const varint = Mode.default().withFixedSizeUseVarint(true);
      expect(() => over([0x80, 0x80, 0x04], varint).readU16()).toThrow(OverflowError);
      expect(() => over([0x80, 0x80, 0x04], varint).readU16()).toThrow(
        'Value 65536 does not fit in u16'
      );
      expect(() => over([0x80, 0x80, 0x04], varint).readI16()).toThrow(OverflowError);
    });

    it('reads floats', () => {
      expect(over([0, 0, 0x80, 0x3f]).readF32()).toBe(1);
      expect(over([0, 0, 0, 0, 0, 0, 0, 0xc0]).readF64()).toBe(-2);
    });

    it('returns byte arrays that own their storage', () => {
      const source = new Uint8Array([2, 7, 8]);
      const bytes = new BinDeserializerBase(new Reader(source)).readBytes();
      source[1] = 0;
      expect(bytes).toEqual(new Uint8Array([7, 8]));
    });

    it('reports truncated input as UnexpectedEndError', () => {
      expect(() => over([0x01]).readU32()).toThrow(UnexpectedEndError);
      expect(() => over([0x01]).readU32()).toThrow(IoError);
    });
  });

  describe('strings', () => {
    it('reads inline strings', () => {
      expect(over([3, 97, 98, 99]).readStr()).toBe('abc');
    });

    it('rejects invalid UTF-8', () => {
      expect(() => over([2, 0xc3, 0x28]).readStr()).toThrow(InvalidUtf8Error);
    });

    it('resolves dedup indices through the context', () => {
      const ctx = new DedupContext();
      ctx.intern('first');
      ctx.intern('second');
      const d = over([1, 0], Mode.dedup(), ctx);
      expect(d.readStr()).toBe('second');
      expect(d.readStr()).toBe('first');
    });

    it('rejects indices past the table', () => {
      const ctx = new DedupContext();
      ctx.intern('only');
      expect(() => over([1], Mode.dedup(), ctx).readStr()).toThrow(IndexOutOfRangeError);
    });

    it('reports a huge index as out of range rather than an overflow', () => {
      const ctx = new DedupContext();
      ctx.intern('only');
      const d = over([...encodeVarint(2n ** 60n)], Mode.dedup(), ctx);

      let caught: unknown;
      try {
        d.readStr();
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(IndexOutOfRangeError);
      expect(caught).toMatchObject({
        kind: 'out-of-range',
        index: 2n ** 60n,
        count: 1,
        message: 'Indexed string out of range: 1152921504606846976 (table holds 1)',
      });
    });

    it('reads inline through disableDedup', () => {
      const d = over([1, 0x7a], Mode.dedup());
      expect(d.disableDedup().readStr()).toBe('z');
    });
  });

  describe('composites', () => {
    it('reads options', () => {
      const d = over([0xff, 1, 97, 0x00]);
      expect(d.readOption(text)).toBe('a');
      expect(d.readOption(text)).toBeUndefined();
    });

    it('reads sequences lazily', () => {
      const d = over([3, 10, 20, 30]);
      const items = d.readSeq(byte);
      expect(items.remaining).toBe(3);
      expect(items.tryNext()).toEqual({ ok: true, value: 10 });
      expect(items.toArray()).toEqual([20, 30]);
    });

    it('reads maps and sets', () => {
      const d = over([2, 1, 2, 3, 4, 2, 5, 5]);
      expect(d.readMap(byte, byte)).toEqual(
        new Map([
          [1, 2],
          [3, 4],
        ])
      );
      expect(d.readSet(byte)).toEqual(new Set([5]));
    });

    it('fills skipped fields from the fallback without reading', () => {
      const d = over([9]);
      expect(d.readField(byte, { skip: true }, () => 42)).toBe(42);
      expect(d.readU8()).toBe(9);
    });

    it('fails on a skipped field with no fallback', () => {
      expect(() => over([]).readField(byte, { skip: true })).toThrow(CustomError);
    });

    it('reads noDedup fields inline', () => {
      const ctx = new DedupContext();
      ctx.intern('pooled');
      const d = over([2, 0x68, 0x69, 0], Mode.dedup(), ctx);
      expect(d.readField(text, { noDedup: true })).toBe('hi');
      expect(d.readField(text)).toBe('pooled');
    });

    it('reads variant discriminants', () => {
      expect(over([0x82, 0x01]).readVariant()).toBe(130);
    });
  });

  describe('in place', () => {
    it('reuses the target array and trims it', () => {
      const target = [1, 2, 3, 4];
      const result = over([2, 7, 8]).readSeqInPlace(target, byte);
      expect(result).toBe(target);
      expect(target).toEqual([7, 8]);
    });

    it('grows the target array', () => {
      const target = [1];
      over([3, 7, 8, 9]).readSeqInPlace(target, byte);
      expect(target).toEqual([7, 8, 9]);
    });

    it('clears and refills maps and sets', () => {
      const m = new Map([[100, 100]]);
      const s = new Set([100]);
      const d = over([1, 1, 2, 1, 3]);
      expect(d.readMapInPlace(m, byte, byte)).toBe(m);
      expect(d.readSetInPlace(s, byte)).toBe(s);
      expect([...m]).toEqual([[1, 2]]);
      expect([...s]).toEqual([3]);
    });

    it('replaces an absent option and clears a present one', () => {
      const d = over([0xff, 5, 0x00]);
      expect(d.readOptionInPlace(undefined, byte)).toBe(5);
      expect(d.readOptionInPlace(5, byte)).toBeUndefined();
    });
  });

  it('wraps source failures in IoError', () => {
    const broken: ByteSource = {
      readByte() {
        throw new Error('socket reset');
      },
      readBytes() {
        throw new Error('socket reset');
      },
    };
    const d = new BinDeserializerBase(broken);
    expect(() => d.readBool()).toThrow('I/O error: socket reset');
    expect(() => d.readUsize()).toThrow(IoError);
    expect(() => d.readF64()).toThrow(IoError);
  });
});
