import { describe, it, expect } from 'vitest';
import { PickleReader } from '../../../src/infrastructure/pickle/PickleReader.js';
import { PickleWriter } from '../../helpers/SnssFixtureBuilder.js';

describe('PickleReader', () => {
  it('reads fixed-width fields and aligns to 4 bytes', () => {
    const bytes = new PickleWriter().uint8(7).int32(-2).int64(1234567890123n).bytes();
    const reader = new PickleReader(bytes);

    expect(reader.readU8()).toEqual({ ok: true, value: 7 });
    expect(reader.offset).toBe(4);
    expect(reader.readI32()).toEqual({ ok: true, value: -2 });
    expect(reader.readI64()).toEqual({ ok: true, value: 1234567890123n });
    expect(reader.remaining).toBe(0);
  });

  it('does not validate padding bytes', () => {
    const reader = new PickleReader(Uint8Array.of(1, 0xaa, 0xbb, 0xcc, 5, 0, 0, 0));
    expect(reader.readU8()).toEqual({ ok: true, value: 1 });
    expect(reader.readU32()).toEqual({ ok: true, value: 5 });
  });

  it('reads int32 bools as non-zero', () => {
    const reader = new PickleReader(new PickleWriter().int32(0).int32(3).bytes());
    expect(reader.readBool()).toEqual({ ok: true, value: false });
    expect(reader.readBool()).toEqual({ ok: true, value: true });
  });

  it('fails with TruncatedData and leaves the cursor unmoved', () => {
    const reader = new PickleReader(Uint8Array.of(1, 0, 0, 0, 9, 9));
    expect(reader.readU32()).toEqual({ ok: true, value: 1 });

    const result = reader.readU32();
    expect(result).toEqual({
      ok: false,
      error: { code: 'TruncatedData', offset: 4, detail: 'uint32 needs 4 bytes, 2 left' },
    });
    expect(reader.offset).toBe(4);
    expect(reader.readU16()).toEqual({ ok: true, value: 0x0909 });
  });

  it('reads UTF-8 strings with padding', () => {
    const bytes = new PickleWriter().string('abcde').int32(42).bytes();
    const reader = new PickleReader(bytes);
    expect(reader.readLengthPrefixedString()).toEqual({ ok: true, value: 'abcde' });
    expect(reader.offset).toBe(12);
    expect(reader.readI32()).toEqual({ ok: true, value: 42 });
  });

  it('reads UTF-16 strings by character count', () => {
    const bytes = new PickleWriter().string16('héllo').bytes();
    const reader = new PickleReader(bytes);
    expect(reader.readLengthPrefixedUtf16String()).toEqual({ ok: true, value: 'héllo' });
    expect(reader.remaining).toBe(0);
  });

  it('reads UTF-16 strings by byte count', () => {
    const reader = new PickleReader(new PickleWriter().string16Bytes('ab').bytes());
    expect(reader.readLengthPrefixedUtf16ByteCountString()).toEqual({ ok: true, value: 'ab' });
  });

  it('treats length -1 as null', () => {
    const reader = new PickleReader(new PickleWriter().int32(-1).int32(-1).bytes());
    expect(reader.readLengthPrefixedString()).toEqual({ ok: true, value: null });
    expect(reader.readLengthPrefixedBytes()).toEqual({ ok: true, value: null });
    expect(reader.remaining).toBe(0);
  });

  it('rejects a declared length beyond the buffer with InvalidLength', () => {
    const bytes = new PickleWriter().int32(1000).raw([1, 2, 3, 4]).bytes();
    const reader = new PickleReader(bytes);

    expect(reader.readLengthPrefixedBytes()).toEqual({
      ok: false,
      error: { code: 'InvalidLength', offset: 0, detail: 'blob declares 1000 bytes, 4 available' },
    });
    expect(reader.offset).toBe(0);
  });

  it('rejects UTF-16 character counts whose byte length exceeds the buffer', () => {
    const bytes = new PickleWriter().int32(3).raw([0x61, 0, 0x62, 0]).bytes();
    const result = new PickleReader(bytes).readLengthPrefixedUtf16String();
    expect(result).toEqual({
      ok: false,
      error: { code: 'InvalidLength', offset: 0, detail: 'string16 declares 6 bytes, 4 available' },
    });
  });

  it('rejects negative lengths other than -1', () => {
    const result = new PickleReader(new PickleWriter().int32(-5).bytes()).readLengthPrefixedString();
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('InvalidLength');
      expect(result.error.detail).toBe('string declares negative length -5');
    }
  });

  it('returns a copy of blob bytes', () => {
    const bytes = new PickleWriter().blob(Uint8Array.of(1, 2, 3)).bytes();
    const result = new PickleReader(bytes).readLengthPrefixedBytes();
    expect(result.ok).toBe(true);
    if (result.ok && result.value) {
      expect([...result.value]).toEqual([1, 2, 3]);
      bytes[4] = 99;
      expect(result.value[0]).toBe(1);
    }
  });

  it('stops at the buffer end when the final field has no trailing padding', () => {
    const reader = new PickleReader(Uint8Array.of(3, 0, 0, 0, 0x61, 0x62, 0x63));
    expect(reader.readLengthPrefixedString()).toEqual({ ok: true, value: 'abc' });
    expect(reader.offset).toBe(7);
    expect(reader.remaining).toBe(0);
  });

  it('bounds a reader without moving its cursor or offsets', () => {
    const reader = new PickleReader(new PickleWriter().int32(1).int32(2).int32(3).bytes());
    expect(reader.readI32()).toEqual({ ok: true, value: 1 });

    const bounded = reader.bounded(8);
    expect(bounded.offset).toBe(4);
    expect(bounded.remaining).toBe(4);
    expect(bounded.readI32()).toEqual({ ok: true, value: 2 });
    expect(bounded.readI32()).toEqual({
      ok: false,
      error: { code: 'TruncatedData', offset: 8, detail: 'int32 needs 4 bytes, 0 left' },
    });
  });

  describe('open', () => {
    it('limits the reader to the declared payload', () => {
      const bytes = Uint8Array.of(4, 0, 0, 0, 1, 0, 0, 0, 0xff, 0xff);
      const opened = PickleReader.open(bytes);
      expect(opened.ok).toBe(true);
      if (opened.ok) {
        expect(opened.value.length).toBe(4);
        expect(opened.value.readI32()).toEqual({ ok: true, value: 1 });
        expect(opened.value.remaining).toBe(0);
      }
    });

    it('fails when the header is incomplete', () => {
      expect(PickleReader.open(Uint8Array.of(1, 0))).toEqual({
        ok: false,
        error: { code: 'TruncatedData', offset: 0, detail: 'pickle header needs 4 bytes, 2 left' },
      });
    });

    it('fails when the declared payload exceeds the data', () => {
      expect(PickleReader.open(Uint8Array.of(8, 0, 0, 0, 1))).toEqual({
        ok: false,
        error: { code: 'InvalidLength', offset: 0, detail: 'pickle declares 8 bytes, 1 available' },
      });
    });
  });
});
