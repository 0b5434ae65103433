import { TextDecoder } from 'node:util';
import { ChromeTimestamp } from '../../domain/value-objects/ChromeTimestamp.js';
import { fail, ok } from '../../shared/ParseResult.js';
import type { ParseResult } from '../../shared/ParseResult.js';

const ALIGNMENT = 4;
const utf8 = new TextDecoder('utf-8');
const utf16 = new TextDecoder('utf-16le');

function align(offset: number): number {
  return (offset + ALIGNMENT - 1) & ~(ALIGNMENT - 1);
}

/**
 * Pickle 容器的 cursor 式讀取器
 *
 * 每個欄位讀完後 cursor 前進到下一個 4-byte 對齊位置（padding 不檢查是否為 0）。
 * 讀取失敗時 cursor 不移動，由呼叫端決定中止或降級。
 */
export class PickleReader {
  private cursor = 0;
  private readonly view: DataView;

  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  /**
   * 開啟帶 header 的 pickle：[payload_size:uint32][payload]
   *
   * 宣告長度超過實際資料時視為 InvalidLength；宣告較短時只讀宣告範圍。
   */
  static open(bytes: Uint8Array): ParseResult<PickleReader> {
    if (bytes.length < 4) {
      return fail('TruncatedData', 0, `pickle header needs 4 bytes, ${bytes.length} left`);
    }
    const declared = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true);
    if (declared > bytes.length - 4) {
      return fail('InvalidLength', 0, `pickle declares ${declared} bytes, ${bytes.length - 4} available`);
    }
    return ok(new PickleReader(bytes.subarray(4, 4 + declared)));
  }

  get offset(): number {
    return this.cursor;
  }

  get length(): number {
    return this.buffer.length;
  }

  get remaining(): number {
    return this.buffer.length - this.cursor;
  }

  readU8(): ParseResult<number> {
    return this.fixed(1, 'uint8', (at) => this.view.getUint8(at));
  }

  readU16(): ParseResult<number> {
    return this.fixed(2, 'uint16', (at) => this.view.getUint16(at, true));
  }

  readI16(): ParseResult<number> {
    return this.fixed(2, 'int16', (at) => this.view.getInt16(at, true));
  }

  readU32(): ParseResult<number> {
    return this.fixed(4, 'uint32', (at) => this.view.getUint32(at, true));
  }

  readI32(): ParseResult<number> {
    return this.fixed(4, 'int32', (at) => this.view.getInt32(at, true));
  }

  readU64(): ParseResult<bigint> {
    return this.fixed(8, 'uint64', (at) => this.view.getBigUint64(at, true));
  }

  readI64(): ParseResult<bigint> {
    return this.fixed(8, 'int64', (at) => this.view.getBigInt64(at, true));
  }

  readF32(): ParseResult<number> {
    return this.fixed(4, 'float', (at) => this.view.getFloat32(at, true));
  }

  readF64(): ParseResult<number> {
    return this.fixed(8, 'double', (at) => this.view.getFloat64(at, true));
  }

  /** bool 以 int32 儲存，非 0 即 true */
  readBool(): ParseResult<boolean> {
    return this.fixed(4, 'bool', (at) => this.view.getInt32(at, true) !== 0);
  }

  /** int64 微秒（1601 epoch） */
  readTimestamp(): ParseResult<ChromeTimestamp> {
    return this.fixed(8, 'timestamp', (at) =>
      ChromeTimestamp.fromMicroseconds(this.view.getBigInt64(at, true)));
  }

  /**
   * 以 end 為尾端的新 reader，cursor 與 offset 基準不變
   *
   * pickle 宣告的長度之後的位元組不屬於任何欄位。
   */
  bounded(end: number): PickleReader {
    const reader = new PickleReader(this.buffer.subarray(0, Math.min(end, this.buffer.length)));
    reader.cursor = Math.min(this.cursor, reader.length);
    return reader;
  }

  /** 略過 n 個位元組（struct padding）後對齊 */
  skip(size: number): ParseResult<void> {
    return this.fixed(size, `${size} padding bytes`, () => undefined);
  }

  /** [length:int32][bytes]；length -1 代表 null */
  readLengthPrefixedBytes(): ParseResult<Uint8Array | null> {
    const result = this.lengthPrefixed(1, 'blob');
    if (!result.ok || result.value === null) return result;
    return ok(result.value.slice());
  }

  /** UTF-8 字串，length 為位元組數 */
  readLengthPrefixedString(): ParseResult<string | null> {
    return this.decoded(this.lengthPrefixed(1, 'string'), utf8);
  }

  /** UTF-16LE 字串，length 為字元數 */
  readLengthPrefixedUtf16String(): ParseResult<string | null> {
    return this.decoded(this.lengthPrefixed(2, 'string16'), utf16);
  }

  /** UTF-16LE 字串，length 為位元組數（page state 使用） */
  readLengthPrefixedUtf16ByteCountString(): ParseResult<string | null> {
    return this.decoded(this.lengthPrefixed(1, 'string16 (byte count)'), utf16);
  }

  private fixed<T>(size: number, label: string, read: (at: number) => T): ParseResult<T> {
    if (this.remaining < size) {
      return fail('TruncatedData', this.cursor, `${label} needs ${size} bytes, ${this.remaining} left`);
    }
    const value = read(this.cursor);
    this.advance(size);
    return ok(value);
  }

  private lengthPrefixed(unitSize: number, label: string): ParseResult<Uint8Array | null> {
    const start = this.cursor;
    if (this.remaining < 4) {
      return fail('TruncatedData', start, `${label} length needs 4 bytes, ${this.remaining} left`);
    }

    const declared = this.view.getInt32(start, true);
    if (declared === -1) {
      this.advance(4);
      return ok(null);
    }
    if (declared < 0) {
      return fail('InvalidLength', start, `${label} declares negative length ${declared}`);
    }

    const byteLength = declared * unitSize;
    const available = this.buffer.length - start - 4;
    if (byteLength > available) {
      return fail('InvalidLength', start, `${label} declares ${byteLength} bytes, ${available} available`);
    }

    const bytes = this.buffer.subarray(start + 4, start + 4 + byteLength);
    this.cursor = start + 4;
    this.advance(byteLength);
    return ok(bytes);
  }

  private decoded(result: ParseResult<Uint8Array | null>, decoder: TextDecoder): ParseResult<string | null> {
    if (!result.ok) return result;
    return ok(result.value === null ? null : decoder.decode(result.value));
  }

  /** 前進並對齊；結尾缺少的 padding 不算錯誤，cursor 停在緩衝區尾端 */
  private advance(size: number): void {
    this.cursor = Math.min(align(this.cursor + size), this.buffer.length);
  }
}
