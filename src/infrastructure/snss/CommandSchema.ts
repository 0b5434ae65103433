import type { Command } from '../../domain/commands/Command.js';
import type { SessionKind } from '../../domain/commands/DecodeOutcome.js';
import { ChromeTimestamp } from '../../domain/value-objects/ChromeTimestamp.js';
import type { PickleReader } from '../pickle/PickleReader.js';
import { fail, ok } from '../../shared/ParseResult.js';
import type { ParseResult } from '../../shared/ParseResult.js';

/**
 * Schema 欄位類型
 *
 * - UInt8：POD struct 中的 C++ bool（1 byte + 3 bytes padding）
 * - Bool：pickle 的 bool（int32）
 * - Padding：64-bit 成員前的 4 bytes 對齊空間
 * - PickleHeader：pickle 形式 payload 開頭的 uint32 長度
 */
export type FieldType =
  | 'Bool'
  | 'UInt8'
  | 'Int16'
  | 'UInt16'
  | 'Int32'
  | 'UInt32'
  | 'Int64'
  | 'UInt64'
  | 'Double'
  | 'Blob'
  | 'String'
  | 'String16'
  | 'Timestamp'
  | 'Padding'
  | 'PickleHeader';

export type FieldValue = boolean | number | bigint | string | Uint8Array | ChromeTimestamp | null;

export interface FieldSpec {
  name: string;
  type: FieldType;
  /** 位於結尾、較舊的寫入端可能沒有的欄位；payload 剛好用完時不算失敗 */
  optional?: boolean;
}

/** 建構 Command 時需要的解碼選項 */
export interface BuildContext {
  decodePageState: boolean;
}

/**
 * 一列 schema：(sessionKind, commandId, version 範圍) → 欄位清單
 *
 * 欄位依序讀取，讀完最後一個欄位即停止；剩餘位元組忽略。
 */
export interface CommandSchema {
  sessionKind: SessionKind;
  commandId: number;
  name: string;
  minVersion: number;
  maxVersion: number;
  fields: readonly FieldSpec[];
  build(fields: DecodedFields, context: BuildContext): Command;
}

export const FIELD_READERS: Record<FieldType, (reader: PickleReader) => ParseResult<FieldValue>> = {
  Bool: (r) => r.readBool(),
  UInt8: (r) => r.readU8(),
  Int16: (r) => r.readI16(),
  UInt16: (r) => r.readU16(),
  Int32: (r) => r.readI32(),
  UInt32: (r) => r.readU32(),
  Int64: (r) => r.readI64(),
  UInt64: (r) => r.readU64(),
  Double: (r) => r.readF64(),
  Blob: (r) => r.readLengthPrefixedBytes(),
  String: (r) => r.readLengthPrefixedString(),
  String16: (r) => r.readLengthPrefixedUtf16String(),
  Timestamp: (r) => r.readTimestamp(),
  Padding: (r) => {
    const skipped = r.skip(4);
    return skipped.ok ? ok(null) : skipped;
  },
  PickleHeader: (r) => {
    const start = r.offset;
    const size = r.readU32();
    if (!size.ok) return size;
    if (size.value > r.remaining) {
      return fail('InvalidLength', start, `pickle declares ${size.value} bytes, ${r.remaining} available`);
    }
    return size;
  },
};

/**
 * 已解碼欄位的型別化存取
 *
 * 欄位型別由 schema 決定，存取型別不符代表 schema 寫錯，直接拋出。
 * 缺少的 optional 欄位回傳 fallback。
 */
export class DecodedFields {
  constructor(private readonly values: ReadonlyMap<string, FieldValue>) {}

  has(name: string): boolean {
    return this.values.has(name);
  }

  int(name: string, fallback = 0): number {
    const value = this.values.get(name);
    if (value === undefined) return fallback;
    if (typeof value !== 'number') throw this.mismatch(name, 'number', value);
    return value;
  }

  bool(name: string, fallback = false): boolean {
    const value = this.values.get(name);
    if (value === undefined) return fallback;
    if (typeof value === 'number') return value !== 0;
    if (typeof value !== 'boolean') throw this.mismatch(name, 'boolean', value);
    return value;
  }

  string(name: string): string | null {
    const value = this.values.get(name);
    if (value === undefined || value === null) return null;
    if (typeof value !== 'string') throw this.mismatch(name, 'string', value);
    return value;
  }

  bytes(name: string): Uint8Array | null {
    const value = this.values.get(name);
    if (value === undefined || value === null) return null;
    if (!(value instanceof Uint8Array)) throw this.mismatch(name, 'Uint8Array', value);
    return value;
  }

  timestamp(name: string): ChromeTimestamp | null {
    const value = this.values.get(name);
    if (value === undefined || value === null) return null;
    if (!(value instanceof ChromeTimestamp)) throw this.mismatch(name, 'ChromeTimestamp', value);
    return value;
  }

  /** 必要的時間欄位；缺少時視為 0（未設定） */
  requiredTimestamp(name: string): ChromeTimestamp {
    return this.timestamp(name) ?? ChromeTimestamp.fromMicroseconds(0n);
  }

  private mismatch(name: string, expected: string, value: FieldValue): Error {
    return new Error(`Field "${name}" is ${typeof value}, schema expects ${expected}`);
  }
}
