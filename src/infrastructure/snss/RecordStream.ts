import type { ByteSourcePort } from '../../domain/ports/ByteSourcePort.js';
import { InvalidSessionHeaderError } from '../../domain/errors/DomainErrors.js';

export const SNSS_MAGIC = 'SNSS';
const HEADER_SIZE = 8;

export type HeaderMode = 'auto' | 'required' | 'absent';
export type RecordSizeBytes = 2 | 4;

/** 檔案開頭的 "SNSS" + int32 版本 */
export interface SessionFileHeader {
  magic: typeof SNSS_MAGIC;
  version: number;
}

/** 一筆完整紀錄；offset 為 size 前綴在檔案中的位置 */
export interface RawRecord {
  kind: 'record';
  offset: number;
  size: number;
  payload: Uint8Array;
}

export type RecordStreamItem =
  | RawRecord
  | { kind: 'end'; offset: number }
  | { kind: 'truncated'; offset: number; declaredSize: number | null; available: number };

export interface RecordStreamOptions {
  recordSizeBytes: RecordSizeBytes;
  header: HeaderMode;
}

const DEFAULT_OPTIONS: RecordStreamOptions = { recordSizeBytes: 4, header: 'auto' };

/**
 * 頂層紀錄序列：[size][payload]...
 *
 * - 依檔案順序產生紀錄，一次只持有一筆 payload
 * - 宣告長度超過剩餘資料時回傳 truncated 並結束，不嘗試重新同步
 * - 只能從頭重新開始（rewind 或再次迭代）
 */
export class RecordStream implements Iterable<RecordStreamItem> {
  private position = 0;
  private terminal: RecordStreamItem | null = null;
  private fileHeader: SessionFileHeader | null = null;
  private readonly options: RecordStreamOptions;

  constructor(
    private readonly source: ByteSourcePort,
    options: Partial<RecordStreamOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.start();
  }

  /** 檔案 header；無 header 時為 null */
  get header(): SessionFileHeader | null {
    return this.fileHeader;
  }

  /** 已消耗的位元組數 */
  get bytesConsumed(): number {
    return this.position;
  }

  next(): RecordStreamItem {
    if (this.terminal) return this.terminal;

    const width = this.options.recordSizeBytes;
    const offset = this.position;
    const prefix = this.source.read(width);
    this.position += prefix.length;

    if (prefix.length === 0) {
      return this.finish({ kind: 'end', offset });
    }
    if (prefix.length < width) {
      return this.finish({ kind: 'truncated', offset, declaredSize: null, available: prefix.length });
    }

    const prefixView = new DataView(prefix.buffer, prefix.byteOffset, prefix.byteLength);
    const size = width === 2 ? prefixView.getUint16(0, true) : prefixView.getUint32(0, true);

    const payload = this.source.read(size);
    this.position += payload.length;
    if (payload.length < size) {
      return this.finish({ kind: 'truncated', offset, declaredSize: size, available: payload.length });
    }

    return { kind: 'record', offset, size, payload };
  }

  /** 回到第一筆紀錄之前（header 會重新讀取） */
  rewind(): void {
    this.source.rewind();
    this.start();
  }

  /** 每次迭代都從頭開始，最後一個項目為 end 或 truncated */
  *[Symbol.iterator](): Iterator<RecordStreamItem> {
    this.rewind();
    for (;;) {
      const item = this.next();
      yield item;
      if (item.kind !== 'record') return;
    }
  }

  private finish(item: RecordStreamItem): RecordStreamItem {
    this.terminal = item;
    return item;
  }

  private start(): void {
    this.position = 0;
    this.terminal = null;
    this.fileHeader = null;

    if (this.options.header === 'absent') return;

    const head = this.source.read(HEADER_SIZE);
    const magic = String.fromCharCode(...head.subarray(0, 4));

    if (head.length === HEADER_SIZE && magic === SNSS_MAGIC) {
      const version = new DataView(head.buffer, head.byteOffset, head.byteLength).getInt32(4, true);
      this.fileHeader = { magic: SNSS_MAGIC, version };
      this.position = HEADER_SIZE;
      return;
    }

    if (this.options.header === 'required') {
      throw new InvalidSessionHeaderError(Buffer.from(head.subarray(0, 4)).toString('hex'));
    }

    // auto 模式下沒有 magic：回到開頭當成純紀錄序列
    this.source.rewind();
  }
}
