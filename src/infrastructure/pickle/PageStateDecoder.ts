import type { FrameState, HttpBody, PageState } from '../../domain/entities/PageState.js';
import { fail, ok } from '../../shared/ParseResult.js';
import type { DecodeFault, ParseResult } from '../../shared/ParseResult.js';
import { PickleReader } from './PickleReader.js';
import { parseFormState } from './FormStateParser.js';

export const MIN_PAGE_STATE_VERSION = 11;
export const MAX_PAGE_STATE_VERSION = 23;

/** 子 frame 巢狀上限，避免毀損資料造成過深遞迴 */
const MAX_FRAME_DEPTH = 64;

/** 只在本模組內使用：把 ParseResult 失敗轉成可中斷整棵 frame 樹的訊號 */
class PageStateFault extends Error {
  constructor(public readonly fault: DecodeFault) {
    super(fault.detail);
  }
}

/** 失敗即中斷的讀取包裝，page state 欄位多且條件巢狀 */
class StrictReader {
  constructor(private readonly reader: PickleReader) {}

  private take<T>(result: ParseResult<T>): T {
    if (!result.ok) throw new PageStateFault(result.error);
    return result.value;
  }

  get offset(): number {
    return this.reader.offset;
  }

  int(): number { return this.take(this.reader.readI32()); }
  long(): bigint { return this.take(this.reader.readI64()); }
  bool(): boolean { return this.take(this.reader.readBool()); }
  blob(): Uint8Array | null { return this.take(this.reader.readLengthPrefixedBytes()); }
  string(): string | null { return this.take(this.reader.readLengthPrefixedString()); }
  string16(): string | null { return this.take(this.reader.readLengthPrefixedUtf16ByteCountString()); }

  /** double 以 8 bytes 的 blob 形式儲存 */
  double(): number {
    const start = this.reader.offset;
    const bytes = this.blob();
    if (!bytes || bytes.length !== 8) {
      throw new PageStateFault({
        code: 'InvalidLength',
        offset: start,
        detail: `double blob must be 8 bytes, got ${bytes?.length ?? 'null'}`,
      });
    }
    return new DataView(bytes.buffer, bytes.byteOffset, 8).getFloat64(0, true);
  }

  /** [count:int32] 後接 count 個字串；每個元素至少佔 4 bytes */
  count(label: string): number {
    const start = this.reader.offset;
    const value = this.int();
    if (value < 0 || value * 4 > this.reader.remaining) {
      throw new PageStateFault({
        code: 'InvalidLength',
        offset: start,
        detail: `${label} count ${value} exceeds remaining data`,
      });
    }
    return value;
  }

  stringVector(label: string): string[] {
    const total = this.count(label);
    const result: string[] = [];
    for (let i = 0; i < total; i++) {
      result.push(this.string16() ?? '');
    }
    return result;
  }

  invalid(offset: number, detail: string): never {
    throw new PageStateFault({ code: 'InvalidValue', offset, detail });
  }
}

function readHttpBody(r: StrictReader, version: number): HttpBody | null {
  if (!r.bool()) return null;

  const body: HttpBody = {
    data: [],
    fileRanges: [],
    blobUuids: [],
    identifier: 0n,
    containsPasswords: true,
    contentType: null,
  };

  const elementCount = r.count('http body element');
  for (let i = 0; i < elementCount; i++) {
    const typeOffset = r.offset;
    const elementType = r.int();
    switch (elementType) {
      case 0: {
        const data = r.blob();
        if (data && data.length > 0) body.data.push(data);
        break;
      }
      case 1:
      case 3: {
        // 1 = 檔案（UTF-16 路徑），3 = FileSystem URL（UTF-8）
        const path = elementType === 1 ? r.string16() : r.string();
        const start = r.long();
        const length = r.long();
        const modificationTime = r.double();
        body.fileRanges.push({ path, start, length, modificationTime });
        break;
      }
      case 2: {
        const uuid = r.string();
        if (version >= 16 && uuid !== null) body.blobUuids.push(uuid);
        break;
      }
      default:
        r.invalid(typeOffset, `invalid http body element type ${elementType}`);
    }
  }

  body.identifier = r.long();
  if (version >= 12) {
    body.containsPasswords = r.bool();
  }
  return body;
}

function readFrameState(r: StrictReader, version: number, isTop: boolean, depth: number): FrameState {
  if (depth > MAX_FRAME_DEPTH) {
    r.invalid(r.offset, `frame tree deeper than ${MAX_FRAME_DEPTH}`);
  }

  if (version < 14 && !isTop) r.int();

  const url = r.string16();
  if (version < 19) r.string16();
  const target = r.string16();

  if (version < 15) {
    r.string16();
    r.string16();
    r.string16();
    r.double();
  }

  const x = r.int();
  const y = r.int();

  if (version < 15) {
    r.bool();
    r.int();
  }

  const referrer = r.string16();
  const documentState = r.stringVector('document state');
  const pageScaleFactor = r.double();
  const itemSequenceNumber = r.long();
  const documentSequenceNumber = r.long();

  if (version >= 21 && version < 23) r.long();
  if (version >= 17 && version < 19) r.long();

  const referrerPolicy = version >= 18 ? r.int() : -1;

  if (version >= 20) {
    // pinch viewport scroll offset
    r.double();
    r.double();
  }
  if (version >= 22) r.int();

  const stateObject = r.bool() ? r.string16() : null;

  const httpBody = readHttpBody(r, version);
  const contentType = r.string16();
  if (httpBody) httpBody.contentType = contentType;

  if (version < 14) r.string16();

  // v11 寫入端在子 frame 數量前多寫一組 double 與 bool
  if (version === 11) {
    r.double();
    r.bool();
  }

  const childCount = r.count('child frame');
  const children: FrameState[] = [];
  for (let i = 0; i < childCount; i++) {
    children.push(readFrameState(r, version, false, depth + 1));
  }

  return {
    url,
    target,
    scrollOffset: { x, y },
    referrer,
    documentState,
    formState: parseFormState(documentState),
    pageScaleFactor,
    itemSequenceNumber,
    documentSequenceNumber,
    referrerPolicy,
    stateObject,
    httpBody,
    children,
  };
}

/**
 * 解碼導覽項目的 encoded page state（pickle 版本 11–23）
 *
 * 更新的版本改用其他序列化格式，回傳 UnsupportedVersion 而非猜測內容。
 */
export function decodePageState(bytes: Uint8Array): ParseResult<PageState> {
  const opened = PickleReader.open(bytes);
  if (!opened.ok) return opened;
  const r = new StrictReader(opened.value);

  try {
    const version = r.int();

    if (version === -1) {
      return ok({ version, referencedFiles: [], frame: null, url: r.string() });
    }
    if (version < MIN_PAGE_STATE_VERSION || version > MAX_PAGE_STATE_VERSION) {
      return fail('UnsupportedVersion', 0, `unsupported page state version ${version}`);
    }

    const referencedFiles = version >= 14 ? r.stringVector('referenced file') : [];
    const frame = readFrameState(r, version, true, 0);
    return ok({ version, referencedFiles, frame, url: frame.url });
  } catch (err) {
    if (err instanceof PageStateFault) {
      return { ok: false, error: err.fault };
    }
    throw err;
  }
}
