/** 表單欄位：同一 (name, type) 可能有多個值 */
export interface FormField {
  name: string;
  type: string;
  values: string[];
}

/** 以 form key 分組的 Blink serialized form state */
export interface FormState {
  formKey: string;
  fields: FormField[];
}

/** HTTP POST body 摘要 */
export interface HttpBody {
  /** 內嵌資料元素 */
  data: Uint8Array[];
  /** 檔案上傳範圍 */
  fileRanges: Array<{ path: string | null; start: bigint; length: bigint; modificationTime: number }>;
  blobUuids: string[];
  identifier: bigint;
  containsPasswords: boolean;
  contentType: string | null;
}

/** 單一 frame 的狀態（含子 frame） */
export interface FrameState {
  url: string | null;
  target: string | null;
  scrollOffset: { x: number; y: number };
  referrer: string | null;
  documentState: string[];
  /** 從 documentState 解析出的表單內容（無或無法解析時為空陣列） */
  formState: FormState[];
  pageScaleFactor: number;
  itemSequenceNumber: bigint;
  documentSequenceNumber: bigint;
  /** 舊版本無此欄位時為 -1 */
  referrerPolicy: number;
  stateObject: string | null;
  httpBody: HttpBody | null;
  children: FrameState[];
}

/**
 * 導覽項目的 encoded page state
 *
 * version 為 -1 時只有 url（舊格式）；frame 為 null。
 */
export interface PageState {
  version: number;
  referencedFiles: string[];
  frame: FrameState | null;
  url: string | null;
}
