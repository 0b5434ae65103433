import type { DecodeResult } from '../../application/dto/DecodeResult.js';

/** 匯出摘要 */
export interface ExportSummary {
  sourceFileId: number;
  windows: number;
  tabs: number;
  navigations: number;
  diagnostics: number;
}

/** 將 finalize 後的解碼結果寫到外部儲存（唯讀使用 model） */
export interface SessionExportPort {
  exportResult(result: DecodeResult): ExportSummary;
}
