import type { MalformedTolerance } from '../application/ModelBuilder.js';
import type { HeaderMode, RecordSizeBytes } from '../infrastructure/snss/RecordStream.js';
import type { SessionKind } from '../domain/commands/DecodeOutcome.js';
import type { LogLevel } from '../shared/Logger.js';

/** 解碼器設定 */
export interface DecoderConfig {
  /** 指定 schema 版本；'auto' 使用檔案 header 的版本（沒有 header 時為 1） */
  formatVersion: number | 'auto';
  /** 可接受的 MalformedCommand 數量 */
  malformedCommandTolerance: MalformedTolerance;
  /** 紀錄 size 前綴寬度：桌面版檔案為 2 */
  recordSizeBytes: RecordSizeBytes;
  header: HeaderMode;
  /** 'auto' 依檔名判斷（含 "Tabs" 視為 tabs 檔案） */
  sessionKind: SessionKind | 'auto';
  /** 是否解析導覽項目的 encoded page state */
  decodePageState: boolean;
}

/** 報告輸出設定 */
export interface OutputConfig {
  format: 'json' | 'text';
  /** 文字報告是否列出被 prune 的導覽項目 */
  includePruned: boolean;
}

/** SQLite 匯出設定 */
export interface ExportConfig {
  dbPath: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface RecoveryConfig {
  version: number;
  decoder: DecoderConfig;
  output: OutputConfig;
  export: ExportConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof RecoveryConfig]?: RecoveryConfig[K] extends object ? Partial<RecoveryConfig[K]> : RecoveryConfig[K];
};
