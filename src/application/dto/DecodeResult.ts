import type { SessionKind } from '../../domain/commands/DecodeOutcome.js';
import type { SessionModel } from '../../domain/model/SessionModel.js';
import type { SessionFileHeader } from '../../infrastructure/snss/RecordStream.js';
import type { FinalizationReason } from '../ModelBuilder.js';

/** 解碼統計 */
export interface DecodeStats {
  recordsRead: number;
  commandsApplied: number;
  unknownCommands: number;
  malformedCommands: number;
  bytesConsumed: number;
  durationMs: number;
}

/** 單一檔案的解碼結果；model 已 finalize */
export interface DecodeResult {
  /** 來源描述（檔案路徑或 '<memory>'） */
  source: string;
  header: SessionFileHeader | null;
  formatVersion: number;
  sessionKind: SessionKind;
  finalization: FinalizationReason;
  model: SessionModel;
  stats: DecodeStats;
}
