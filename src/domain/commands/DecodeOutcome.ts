import type { DecodeFault } from '../../shared/ParseResult.js';
import type { Command } from './Command.js';

/** 檔案種類：Current/Last Session 或 Current/Last Tabs，兩者的 command id 意義不同 */
export type SessionKind = 'session' | 'tabs';

/** 單筆紀錄的解碼結果 */
export type DecodeOutcome =
  | { kind: 'command'; commandId: number; command: Command }
  | { kind: 'unknown'; commandId: number; rawPayload: Uint8Array }
  | { kind: 'malformed'; commandId: number | null; cause: DecodeFault };
