import type { DecodeOutcome, SessionKind } from '../../domain/commands/DecodeOutcome.js';
import { PickleReader } from '../pickle/PickleReader.js';
import { DecodedFields, FIELD_READERS } from './CommandSchema.js';
import type { BuildContext, FieldValue } from './CommandSchema.js';
import { findCommandSchema } from './commandSchemas.js';
import type { RawRecord } from './RecordStream.js';

export interface CommandDecoderOptions {
  formatVersion: number;
  sessionKind: SessionKind;
  decodePageState: boolean;
}

/**
 * 把紀錄 payload 解讀為 [command_id:uint8][欄位...]
 *
 * - 查不到 schema → unknown（保留 command id 之後的原始 payload）
 * - 任一欄位讀取失敗 → malformed，cause 的 offset 相對於 command id 之後的位置
 * - 讀完 schema 宣告的欄位即停止，剩餘位元組忽略
 * - PickleHeader 之後的欄位只在 pickle 宣告的長度內讀取
 */
export class CommandDecoder {
  private readonly context: BuildContext;

  constructor(private readonly options: CommandDecoderOptions) {
    this.context = { decodePageState: options.decodePageState };
  }

  get formatVersion(): number {
    return this.options.formatVersion;
  }

  get sessionKind(): SessionKind {
    return this.options.sessionKind;
  }

  decode(record: Pick<RawRecord, 'payload'>): DecodeOutcome {
    const { payload } = record;
    if (payload.length === 0) {
      return {
        kind: 'malformed',
        commandId: null,
        cause: { code: 'TruncatedData', offset: 0, detail: 'empty record has no command id' },
      };
    }

    const commandId = payload[0];
    const body = payload.subarray(1);
    const schema = findCommandSchema(this.options.sessionKind, commandId, this.options.formatVersion);
    if (!schema) {
      return { kind: 'unknown', commandId, rawPayload: body.slice() };
    }

    let reader = new PickleReader(body);
    const values = new Map<string, FieldValue>();

    for (const field of schema.fields) {
      // 舊寫入端沒有的結尾欄位：payload（或 pickle）剛好用完就停
      if (field.optional && reader.remaining === 0) break;

      const result = FIELD_READERS[field.type](reader);
      if (!result.ok) {
        return {
          kind: 'malformed',
          commandId,
          cause: { ...result.error, detail: `${schema.name}.${field.name}: ${result.error.detail}` },
        };
      }
      values.set(field.name, result.value);
      if (field.type === 'PickleHeader' && typeof result.value === 'number') {
        reader = reader.bounded(reader.offset + result.value);
      }
    }

    return { kind: 'command', commandId, command: schema.build(new DecodedFields(values), this.context) };
  }
}
