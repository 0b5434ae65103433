import path from 'node:path';
import type { ByteSourcePort } from '../domain/ports/ByteSourcePort.js';
import type { SessionKind } from '../domain/commands/DecodeOutcome.js';
import type { DecoderConfig } from '../config/types.js';
import { CommandDecoder } from '../infrastructure/snss/CommandDecoder.js';
import { MIN_FORMAT_VERSION } from '../infrastructure/snss/commandSchemas.js';
import { RecordStream } from '../infrastructure/snss/RecordStream.js';
import type { SessionFileHeader } from '../infrastructure/snss/RecordStream.js';
import { FileByteSource } from '../infrastructure/source/FileByteSource.js';
import { Logger } from '../shared/Logger.js';
import { ModelBuilder } from './ModelBuilder.js';
import type { DecodeResult } from './dto/DecodeResult.js';

/** 依檔名判斷種類："Current Tabs"、"Last Tabs"、"Tabs_1339..." 為 tabs 檔案 */
export function detectSessionKind(filePath: string): SessionKind {
  return /tabs/i.test(path.basename(filePath)) ? 'tabs' : 'session';
}

/** 明確指定的版本優先；'auto' 使用 header，沒有 header 時退回最舊版本 */
export function resolveFormatVersion(
  requested: DecoderConfig['formatVersion'],
  header: SessionFileHeader | null,
): number {
  if (requested !== 'auto') return requested;
  return header?.version ?? MIN_FORMAT_VERSION;
}

/**
 * 解碼用例：bytes → RecordStream → CommandDecoder → ModelBuilder → SessionModel
 *
 * 單一檔案內嚴格循序；不同檔案各自使用獨立的 model，可由呼叫端平行處理。
 * 除了 header 模式為 required 時的 InvalidSessionHeaderError，不會拋出資料錯誤。
 */
export class DecodeSessionUseCase {
  constructor(private readonly logger: Logger = new Logger('DecodeSessionUseCase')) {}

  decode(
    source: ByteSourcePort,
    config: DecoderConfig,
    label: string = '<memory>',
  ): DecodeResult {
    const startedAt = Date.now();
    const stream = new RecordStream(source, {
      recordSizeBytes: config.recordSizeBytes,
      header: config.header,
    });

    const formatVersion = resolveFormatVersion(config.formatVersion, stream.header);
    const sessionKind: SessionKind = config.sessionKind === 'auto'
      ? detectSessionKind(label)
      : config.sessionKind;

    const decoder = new CommandDecoder({
      formatVersion,
      sessionKind,
      decodePageState: config.decodePageState,
    });
    const builder = new ModelBuilder({ malformedCommandTolerance: config.malformedCommandTolerance });

    let recordsRead = 0;
    let unknownCommands = 0;
    let malformedCommands = 0;

    for (;;) {
      const item = stream.next();

      if (item.kind === 'end') {
        builder.finalize('EndOfStream');
        break;
      }
      if (item.kind === 'truncated') {
        this.logger.debug('Truncated record', {
          source: label,
          offset: item.offset,
          declaredSize: item.declaredSize,
          available: item.available,
        });
        builder.truncated(item.offset, item.declaredSize, item.available);
        break;
      }

      recordsRead++;
      const outcome = decoder.decode(item);
      if (outcome.kind === 'unknown') {
        unknownCommands++;
        this.logger.debug('Unknown command', { source: label, offset: item.offset, commandId: outcome.commandId });
      } else if (outcome.kind === 'malformed') {
        malformedCommands++;
        this.logger.debug('Malformed command', {
          source: label,
          offset: item.offset,
          commandId: outcome.commandId,
          cause: outcome.cause,
        });
      }

      if (!builder.consume(outcome, item.offset)) {
        this.logger.warn('Malformed command tolerance exceeded, finalizing early', {
          source: label,
          offset: item.offset,
          tolerance: config.malformedCommandTolerance,
        });
        break;
      }
    }

    const finalization = builder.finalization ?? 'EndOfStream';
    const result: DecodeResult = {
      source: label,
      header: stream.header,
      formatVersion,
      sessionKind,
      finalization,
      model: builder.model,
      stats: {
        recordsRead,
        commandsApplied: builder.commandsApplied,
        unknownCommands,
        malformedCommands,
        bytesConsumed: stream.bytesConsumed,
        durationMs: Date.now() - startedAt,
      },
    };

    this.logger.info('Session decoded', {
      source: label,
      formatVersion,
      sessionKind,
      finalization,
      windows: result.model.windowCount,
      tabs: result.model.tabCount,
      diagnostics: result.model.diagnosticCount,
      ...result.stats,
    });

    return result;
  }

  /** 開檔、解碼、關檔 */
  decodeFile(filePath: string, config: DecoderConfig): DecodeResult {
    const source = new FileByteSource(filePath);
    try {
      return this.decode(source, config, filePath);
    } finally {
      source.close();
    }
  }
}
