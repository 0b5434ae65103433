import type { Command } from 'commander';
import path from 'node:path';
import { detectSessionKind, resolveFormatVersion } from '../../application/DecodeSessionUseCase.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { CommandDecoder } from '../../infrastructure/snss/CommandDecoder.js';
import { RecordStream } from '../../infrastructure/snss/RecordStream.js';
import { FileByteSource } from '../../infrastructure/source/FileByteSource.js';
import { SessionReportFormatter } from '../formatters/SessionReportFormatter.js';
import type { OutputFormat } from '../formatters/SessionReportFormatter.js';
import { addDecoderOptions, decoderOverrides } from '../options.js';
import type { DecoderCliOptions } from '../options.js';

interface RecordsCliOptions extends DecoderCliOptions {
  format?: OutputFormat;
}

export interface RecordListing {
  offset: number;
  size: number | null;
  commandId: number | null;
  status: 'command' | 'unknown' | 'malformed' | 'truncated';
  detail: string;
}

/** 註冊 records 指令：逐筆列出紀錄，不建立 model（檢查毀損檔案用） */
export function registerRecordsCommand(program: Command): void {
  addDecoderOptions(
    program
      .command('records')
      .description('List the raw records of a session file')
      .argument('<file>', 'Session or tabs file')
      .option('--format <format>', 'Output format: json or text'),
  ).action((file: string, opts: RecordsCliOptions) => {
    const overrides = decoderOverrides(opts);
    if (opts.format !== undefined) overrides.output = { format: opts.format };
    const config = loadConfig(path.resolve(opts.cwd), overrides);
    const formatter = new SessionReportFormatter();

    const source = new FileByteSource(file);
    try {
      const stream = new RecordStream(source, {
        recordSizeBytes: config.decoder.recordSizeBytes,
        header: config.decoder.header,
      });
      const decoder = new CommandDecoder({
        formatVersion: resolveFormatVersion(config.decoder.formatVersion, stream.header),
        sessionKind: config.decoder.sessionKind === 'auto' ? detectSessionKind(file) : config.decoder.sessionKind,
        decodePageState: false,
      });

      const listing: RecordListing[] = [];
      for (const item of stream) {
        if (item.kind === 'end') break;
        if (item.kind === 'truncated') {
          listing.push({
            offset: item.offset,
            size: item.declaredSize,
            commandId: null,
            status: 'truncated',
            detail: `${item.available} bytes available`,
          });
          break;
        }

        const outcome = decoder.decode(item);
        listing.push({
          offset: item.offset,
          size: item.size,
          commandId: outcome.commandId,
          status: outcome.kind,
          detail: outcome.kind === 'command'
            ? outcome.command.kind
            : outcome.kind === 'malformed'
              ? `${outcome.cause.code}: ${outcome.cause.detail}`
              : `${outcome.rawPayload.length} payload bytes`,
        });
      }

      if (config.output.format === 'json') {
        process.stdout.write(formatter.formatObject(listing, 'json') + '\n');
      } else {
        const lines = listing.map((r) =>
          `@${r.offset}\tsize=${r.size ?? '?'}\tid=${r.commandId ?? '-'}\t${r.status}\t${r.detail}`);
        process.stdout.write(lines.join('\n') + '\n');
      }
    } finally {
      source.close();
    }
  });
}
