import type { Command } from 'commander';
import path from 'node:path';
import { DecodeSessionUseCase } from '../../application/DecodeSessionUseCase.js';
import type { DecodeResult } from '../../application/dto/DecodeResult.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import type { OutputConfig } from '../../config/types.js';
import { SessionRecoveryError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';
import { SessionReportFormatter } from '../formatters/SessionReportFormatter.js';
import type { OutputFormat } from '../formatters/SessionReportFormatter.js';
import { addDecoderOptions, decoderOverrides } from '../options.js';
import type { DecoderCliOptions } from '../options.js';

interface DecodeCliOptions extends DecoderCliOptions {
  format?: OutputFormat;
  includePruned?: boolean;
}

/** 註冊 decode 指令：解碼一或多個檔案並輸出報告 */
export function registerDecodeCommand(program: Command): void {
  addDecoderOptions(
    program
      .command('decode')
      .description('Decode session files and print the recovered windows, tabs and history')
      .argument('<files...>', 'Session or tabs files to decode')
      .option('--format <format>', 'Output format: json or text')
      .option('--include-pruned', 'Also list navigation entries removed by pruning'),
  ).action((files: string[], opts: DecodeCliOptions) => {
    const output: Partial<OutputConfig> = {};
    if (opts.format !== undefined) output.format = opts.format;
    if (opts.includePruned) output.includePruned = true;
    const overrides = { ...decoderOverrides(opts), output };

    const config = loadConfig(path.resolve(opts.cwd), overrides);
    const logger = new Logger('decode', config.logging.level);
    const useCase = new DecodeSessionUseCase(logger.child('DecodeSessionUseCase'));
    const formatter = new SessionReportFormatter({ includePruned: config.output.includePruned });

    // 各檔案各自解碼；單一檔案失敗不影響其他檔案
    const results: DecodeResult[] = [];
    for (const file of files) {
      try {
        results.push(useCase.decodeFile(file, config.decoder));
      } catch (err) {
        if (!(err instanceof SessionRecoveryError)) throw err;
        logger.error('Decode failed', { file, code: err.code, message: err.message });
        process.stderr.write(`Error: ${err.message}\n`);
        process.exitCode = 1;
      }
    }

    if (results.length > 0) {
      process.stdout.write(formatter.formatResults(results, config.output.format) + '\n');
    }
  });
}
