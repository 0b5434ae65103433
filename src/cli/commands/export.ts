import type { Command } from 'commander';
import path from 'node:path';
import { DecodeSessionUseCase } from '../../application/DecodeSessionUseCase.js';
import { ExportSessionUseCase } from '../../application/ExportSessionUseCase.js';
import { loadConfig } from '../../config/ConfigLoader.js';
import { DatabaseManager } from '../../infrastructure/sqlite/DatabaseManager.js';
import { SqliteSessionExporter } from '../../infrastructure/sqlite/SqliteSessionExporter.js';
import { Logger } from '../../shared/Logger.js';
import { SessionReportFormatter } from '../formatters/SessionReportFormatter.js';
import type { OutputFormat } from '../formatters/SessionReportFormatter.js';
import { addDecoderOptions, decoderOverrides } from '../options.js';
import type { DecoderCliOptions } from '../options.js';

interface ExportCliOptions extends DecoderCliOptions {
  db?: string;
  format?: OutputFormat;
}

/** 註冊 export 指令：解碼後寫入 SQLite */
export function registerExportCommand(program: Command): void {
  addDecoderOptions(
    program
      .command('export')
      .description('Decode session files and store the recovered model in a SQLite database')
      .argument('<files...>', 'Session or tabs files to export')
      .option('--db <path>', 'Target database (relative to --cwd)')
      .option('--format <format>', 'Summary format: json or text'),
  ).action((files: string[], opts: ExportCliOptions) => {
    const overrides = decoderOverrides(opts);
    if (opts.db !== undefined) overrides.export = { dbPath: opts.db };
    if (opts.format !== undefined) overrides.output = { format: opts.format };

    const cwd = path.resolve(opts.cwd);
    const config = loadConfig(cwd, overrides);
    const logger = new Logger('export', config.logging.level);
    const formatter = new SessionReportFormatter();

    const dbPath = path.resolve(cwd, config.export.dbPath);
    const dbMgr = new DatabaseManager(dbPath, logger.child('DatabaseManager'));

    try {
      const decodeUseCase = new DecodeSessionUseCase(logger.child('DecodeSessionUseCase'));
      const exportUseCase = new ExportSessionUseCase(
        new SqliteSessionExporter(dbMgr.getDb()),
        dbPath,
        logger.child('ExportSessionUseCase'),
      );

      const summaries = files.map((file) => ({
        file,
        ...exportUseCase.export(decodeUseCase.decodeFile(file, config.decoder)),
      }));

      process.stdout.write(formatter.formatObject({ dbPath, files: summaries }, config.output.format) + '\n');
    } finally {
      dbMgr.close();
    }
  });
}
