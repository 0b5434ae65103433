#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerDecodeCommand } from './commands/decode.js';
import { registerRecordsCommand } from './commands/records.js';
import { registerExportCommand } from './commands/export.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('snss-recover')
  .description('Recover windows, tabs and navigation history from browser session (SNSS) files')
  .version(version);

registerDecodeCommand(program);
registerRecordsCommand(program);
registerExportCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        process.exit(0);
      }
      process.exit(err.exitCode);
    }
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
