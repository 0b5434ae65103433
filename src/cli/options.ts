import type { Command } from 'commander';
import { parseTolerance } from '../config/ConfigLoader.js';
import type { PartialConfig } from '../config/types.js';
import type { DecoderConfig } from '../config/types.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';
import type { LogLevel } from '../shared/Logger.js';

/** decode / records / export 共用的解碼選項 */
export interface DecoderCliOptions {
  cwd: string;
  formatVersion?: string;
  tolerance?: string;
  sizeBytes?: string;
  kind?: string;
  header?: string;
  pageState: boolean;
  logLevel?: string;
}

const KINDS = ['session', 'tabs', 'auto'] as const;
const HEADER_MODES = ['auto', 'required', 'absent'] as const;
const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

function oneOf<T extends string>(allowed: readonly T[], raw: string, label: string): T {
  const match = allowed.find((value) => value === raw);
  if (match === undefined) {
    throw new ConfigValidationError(`Invalid ${label}`, [`${raw} (expected: ${allowed.join(', ')})`]);
  }
  return match;
}

export function parseFormatVersion(raw: string): number | 'auto' {
  if (raw === 'auto') return 'auto';
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigValidationError('Invalid --format-version', [raw]);
  }
  return value;
}

export function parseSizeBytes(raw: string): DecoderConfig['recordSizeBytes'] {
  if (raw === '2') return 2;
  if (raw === '4') return 4;
  throw new ConfigValidationError('Invalid --size-bytes', [`${raw} (expected: 2, 4)`]);
}

export function addDecoderOptions(command: Command): Command {
  return command
    .option('--cwd <path>', 'Directory containing .snssrecover.json', '.')
    .option('--format-version <n>', 'SNSS format version, or "auto" to use the file header')
    .option('--tolerance <n>', 'Malformed commands accepted before stopping, or "unbounded"')
    .option('--size-bytes <n>', 'Width of the record size prefix: 2 or 4')
    .option('--kind <kind>', 'File kind: session, tabs or auto')
    .option('--header <mode>', 'Header handling: auto, required or absent')
    .option('--no-page-state', 'Skip decoding navigation page state')
    .option('--log-level <level>', 'Log level: debug, info, warn, error or silent');
}

/** CLI 參數轉成設定覆蓋值；未指定的選項不覆蓋設定檔 */
export function decoderOverrides(opts: DecoderCliOptions): PartialConfig {
  const decoder: Partial<DecoderConfig> = {};
  if (opts.formatVersion !== undefined) decoder.formatVersion = parseFormatVersion(opts.formatVersion);
  if (opts.tolerance !== undefined) decoder.malformedCommandTolerance = parseTolerance(opts.tolerance);
  if (opts.sizeBytes !== undefined) decoder.recordSizeBytes = parseSizeBytes(opts.sizeBytes);
  if (opts.kind !== undefined) decoder.sessionKind = oneOf(KINDS, opts.kind, '--kind');
  if (opts.header !== undefined) decoder.header = oneOf(HEADER_MODES, opts.header, '--header');
  if (!opts.pageState) decoder.decodePageState = false;

  const overrides: PartialConfig = { decoder };
  if (opts.logLevel !== undefined) {
    const level: LogLevel = oneOf(LOG_LEVELS, opts.logLevel, '--log-level');
    overrides.logging = { level };
  }
  return overrides;
}
