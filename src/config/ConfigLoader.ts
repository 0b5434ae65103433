import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { PartialConfig, RecoveryConfig } from './types.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';

export type { RecoveryConfig, PartialConfig } from './types.js';

const decoderSchema = z.object({
  formatVersion: z.union([z.number().int().positive(), z.literal('auto')]),
  malformedCommandTolerance: z.union([z.number().int().nonnegative(), z.literal('unbounded')]),
  recordSizeBytes: z.union([z.literal(2), z.literal(4)]),
  header: z.enum(['auto', 'required', 'absent']),
  sessionKind: z.enum(['session', 'tabs', 'auto']),
  decodePageState: z.boolean(),
}).strict();

const outputSchema = z.object({
  format: z.enum(['json', 'text']),
  includePruned: z.boolean(),
}).strict();

const exportSchema = z.object({
  dbPath: z.string().min(1),
}).strict();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const loggingSchema = z.object({
  level: logLevelSchema,
}).strict();

const configSchema = z.object({
  version: z.number().int().positive(),
  decoder: decoderSchema,
  output: outputSchema,
  export: exportSchema,
  logging: loggingSchema,
}).strict();

/** .snssrecover.json 允許只寫部分欄位 */
const fileConfigSchema = z.object({
  version: z.number().int().positive().optional(),
  decoder: decoderSchema.partial().optional(),
  output: outputSchema.partial().optional(),
  export: exportSchema.partial().optional(),
  logging: loggingSchema.partial().optional(),
}).strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
}

/** 淺層合併單一區段：undefined 不覆蓋 */
function mergeSection<T extends object>(base: T, partial: Partial<T> | undefined): T {
  const result = { ...base };
  if (!partial) return result;
  for (const key of Object.keys(partial) as (keyof T)[]) {
    const val = partial[key];
    if (val !== undefined) {
      result[key] = val as T[keyof T];
    }
  }
  return result;
}

function merge(base: RecoveryConfig, partial: PartialConfig): RecoveryConfig {
  return {
    version: partial.version ?? base.version,
    decoder: mergeSection(base.decoder, partial.decoder),
    output: mergeSection(base.output, partial.output),
    export: mergeSection(base.export, partial.export),
    logging: mergeSection(base.logging, partial.logging),
  };
}

/** 環境變數覆蓋：SNSS_RECOVER_LOG_LEVEL、SNSS_RECOVER_TOLERANCE */
function envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const overrides: PartialConfig = {};

  const level = env.SNSS_RECOVER_LOG_LEVEL;
  if (level) {
    const parsed = logLevelSchema.safeParse(level);
    if (!parsed.success) {
      throw new ConfigValidationError('Invalid SNSS_RECOVER_LOG_LEVEL', [level]);
    }
    overrides.logging = { level: parsed.data };
  }

  const tolerance = env.SNSS_RECOVER_TOLERANCE;
  if (tolerance) {
    overrides.decoder = { malformedCommandTolerance: parseTolerance(tolerance) };
  }

  return overrides;
}

/** 'unbounded' 或非負整數 */
export function parseTolerance(raw: string): number | 'unbounded' {
  if (raw === 'unbounded') return 'unbounded';
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigValidationError('Tolerance must be a non-negative integer or "unbounded"', [raw]);
  }
  return value;
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigValidationError(`Cannot parse ${configPath}`, [], { cause: err });
  }

  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(`Invalid ${configPath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .snssrecover.json（若存在）並合併到預設值上
 * @param cwd - 尋找設定檔的目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案，CLI 參數由此傳入）
 * @param env - 環境變數（測試時可注入）
 */
export function loadConfig(
  cwd: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): RecoveryConfig {
  const fileConfig = readConfigFile(path.join(cwd, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < 環境變數 < overrides
  let merged = merge(DEFAULT_CONFIG, fileConfig);
  merged = merge(merged, envOverrides(env));
  if (overrides) {
    merged = merge(merged, overrides);
  }

  const validated = configSchema.safeParse(merged);
  if (!validated.success) {
    throw new ConfigValidationError('Invalid configuration', formatIssues(validated.error));
  }
  return merged;
}
