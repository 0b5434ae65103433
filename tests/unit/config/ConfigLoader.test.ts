import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, parseTolerance } from '../../../src/config/ConfigLoader.js';
import { CONFIG_FILE_NAME } from '../../../src/config/defaults.js';
import { ConfigValidationError } from '../../../src/domain/errors/DomainErrors.js';

describe('ConfigLoader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snss-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(tmpDir, CONFIG_FILE_NAME), content);
  }

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path', undefined, {});
    expect(config.decoder.formatVersion).toBe('auto');
    expect(config.decoder.malformedCommandTolerance).toBe('unbounded');
    expect(config.decoder.recordSizeBytes).toBe(4);
    expect(config.decoder.decodePageState).toBe(true);
    expect(config.output.format).toBe('text');
    expect(config.logging.level).toBe('warn');
  });

  it('should merge partial config over defaults', () => {
    const config = loadConfig('/nonexistent/path', { decoder: { recordSizeBytes: 2 } }, {});
    expect(config.decoder.recordSizeBytes).toBe(2);
    // 其他欄位仍用 defaults
    expect(config.decoder.header).toBe('auto');
  });

  it('should read the config file', () => {
    writeConfig(JSON.stringify({ decoder: { sessionKind: 'tabs' }, export: { dbPath: 'out.db' } }));
    const config = loadConfig(tmpDir, undefined, {});
    expect(config.decoder.sessionKind).toBe('tabs');
    expect(config.export.dbPath).toBe('out.db');
    expect(config.output.includePruned).toBe(false);
  });

  it('should apply file < env < overrides', () => {
    writeConfig(JSON.stringify({ decoder: { malformedCommandTolerance: 1 }, logging: { level: 'info' } }));

    const fromEnv = loadConfig(tmpDir, undefined, { SNSS_RECOVER_TOLERANCE: '5', SNSS_RECOVER_LOG_LEVEL: 'debug' });
    expect(fromEnv.decoder.malformedCommandTolerance).toBe(5);
    expect(fromEnv.logging.level).toBe('debug');

    const overridden = loadConfig(tmpDir, { decoder: { malformedCommandTolerance: 0 } }, { SNSS_RECOVER_TOLERANCE: '5' });
    expect(overridden.decoder.malformedCommandTolerance).toBe(0);
    expect(overridden.logging.level).toBe('info');
  });

  it('should reject unknown keys in the config file', () => {
    writeConfig(JSON.stringify({ decoder: { recordSize: 2 } }));
    expect(() => loadConfig(tmpDir, undefined, {})).toThrow(ConfigValidationError);
  });

  it('should reject invalid values', () => {
    writeConfig(JSON.stringify({ decoder: { recordSizeBytes: 3 } }));
    expect(() => loadConfig(tmpDir, undefined, {})).toThrow(/decoder\.recordSizeBytes/);
  });

  it('should reject unparsable JSON', () => {
    writeConfig('{ not json');
    expect(() => loadConfig(tmpDir, undefined, {})).toThrow(`Cannot parse ${path.join(tmpDir, CONFIG_FILE_NAME)}`);
  });

  it('should reject an invalid log level from the environment', () => {
    expect(() => loadConfig(tmpDir, undefined, { SNSS_RECOVER_LOG_LEVEL: 'loud' }))
      .toThrow('Invalid SNSS_RECOVER_LOG_LEVEL: loud');
  });
});

describe('parseTolerance', () => {
  it('accepts unbounded and non-negative integers', () => {
    expect(parseTolerance('unbounded')).toBe('unbounded');
    expect(parseTolerance('0')).toBe(0);
    expect(parseTolerance('12')).toBe(12);
  });

  it('rejects other values', () => {
    expect(() => parseTolerance('-1')).toThrow(ConfigValidationError);
    expect(() => parseTolerance('1.5')).toThrow('Tolerance must be a non-negative integer or "unbounded": 1.5');
  });
});
