import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DecodeSessionUseCase } from '../../src/application/DecodeSessionUseCase.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { SessionFileUnreadableError } from '../../src/domain/errors/DomainErrors.js';
import { FileByteSource } from '../../src/infrastructure/source/FileByteSource.js';
import { Logger } from '../../src/shared/Logger.js';
import { sessionCommands as cmd, sessionFile, tabsCommands } from '../helpers/SnssFixtureBuilder.js';

describe('decoding files from disk', () => {
  const useCase = new DecodeSessionUseCase(new Logger('test', 'silent'));
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snss-file-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('decodes a session file and detects its kind from the name', () => {
    const sessionPath = path.join(tmpDir, 'Current Session');
    fs.writeFileSync(sessionPath, sessionFile([cmd.setTabWindow(2, 20), cmd.setActiveWindow(2)]));

    const result = useCase.decodeFile(sessionPath, { ...DEFAULT_CONFIG.decoder });
    expect(result.source).toBe(sessionPath);
    expect(result.sessionKind).toBe('session');
    expect(result.model.activeWindowId).toBe(2);
    expect(result.model.getWindow(2)?.tabIds).toEqual([20]);
  });

  it('decodes a tabs file', () => {
    const tabsPath = path.join(tmpDir, 'Current Tabs');
    fs.writeFileSync(tabsPath, sessionFile([tabsCommands.updateTabNavigation({ tabId: 3, index: 0, url: 'http://t.test/' })]));

    const result = useCase.decodeFile(tabsPath, { ...DEFAULT_CONFIG.decoder });
    expect(result.sessionKind).toBe('tabs');
    expect([...result.model.navigationEntries(3)].map((e) => e.url)).toEqual(['http://t.test/']);
  });

  it('raises SessionFileUnreadableError for a missing file', () => {
    expect(() => useCase.decodeFile(path.join(tmpDir, 'missing'), { ...DEFAULT_CONFIG.decoder }))
      .toThrow(SessionFileUnreadableError);
  });
});

describe('FileByteSource', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'snss-source-'));
    filePath = path.join(tmpDir, 'bytes');
    fs.writeFileSync(filePath, Uint8Array.of(1, 2, 3, 4, 5));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads sequentially and returns short reads at the end', () => {
    const source = new FileByteSource(filePath);
    expect(source.byteLength).toBe(5);
    expect([...source.read(3)]).toEqual([1, 2, 3]);
    expect([...source.read(1_000_000)]).toEqual([4, 5]);
    expect(source.read(4)).toHaveLength(0);

    source.rewind();
    expect([...source.read(2)]).toEqual([1, 2]);
    source.close();
  });

  it('refuses reads after close', () => {
    const source = new FileByteSource(filePath);
    source.close();
    source.close();
    expect(() => source.read(1)).toThrow('is closed');
  });
});
