import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines to stderr at or above the level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new Logger('decode', 'warn');

    logger.info('hidden');
    logger.warn('shown', { offset: 12 });

    expect(write).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'warn', context: 'decode', message: 'shown', offset: 12 });
  });

  it('child loggers extend the context and keep the level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const child = new Logger('cli', 'debug').child('DecodeSessionUseCase');

    child.debug('record');
    const entry: unknown = JSON.parse(String(write.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ context: 'cli:DecodeSessionUseCase', level: 'debug' });
  });

  it('silent writes nothing', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    new Logger('x', 'silent').error('nope');
    expect(write).not.toHaveBeenCalled();
  });
});
