import type { RecoveryConfig } from './types.js';

export const CONFIG_FILE_NAME = '.snssrecover.json';

export const DEFAULT_CONFIG: RecoveryConfig = {
  version: 1,
  decoder: {
    formatVersion: 'auto',
    malformedCommandTolerance: 'unbounded',
    recordSizeBytes: 4,
    header: 'auto',
    sessionKind: 'auto',
    decodePageState: true,
  },
  output: {
    format: 'text',
    includePruned: false,
  },
  export: {
    dbPath: 'recovered-session.db',
  },
  logging: {
    level: 'warn',
  },
};
