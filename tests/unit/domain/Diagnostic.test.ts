import { describe, it, expect } from 'vitest';
import { describeDiagnostic } from '../../../src/domain/commands/Diagnostic.js';

describe('describeDiagnostic', () => {
  it('describes truncated records', () => {
    expect(describeDiagnostic({ kind: 'TruncatedRecord', offset: 40, declaredSize: 100, available: 7 }))
      .toBe('@40 truncated record: declared 100 bytes, 7 available');
    expect(describeDiagnostic({ kind: 'TruncatedRecord', offset: 40, declaredSize: null, available: 2 }))
      .toBe('@40 truncated record: size prefix incomplete (2 bytes left)');
  });

  it('describes unknown commands', () => {
    expect(describeDiagnostic({ kind: 'UnknownCommand', offset: 8, commandId: 250, rawPayload: Uint8Array.of(1, 2) }))
      .toBe('@8 unknown command id 250 (2 payload bytes)');
  });

  it('describes malformed commands', () => {
    expect(describeDiagnostic({
      kind: 'MalformedCommand',
      offset: 16,
      commandId: null,
      cause: { code: 'TruncatedData', offset: 0, detail: 'empty record has no command id' },
    })).toBe('@16 malformed command id ?: TruncatedData at +0 (empty record has no command id)');
  });
});
