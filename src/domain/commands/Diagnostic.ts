import type { DecodeFault } from '../../shared/ParseResult.js';

/**
 * 解碼過程中略過的紀錄
 *
 * offset 一律為該紀錄 size 前綴在檔案中的位元組位置。
 */
export type Diagnostic =
  | {
      kind: 'TruncatedRecord';
      offset: number;
      /** size 前綴本身不完整時為 null */
      declaredSize: number | null;
      available: number;
    }
  | {
      kind: 'UnknownCommand';
      offset: number;
      commandId: number;
      rawPayload: Uint8Array;
    }
  | {
      kind: 'MalformedCommand';
      offset: number;
      /** payload 為空、連 command id 都讀不到時為 null */
      commandId: number | null;
      cause: DecodeFault;
    };

export type DiagnosticKind = Diagnostic['kind'];

/** 人類可讀的一行描述 */
export function describeDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.kind) {
    case 'TruncatedRecord':
      return diagnostic.declaredSize === null
        ? `@${diagnostic.offset} truncated record: size prefix incomplete (${diagnostic.available} bytes left)`
        : `@${diagnostic.offset} truncated record: declared ${diagnostic.declaredSize} bytes, ${diagnostic.available} available`;
    case 'UnknownCommand':
      return `@${diagnostic.offset} unknown command id ${diagnostic.commandId} (${diagnostic.rawPayload.length} payload bytes)`;
    case 'MalformedCommand':
      return `@${diagnostic.offset} malformed command id ${diagnostic.commandId ?? '?'}: ` +
        `${diagnostic.cause.code} at +${diagnostic.cause.offset} (${diagnostic.cause.detail})`;
  }
}
