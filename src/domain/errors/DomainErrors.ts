export type ErrorClassification = 'degradable' | 'manual';

/**
 * 所有 snss-recover 邊界錯誤的基底類別
 *
 * 解碼核心不拋例外（見 ParseResult 與 Diagnostic）；這些錯誤只在
 * 檔案開啟、設定載入、匯出等外圍流程使用。
 */
export abstract class SessionRecoveryError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Degradable ---

export class ExportFailedError extends SessionRecoveryError {
  readonly classification = 'degradable' as const;
  readonly code = 'EXPORT_FAILED';

  constructor(
    public readonly dbPath: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to export recovered session to "${dbPath}"`, options);
  }
}

// --- Manual ---

export class InvalidSessionHeaderError extends SessionRecoveryError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_HEADER';

  constructor(
    public readonly actualMagic: string,
    options?: ErrorOptions,
  ) {
    super(
      `Invalid header (expected: SNSS (0x534e5353); actual: ${actualMagic || '<empty>'})`,
      options,
    );
  }
}

export class SessionFileUnreadableError extends SessionRecoveryError {
  readonly classification = 'manual' as const;
  readonly code = 'FILE_UNREADABLE';

  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot read session file "${filePath}"`, options);
  }
}

export class ConfigValidationError extends SessionRecoveryError {
  readonly classification = 'manual' as const;
  readonly code = 'CONFIG_INVALID';

  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
  }
}
