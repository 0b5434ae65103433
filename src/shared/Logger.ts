export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** 結構化 JSON logger，一律寫到 stderr，stdout 保留給報告輸出 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = 'info',
  ) {}

  private readonly levels: Record<LogLevel, number> = {
    debug: 0, info: 1, warn: 2, error: 3, silent: 4,
  };

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.minLevel];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  /** 同層級的子 logger，context 以 ':' 串接 */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.minLevel);
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
