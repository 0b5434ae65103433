/** 1601-01-01 與 1970-01-01 之間的微秒差 */
const WINDOWS_EPOCH_DELTA_US = 11_644_473_600_000_000n;

/** Date 可表示的最大毫秒數（±8.64e15） */
const MAX_DATE_MS = 8_640_000_000_000_000n;

/**
 * 瀏覽器內部時間：自 1601-01-01 UTC 起算的 int64 微秒數
 *
 * 原始值一律保留；毀損或超出 Date 範圍的值 toDate() 回傳 null。
 */
export class ChromeTimestamp {
  private constructor(public readonly microseconds: bigint) {}

  static fromMicroseconds(microseconds: bigint): ChromeTimestamp {
    return new ChromeTimestamp(microseconds);
  }

  /** 0 代表未設定 */
  get isNull(): boolean {
    return this.microseconds === 0n;
  }

  toDate(): Date | null {
    if (this.isNull) return null;
    const ms = (this.microseconds - WINDOWS_EPOCH_DELTA_US) / 1000n;
    if (ms > MAX_DATE_MS || ms < -MAX_DATE_MS) return null;
    return new Date(Number(ms));
  }

  toISOString(): string | null {
    return this.toDate()?.toISOString() ?? null;
  }

  equals(other: ChromeTimestamp | null): boolean {
    return other !== null && this.microseconds === other.microseconds;
  }

  toJSON(): string | null {
    return this.toISOString();
  }

  toString(): string {
    return this.toISOString() ?? `raw:${this.microseconds}`;
  }
}
