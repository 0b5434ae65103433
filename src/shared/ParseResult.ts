/**
 * 低階解碼錯誤代碼
 *
 * PickleReader 只產生 TruncatedData 與 InvalidLength；
 * 其餘兩種由巢狀結構（page state）解碼使用。
 */
export type DecodeFaultCode = 'TruncatedData' | 'InvalidLength' | 'InvalidValue' | 'UnsupportedVersion';

/**
 * 解碼失敗的結構化描述
 * offset 為失敗欄位相對於 reader 起點的位元組位置
 */
export interface DecodeFault {
  readonly code: DecodeFaultCode;
  readonly offset: number;
  readonly detail: string;
}

/** 以回傳值表達成功或失敗，不以例外做流程控制 */
export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: DecodeFault };

export function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function fail<T>(code: DecodeFaultCode, offset: number, detail: string): ParseResult<T> {
  return { ok: false, error: { code, offset, detail } };
}
