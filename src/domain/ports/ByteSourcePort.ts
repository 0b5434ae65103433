/**
 * 位元組來源
 *
 * RecordStream 只依賴這兩個操作：從目前位置讀 N 個位元組，以及回到開頭。
 */
export interface ByteSourcePort {
  /** 回傳最多 length 個位元組；少於 length 代表輸入已結束 */
  read(length: number): Uint8Array;
  /** 回到來源開頭，供重新列舉 */
  rewind(): void;
}
