import type { ByteSourcePort } from '../../domain/ports/ByteSourcePort.js';

/** 記憶體中的位元組來源（測試與已載入的檔案內容） */
export class BufferByteSource implements ByteSourcePort {
  private position = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(length: number): Uint8Array {
    const end = Math.min(this.position + length, this.bytes.length);
    const chunk = this.bytes.subarray(this.position, end);
    this.position = end;
    return chunk;
  }

  rewind(): void {
    this.position = 0;
  }
}
