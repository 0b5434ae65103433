import fs from 'node:fs';
import type { ByteSourcePort } from '../../domain/ports/ByteSourcePort.js';
import { SessionFileUnreadableError } from '../../domain/errors/DomainErrors.js';

/**
 * 以 positional read 讀取檔案的位元組來源
 *
 * 每次只配置實際剩餘的位元組數，毀損的 size 前綴不會造成巨大配置。
 */
export class FileByteSource implements ByteSourcePort {
  private readonly fd: number;
  private readonly size: number;
  private position = 0;
  private closed = false;

  constructor(public readonly filePath: string) {
    try {
      this.fd = fs.openSync(filePath, 'r');
      this.size = fs.fstatSync(this.fd).size;
    } catch (err) {
      throw new SessionFileUnreadableError(filePath, { cause: err });
    }
  }

  get byteLength(): number {
    return this.size;
  }

  read(length: number): Uint8Array {
    if (this.closed) {
      throw new Error(`FileByteSource for "${this.filePath}" is closed`);
    }
    const wanted = Math.max(0, Math.min(length, this.size - this.position));
    if (wanted === 0) return new Uint8Array(0);

    const chunk = Buffer.alloc(wanted);
    const bytesRead = fs.readSync(this.fd, chunk, 0, wanted, this.position);
    this.position += bytesRead;
    return new Uint8Array(chunk.buffer, chunk.byteOffset, bytesRead);
  }

  rewind(): void {
    this.position = 0;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    fs.closeSync(this.fd);
  }
}
