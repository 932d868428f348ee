// ============================================================
// TCP 流读取器
// 缓存 socket 数据并按需取出定长字节，每次读取都有超时
// ============================================================

import type { Socket } from 'node:net';
import { ConnectError, ProtocolError } from '../errors.ts';
import type { ByteSource } from './varint.ts';

type PendingRead = {
  size: number;
  resolve: () => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
};

export class SocketReader implements ByteSource {
  private buffered: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private failure: Error | null = null;

  constructor(socket: Socket, private readonly timeoutMs: number) {
    socket.on('data', (chunk: Buffer) => {
      this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
      this.settle();
    });
    socket.on('error', (err) => {
      this.fail(new ConnectError(err.message, { cause: err }));
    });
    socket.on('close', () => {
      this.fail(new ProtocolError('connection closed before frame completed'));
    });
  }

  async readByte(): Promise<number> {
    const bytes = await this.readBytes(1);
    return bytes[0];
  }

  async readBytes(size: number): Promise<Buffer> {
    if (size < 0) {
      throw new ProtocolError(`invalid read size: ${size}`);
    }
    if (this.buffered.length < size) {
      if (this.failure) throw this.failure;
      await this.waitFor(size);
    }
    return this.take(size);
  }

  private waitFor(size: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new ConnectError(`read timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.pending = { size, resolve, reject, timer };
    });
  }

  private take(size: number): Buffer {
    const out = this.buffered.subarray(0, size);
    this.buffered = this.buffered.subarray(size);
    return out;
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending || this.buffered.length < pending.size) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve();
  }

  private fail(error: Error): void {
    // 首个错误为准；close 总会在 error 之后触发
    if (!this.failure) {
      this.failure = error;
    }
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(this.failure);
  }
}
