// ============================================================
// 二进制协议基础编解码
// varint：每字节 7 位数据，高位为续位标志，低位组在前
// 字符串：varint 字节长度 + UTF-8 内容，无结束符
// ============================================================

import { ProtocolError } from '../errors.ts';

const SEGMENT_BITS = 0x7f;
const CONTINUE_BIT = 0x80;
const MAX_VARINT_GROUPS = 5;

/** 按顺序读取字节的数据源（内存缓冲或 TCP 流） */
export interface ByteSource {
  readByte(): Promise<number>;
  readBytes(size: number): Promise<Buffer>;
}

/** 可增长的字节写入器 */
export class PacketWriter {
  private bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  writeByte(value: number): this {
    this.bytes.push(value & 0xff);
    return this;
  }

  writeBytes(data: Uint8Array): this {
    for (const byte of data) {
      this.bytes.push(byte);
    }
    return this;
  }

  writeUInt16BE(value: number): this {
    this.bytes.push((value >>> 8) & 0xff, value & 0xff);
    return this;
  }

  writeVarInt(value: number): this {
    writeVarInt(this, value);
    return this;
  }

  writeString(value: string): this {
    writeString(this, value);
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }
}

/** 内存中的 ByteSource，数据不足时抛出 ProtocolError */
export class BufferReader implements ByteSource {
  private offset = 0;

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  async readByte(): Promise<number> {
    return this.readByteSync();
  }

  async readBytes(size: number): Promise<Buffer> {
    return this.readBytesSync(size);
  }

  readByteSync(): number {
    if (this.offset >= this.buffer.length) {
      throw new ProtocolError('truncated frame');
    }
    const value = this.buffer[this.offset];
    this.offset += 1;
    return value;
  }

  readBytesSync(size: number): Buffer {
    if (size < 0 || this.offset + size > this.buffer.length) {
      throw new ProtocolError('truncated frame');
    }
    const slice = this.buffer.subarray(this.offset, this.offset + size);
    this.offset += size;
    return slice;
  }
}

export function writeVarInt(out: PacketWriter, value: number): void {
  let remaining = value >>> 0;
  while ((remaining & ~SEGMENT_BITS) !== 0) {
    out.writeByte((remaining & SEGMENT_BITS) | CONTINUE_BIT);
    remaining >>>= 7;
  }
  out.writeByte(remaining);
}

export async function readVarInt(source: ByteSource): Promise<number> {
  let value = 0;
  for (let group = 0; group < MAX_VARINT_GROUPS; group += 1) {
    const byte = await source.readByte();
    value |= (byte & SEGMENT_BITS) << (7 * group);
    if ((byte & CONTINUE_BIT) === 0) {
      return value;
    }
  }
  throw new ProtocolError('varint too long');
}

export function writeString(out: PacketWriter, value: string): void {
  const bytes = Buffer.from(value, 'utf8');
  writeVarInt(out, bytes.length);
  out.writeBytes(bytes);
}

export async function readString(source: ByteSource): Promise<string> {
  const length = await readVarInt(source);
  if (length < 0) {
    throw new ProtocolError(`invalid string length: ${length}`);
  }
  const bytes = await source.readBytes(length);
  return bytes.toString('utf8');
}

/** 在负载前加上 varint 长度前缀 */
export function framePacket(payload: Buffer): Buffer {
  const frame = new PacketWriter();
  frame.writeVarInt(payload.length);
  frame.writeBytes(payload);
  return frame.toBuffer();
}
