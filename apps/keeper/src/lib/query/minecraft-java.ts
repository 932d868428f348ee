// ============================================================
// Minecraft Java 版状态查询（Server List Ping）
// 握手 -> 状态请求 -> 读取 JSON 文本；任一步失败走 HTTP 兜底
// ============================================================

import type { Socket } from 'node:net';
import { PROBE_UNAVAILABLE, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { SocketReader } from '../codec/socket-reader.ts';
import { PacketWriter, framePacket, readString, readVarInt } from '../codec/varint.ts';
import { describeError } from '../errors.ts';
import { queryMcStatusApi } from './mcstatus-fallback.ts';
import { DEFAULT_PROBE_TIMEOUT_MS, openTcpConnection, writeToSocket } from './transport.ts';
import type { GameServerProbe, ProbeOptions, StatusFallback } from './types.ts';

/** 1.16.5+ 的协议号；状态查询不校验该值 */
export const SLP_PROTOCOL_VERSION = 754;
const HANDSHAKE_PACKET_ID = 0x00;
const NEXT_STATE_STATUS = 1;
const STATUS_REQUEST = Buffer.from([0x01, 0x00]);

const PLAYERS_OBJECT_PATTERN = /"players":\{[^}]*"online":(\d+)[^}]*"max":(\d+)/;
const LOOSE_PLAYERS_PATTERN = /"online":(\d+).*?"max":(\d+)/s;

export type MinecraftJavaProbeOptions = ProbeOptions & {
  protocolVersion?: number;
  fallback?: StatusFallback;
};

export function buildHandshakePacket(target: ProbeTarget, protocolVersion = SLP_PROTOCOL_VERSION): Buffer {
  const payload = new PacketWriter()
    .writeByte(HANDSHAKE_PACKET_ID)
    .writeVarInt(protocolVersion)
    .writeString(target.host)
    .writeUInt16BE(target.port)
    .writeVarInt(NEXT_STATE_STATUS)
    .toBuffer();
  return framePacket(payload);
}

export function buildStatusRequestPacket(): Buffer {
  return Buffer.from(STATUS_REQUEST);
}

/**
 * 宽松匹配状态 JSON 中的 online/max，不做结构化解析。
 * 两个匹配器都要求 online 出现在 max 之前；字段顺序相反的回包（如 `{"max":20,"online":3}`）
 * 得到 "N/A"，且直连已成功时不再走 HTTP 兜底。
 */
export function parseStatusPlayers(json: string): ProbeResult {
  const match = PLAYERS_OBJECT_PATTERN.exec(json) ?? LOOSE_PLAYERS_PATTERN.exec(json);
  if (!match) return PROBE_UNAVAILABLE;
  return `${match[1]}/${match[2]}`;
}

export class MinecraftJavaProbe implements GameServerProbe {
  private socket: Socket | null = null;
  private reader: SocketReader | null = null;
  private target: ProbeTarget | null = null;
  private disposed = false;
  private readonly timeoutMs: number;
  private readonly protocolVersion: number;
  private readonly fallback: StatusFallback;
  private readonly debug: boolean;

  constructor(options?: MinecraftJavaProbeOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.protocolVersion = options?.protocolVersion ?? SLP_PROTOCOL_VERSION;
    this.debug = options?.debug ?? false;
    this.fallback = options?.fallback ?? ((target) => queryMcStatusApi(target, { timeoutMs: this.timeoutMs }));
  }

  async connect(target: ProbeTarget): Promise<void> {
    this.target = target;
    console.log(`[MinecraftJava] 连接 ${target.host}:${target.port}`);
    this.socket = await openTcpConnection(target, this.timeoutMs);
    this.reader = new SocketReader(this.socket, this.timeoutMs);
  }

  async query(): Promise<ProbeResult> {
    const target = this.target;
    if (!target) {
      console.warn('[MinecraftJava] 未调用 connect，跳过查询');
      return PROBE_UNAVAILABLE;
    }

    try {
      const response = await this.exchangeStatus(target);
      if (this.debug) {
        console.log(`[MinecraftJava] 原始响应 ${target.host}:${target.port}: ${response}`);
      }
      const result = parseStatusPlayers(response);
      console.log(`[MinecraftJava] 直连查询成功: ${result} (${target.host}:${target.port})`);
      return result;
    } catch (err) {
      console.warn(`[MinecraftJava] 直连查询失败 ${target.host}:${target.port}: ${describeError(err)}，尝试兜底`);
    }

    try {
      return await this.fallback(target);
    } catch (err) {
      console.error(`[MinecraftJava] 兜底查询异常 ${target.host}:${target.port}: ${describeError(err)}`);
      return PROBE_UNAVAILABLE;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.socket?.destroy();
    this.socket = null;
    this.reader = null;
  }

  private async exchangeStatus(target: ProbeTarget): Promise<string> {
    const socket = this.socket;
    const reader = this.reader;
    if (!socket || !reader) {
      throw new Error(`no open connection to ${target.host}:${target.port}`);
    }

    await writeToSocket(socket, buildHandshakePacket(target, this.protocolVersion), this.timeoutMs);
    await writeToSocket(socket, buildStatusRequestPacket(), this.timeoutMs);

    await readVarInt(reader); // 包长度
    await readVarInt(reader); // 包 ID
    return readString(reader);
  }
}
