// ============================================================
// Source 引擎查询（A2S_INFO over UDP）
// 支持 S2C_CHALLENGE 挑战回包；结果为 "players/max"
// ============================================================

import type dgram from 'node:dgram';
import { PROBE_UNAVAILABLE, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { BufferReader } from '../codec/varint.ts';
import { ProtocolError, describeError } from '../errors.ts';
import { DEFAULT_PROBE_TIMEOUT_MS, exchangeDatagram, openUdpSocket } from './transport.ts';
import type { GameServerProbe, ProbeOptions } from './types.ts';

const SIMPLE_RESPONSE_HEADER = -1;
const A2S_INFO_REQUEST = 0x54;
const S2C_CHALLENGE = 0x41;
const S2A_INFO = 0x49;
const INFO_PAYLOAD = 'Source Engine Query';
const MAX_CHALLENGE_ROUNDS = 2;

export type SourceInfo = {
  name: string;
  map: string;
  folder: string;
  game: string;
  appId: number;
  players: number;
  maxPlayers: number;
  bots: number;
};

export type SourceReply =
  | { kind: 'challenge'; challenge: Buffer }
  | { kind: 'info'; info: SourceInfo };

export function buildInfoRequest(challenge?: Buffer): Buffer {
  const parts: Buffer[] = [
    Buffer.from([0xff, 0xff, 0xff, 0xff, A2S_INFO_REQUEST]),
    Buffer.from(`${INFO_PAYLOAD}\0`, 'latin1'),
  ];
  if (challenge) parts.push(challenge);
  return Buffer.concat(parts);
}

function readCString(reader: BufferReader): string {
  const bytes: number[] = [];
  for (;;) {
    const byte = reader.readByteSync();
    if (byte === 0) break;
    bytes.push(byte);
  }
  return Buffer.from(bytes).toString('utf8');
}

export function parseSourceReply(message: Buffer): SourceReply {
  const reader = new BufferReader(message);
  const header = reader.readBytesSync(4).readInt32LE(0);
  if (header !== SIMPLE_RESPONSE_HEADER) {
    throw new ProtocolError(`unsupported A2S packet header: ${header}`);
  }

  const type = reader.readByteSync();
  if (type === S2C_CHALLENGE) {
    return { kind: 'challenge', challenge: Buffer.from(reader.readBytesSync(4)) };
  }
  if (type !== S2A_INFO) {
    throw new ProtocolError(`unexpected A2S reply type: 0x${type.toString(16)}`);
  }

  reader.readByteSync(); // 协议版本
  const name = readCString(reader);
  const map = readCString(reader);
  const folder = readCString(reader);
  const game = readCString(reader);
  const appId = reader.readBytesSync(2).readUInt16LE(0);
  const players = reader.readByteSync();
  const maxPlayers = reader.readByteSync();
  const bots = reader.readByteSync();

  return {
    kind: 'info',
    info: { name, map, folder, game, appId, players, maxPlayers, bots },
  };
}

export class SourceEngineProbe implements GameServerProbe {
  private socket: dgram.Socket | null = null;
  private target: ProbeTarget | null = null;
  private disposed = false;
  private readonly timeoutMs: number;
  private readonly debug: boolean;

  constructor(options?: ProbeOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.debug = options?.debug ?? false;
  }

  async connect(target: ProbeTarget): Promise<void> {
    this.target = target;
    this.socket = await openUdpSocket(target, this.timeoutMs);
  }

  async query(): Promise<ProbeResult> {
    const socket = this.socket;
    const target = this.target;
    if (!socket || !target) {
      return PROBE_UNAVAILABLE;
    }

    try {
      const info = await this.requestInfo(socket);
      if (this.debug) {
        console.log(`[SourceQuery] ${target.host}:${target.port} info: ${JSON.stringify(info)}`);
      }
      return `${info.players}/${info.maxPlayers}`;
    } catch (err) {
      console.warn(`[SourceQuery] 查询失败 ${target.host}:${target.port}: ${describeError(err)}`);
      return PROBE_UNAVAILABLE;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.socket?.close();
    this.socket = null;
  }

  private async requestInfo(socket: dgram.Socket): Promise<SourceInfo> {
    let challenge: Buffer | undefined;
    for (let round = 0; round <= MAX_CHALLENGE_ROUNDS; round += 1) {
      const reply = parseSourceReply(await exchangeDatagram(socket, buildInfoRequest(challenge), this.timeoutMs));
      if (reply.kind === 'info') {
        return reply.info;
      }
      challenge = reply.challenge;
    }
    throw new ProtocolError('server kept answering with challenges');
  }
}
