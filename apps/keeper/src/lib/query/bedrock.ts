// ============================================================
// Minecraft Bedrock 版查询（RakNet Unconnected Ping）
// 报文收发与 MOTD 解析交给 minecraft-server-util 的 statusBedrock
// ============================================================

import { statusBedrock } from 'minecraft-server-util';
import { PROBE_UNAVAILABLE, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { describeError } from '../errors.ts';
import { DEFAULT_PROBE_TIMEOUT_MS } from './transport.ts';
import type { GameServerProbe, ProbeOptions } from './types.ts';

export class BedrockProbe implements GameServerProbe {
  private target: ProbeTarget | null = null;
  private readonly timeoutMs: number;
  private readonly debug: boolean;

  constructor(options?: ProbeOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.debug = options?.debug ?? false;
  }

  /** UDP 无连接，仅记录目标；不可达在 query 中以超时体现 */
  async connect(target: ProbeTarget): Promise<void> {
    this.target = target;
  }

  async query(): Promise<ProbeResult> {
    const target = this.target;
    if (!target) {
      return PROBE_UNAVAILABLE;
    }

    try {
      const status = await statusBedrock(target.host, target.port, {
        timeout: this.timeoutMs,
        enableSRV: false,
      });
      if (this.debug) {
        console.log(`[Bedrock] ${target.host}:${target.port} status: ${JSON.stringify(status)}`);
      }
      const { online, max } = status.players;
      if (!Number.isFinite(online) || !Number.isFinite(max)) {
        console.warn(`[Bedrock] 回包人数字段无效 ${target.host}:${target.port}`);
        return PROBE_UNAVAILABLE;
      }
      return `${online}/${max}`;
    } catch (err) {
      console.warn(`[Bedrock] 查询失败 ${target.host}:${target.port}: ${describeError(err)}`);
      return PROBE_UNAVAILABLE;
    }
  }

  dispose(): void {
    this.target = null;
  }
}
