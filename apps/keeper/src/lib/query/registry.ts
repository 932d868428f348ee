// ============================================================
// 探测器注册表与统一入口
// 按协议族选择实现；queryServer 保证无论成败都释放传输
// ============================================================

import { PROBE_UNAVAILABLE, type GameProtocol, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { describeError, isConnectError } from '../errors.ts';
import { BedrockProbe } from './bedrock.ts';
import { MinecraftJavaProbe } from './minecraft-java.ts';
import { RconProbe } from './rcon.ts';
import { SourceEngineProbe } from './source-engine.ts';
import type { GameServerProbe, ProbeOptions, StatusFallback } from './types.ts';

export type ServerProbeOptions = ProbeOptions & {
  /** 仅 minecraft-java 使用 */
  fallback?: StatusFallback;
  /** 仅 rcon 使用 */
  rconPassword?: string;
  rconCommand?: string;
};

export function createServerProbe(protocol: GameProtocol, options: ServerProbeOptions = {}): GameServerProbe {
  const base: ProbeOptions = { timeoutMs: options.timeoutMs, debug: options.debug };
  switch (protocol) {
    case 'minecraft-java':
      return new MinecraftJavaProbe({ ...base, fallback: options.fallback });
    case 'minecraft-bedrock':
      return new BedrockProbe(base);
    case 'source':
      return new SourceEngineProbe(base);
    case 'rcon':
      return new RconProbe({ ...base, password: options.rconPassword ?? '', command: options.rconCommand });
  }
}

/**
 * 对单个目标执行一次完整探测，从不拒绝。
 * 连接失败只记录日志，随后仍调用 query()，由各协议决定兜底（或返回 "N/A"）。
 */
export async function queryServer(probe: GameServerProbe, target: ProbeTarget): Promise<ProbeResult> {
  try {
    try {
      await probe.connect(target);
    } catch (err) {
      const label = isConnectError(err) ? '连接失败' : '连接异常';
      console.warn(`[Probe] ${label} ${target.host}:${target.port}: ${describeError(err)}`);
    }
    return await probe.query();
  } catch (err) {
    console.error(`[Probe] 查询异常 ${target.host}:${target.port}: ${describeError(err)}`);
    return PROBE_UNAVAILABLE;
  } finally {
    probe.dispose();
  }
}
