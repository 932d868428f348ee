// ============================================================
// 单轮轮询
// 每个服务器独立创建探测器并发执行，彼此不共享可变状态
// ============================================================

import {
  PROBE_UNAVAILABLE,
  type GameProtocol,
  type ProbeTarget,
  type ServerAllocation,
  type ServerStatus,
} from '@server-pulse/shared';
import type { MonitoredServer } from '../config/env.ts';
import { getConnectAddress, resolveProbeTarget, type AddressPolicy } from '../network/allocation.ts';
import { extractPlayerCount } from '../players/player-count.ts';
import { createServerProbe, queryServer, type ServerProbeOptions } from '../query/registry.ts';
import type { GameServerProbe } from '../query/types.ts';

export type PollCycleDeps = {
  createProbe?: (protocol: GameProtocol) => GameServerProbe;
  probeOptions?: ServerProbeOptions;
  playerCountPattern?: string | null;
  addressPolicy?: AddressPolicy;
};

/** 配置中的 host:port 视为该服务器唯一的默认分配 */
function toAllocations(server: MonitoredServer): ServerAllocation[] {
  return [{ ip: server.target.host, port: server.target.port, isDefault: true }];
}

/** 通配 / 空地址按策略换成展示 IP，其余原样探测 */
export function resolveServerTarget(server: MonitoredServer, policy: AddressPolicy = {}): ProbeTarget {
  return resolveProbeTarget(toAllocations(server), policy) ?? server.target;
}

/** 未配置任何地址策略时直接展示配置的 host:port */
export function describeServerAddress(server: MonitoredServer, policy: AddressPolicy = {}): string {
  if (!policy.internalIpStructure && !policy.externalServerIp) {
    return `${server.target.host}:${server.target.port}`;
  }
  return getConnectAddress(toAllocations(server), policy);
}

export async function pollServer(server: MonitoredServer, deps: PollCycleDeps = {}): Promise<ServerStatus> {
  const probe = deps.createProbe
    ? deps.createProbe(server.protocol)
    : createServerProbe(server.protocol, deps.probeOptions);
  const policy = deps.addressPolicy ?? {};
  const target = resolveServerTarget(server, policy);
  const result = await queryServer(probe, target);
  const online = result !== PROBE_UNAVAILABLE;

  return {
    name: server.name,
    protocol: server.protocol,
    target,
    displayAddress: describeServerAddress(server, policy),
    result,
    online,
    playerCount: online ? extractPlayerCount(result, deps.playerCountPattern) : 0,
  };
}

/** 结果顺序与输入一致 */
export function runPollCycle(servers: readonly MonitoredServer[], deps: PollCycleDeps = {}): Promise<ServerStatus[]> {
  return Promise.all(servers.map((server) => pollServer(server, deps)));
}

export function summarizeCycle(statuses: readonly ServerStatus[]): { online: number; offline: number; players: number } {
  let online = 0;
  let players = 0;
  for (const status of statuses) {
    if (!status.online) continue;
    online += 1;
    players += status.playerCount;
  }
  return { online, offline: statuses.length - online, players };
}
