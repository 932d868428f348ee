// ============================================================
// 面板分配地址解析
// 决定展示用 IP 与实际探测用 IP
// ============================================================

import type { ServerAllocation } from '@server-pulse/shared';

export const WILDCARD_IP = '0.0.0.0';

export type AddressPolicy = {
  /** 内网地址模板，如 "10.0.*.*"，`*` 匹配一段数字 */
  internalIpStructure?: string | null;
  /** 对外公布的 IP；未配置时展示 0.0.0.0 */
  externalServerIp?: string | null;
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function isInternalIp(ip: string, internalIpStructure: string | null | undefined): boolean {
  if (!internalIpStructure) return false;
  const pattern = `^${escapeRegExp(internalIpStructure).replace(/\\\*/g, '\\d+')}$`;
  return new RegExp(pattern).test(ip);
}

/** 优先取标记为默认的分配，否则取第一个 */
export function getDefaultAllocation(allocations: readonly ServerAllocation[] | null | undefined): ServerAllocation | null {
  if (!allocations || allocations.length === 0) return null;
  return allocations.find((allocation) => allocation.isDefault) ?? allocations[0];
}

export function getDisplayIp(allocations: readonly ServerAllocation[] | null | undefined, policy: AddressPolicy): string {
  const allocation = getDefaultAllocation(allocations);
  if (!allocation) return 'N/A';
  if (isInternalIp(allocation.ip, policy.internalIpStructure)) {
    return allocation.ip;
  }
  return policy.externalServerIp || WILDCARD_IP;
}

export function getConnectAddress(allocations: readonly ServerAllocation[] | null | undefined, policy: AddressPolicy): string {
  const allocation = getDefaultAllocation(allocations);
  if (!allocation) return 'N/A';
  return `${getDisplayIp(allocations, policy)}:${allocation.port}`;
}

/**
 * 探测用 IP：默认使用分配 IP（Keeper 与游戏服务器同处内部网络）。
 * 分配 IP 为空或通配 0.0.0.0 时无法作为目标，回退到展示 IP。
 */
export function getQueryIp(allocations: readonly ServerAllocation[] | null | undefined, policy: AddressPolicy): string {
  const allocation = getDefaultAllocation(allocations);
  if (!allocation) return 'N/A';
  if (!allocation.ip || allocation.ip === WILDCARD_IP) {
    return getDisplayIp(allocations, policy);
  }
  return allocation.ip;
}

/** 由分配列表得到探测目标；无可用分配时返回 null */
export function resolveProbeTarget(
  allocations: readonly ServerAllocation[] | null | undefined,
  policy: AddressPolicy,
): { host: string; port: number } | null {
  const allocation = getDefaultAllocation(allocations);
  if (!allocation) return null;
  return { host: getQueryIp(allocations, policy), port: allocation.port };
}
