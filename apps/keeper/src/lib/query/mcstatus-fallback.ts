// ============================================================
// mcstatus.io 兜底查询
// 直连 SLP 失败时走第三方状态聚合 API，用宽松正则取 online/max
// ============================================================

import { PROBE_UNAVAILABLE, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { describeError, isAbortError } from '../errors.ts';
import { DEFAULT_PROBE_TIMEOUT_MS } from './transport.ts';

export const DEFAULT_MCSTATUS_API_BASE_URL = 'https://api.mcstatus.io/v2/status/java';

const PLAYERS_ONLINE_PATTERN = /"players":\s*\{[^}]*"online":\s*(\d+)/;
const PLAYERS_MAX_PATTERN = /"max":\s*(\d+)/;

export type McStatusOptions = {
  baseUrl?: string;
  timeoutMs?: number;
};

/** 从响应文本中宽松提取 "online/max"，字段缺失返回 null */
export function parseMcStatusBody(body: string): string | null {
  const online = PLAYERS_ONLINE_PATTERN.exec(body);
  const max = PLAYERS_MAX_PATTERN.exec(body);
  if (!online || !max) return null;
  return `${online[1]}/${max[1]}`;
}

export function buildMcStatusUrl(target: ProbeTarget, baseUrl = DEFAULT_MCSTATUS_API_BASE_URL): string {
  return `${baseUrl.replace(/\/+$/, '')}/${target.host}:${target.port}`;
}

export async function queryMcStatusApi(target: ProbeTarget, options?: McStatusOptions): Promise<ProbeResult> {
  const url = buildMcStatusUrl(target, options?.baseUrl);
  const timeoutMs = options?.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    console.log(`[McStatus] 查询兜底 API: ${url}`);
    const res = await fetch(url, { signal: controller.signal });
    if (!res.ok) {
      console.warn(`[McStatus] API 响应异常: ${target.host}:${target.port}, status=${res.status}`);
      return PROBE_UNAVAILABLE;
    }

    const body = await res.text();
    const result = parseMcStatusBody(body);
    if (!result) {
      console.warn(`[McStatus] 响应缺少 online/max 字段: ${target.host}:${target.port}`);
      return PROBE_UNAVAILABLE;
    }

    console.log(`[McStatus] ${target.host}:${target.port} => ${result}`);
    return result;
  } catch (err) {
    if (isAbortError(err)) {
      console.warn(`[McStatus] 请求超时: ${target.host}:${target.port}, timeoutMs=${timeoutMs}`);
    } else {
      console.warn(`[McStatus] 请求失败: ${target.host}:${target.port}, ${describeError(err)}`);
    }
    return PROBE_UNAVAILABLE;
  } finally {
    clearTimeout(timer);
  }
}
