// ============================================================
// Keeper 运行配置
// 全部来自环境变量；非法值回退默认并打印警告
// ============================================================

import { GAME_PROTOCOLS, type GameProtocol, type ProbeTarget } from '@server-pulse/shared';
import { DEFAULT_MCSTATUS_API_BASE_URL } from '../query/mcstatus-fallback.ts';
import { DEFAULT_RCON_COMMAND } from '../query/rcon.ts';

export const DEFAULT_METRICS_URL = 'http://node-exporter:9100/metrics';
const DEFAULT_POLL_INTERVAL_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 5_000;
const MIN_TIMEOUT_MS = 500;
const MAX_TIMEOUT_MS = 30_000;
const MIN_POLL_INTERVAL_MS = 1_000;
const MAX_POLL_INTERVAL_MS = 60 * 60 * 1_000;

export interface MonitoredServer {
  name: string;
  protocol: GameProtocol;
  target: ProbeTarget;
}

export interface KeeperConfig {
  servers: MonitoredServer[];
  metricsUrl: string;
  metricsTimeoutMs: number;
  pollIntervalMs: number;
  probeTimeoutMs: number;
  debug: boolean;
  rconPassword: string;
  rconCommand: string;
  playerCountPattern: string | null;
  internalIpStructure: string | null;
  externalServerIp: string | null;
  mcStatusApiBaseUrl: string;
}

type Env = Record<string, string | undefined>;

export function parseBooleanEnv(raw: string | undefined): boolean | null {
  if (typeof raw !== 'string') return null;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return null;
  if (['1', 'true', 'yes', 'on', 'enabled'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', 'disabled'].includes(normalized)) return false;
  return null;
}

function clampInteger(raw: string | undefined, fallback: number, min: number, max: number): number {
  const value = Number(raw?.trim() || fallback);
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(value)));
}

function optionalString(raw: string | undefined): string | null {
  const value = (raw || '').trim();
  return value ? value : null;
}

function isGameProtocol(value: string): value is GameProtocol {
  return (GAME_PROTOCOLS as readonly string[]).includes(value);
}

function parsePort(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const port = Number(raw);
  return port >= 1 && port <= 65_535 ? port : null;
}

/**
 * 解析单个服务器条目：`name=protocol@host:port`
 * IPv6 地址用方括号包裹，如 `lobby=source@[::1]:27015`
 */
export function parseServerEntry(entry: string): MonitoredServer | null {
  const match = /^([^=]+)=([a-z-]+)@(.+):(\d+)$/i.exec(entry.trim());
  if (!match) return null;

  const name = match[1].trim();
  const protocol = match[2].toLowerCase();
  const host = match[3].trim().replace(/^\[(.*)\]$/, '$1');
  const port = parsePort(match[4]);
  if (!name || !host || port === null || !isGameProtocol(protocol)) return null;

  return { name, protocol, target: { host, port } };
}

export function parseServerList(raw: string | undefined): MonitoredServer[] {
  const servers: MonitoredServer[] = [];
  for (const entry of (raw || '').split(/[\n,]+/)) {
    if (!entry.trim()) continue;
    const server = parseServerEntry(entry);
    if (!server) {
      console.warn(`[Config] 忽略无法解析的服务器条目: ${entry.trim()}`);
      continue;
    }
    servers.push(server);
  }
  return servers;
}

export function loadKeeperConfig(env: Env = process.env): KeeperConfig {
  return {
    servers: parseServerList(env.KEEPER_SERVERS),
    metricsUrl: optionalString(env.HOST_METRICS_URL) ?? DEFAULT_METRICS_URL,
    metricsTimeoutMs: clampInteger(env.HOST_METRICS_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, MIN_TIMEOUT_MS, MAX_TIMEOUT_MS),
    pollIntervalMs: clampInteger(env.KEEPER_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS, MIN_POLL_INTERVAL_MS, MAX_POLL_INTERVAL_MS),
    probeTimeoutMs: clampInteger(env.KEEPER_PROBE_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, MIN_TIMEOUT_MS, MAX_TIMEOUT_MS),
    debug: parseBooleanEnv(env.KEEPER_DEBUG) ?? false,
    rconPassword: env.KEEPER_RCON_PASSWORD ?? '',
    rconCommand: optionalString(env.KEEPER_RCON_COMMAND) ?? DEFAULT_RCON_COMMAND,
    playerCountPattern: optionalString(env.KEEPER_PLAYER_COUNT_PATTERN),
    internalIpStructure: optionalString(env.KEEPER_INTERNAL_IP_STRUCTURE),
    externalServerIp: optionalString(env.KEEPER_EXTERNAL_SERVER_IP),
    mcStatusApiBaseUrl: optionalString(env.MCSTATUS_API_BASE_URL) ?? DEFAULT_MCSTATUS_API_BASE_URL,
  };
}
