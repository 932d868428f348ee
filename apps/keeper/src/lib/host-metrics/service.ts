// ============================================================
// 宿主机指标缓存
// 最小采样间隔内直接返回缓存；过期后拉取新快照，
// 并用前后两次累计计数器的差值重算 CPU 使用率
// ============================================================

import type { HostMetricsSnapshot } from '@server-pulse/shared';
import { loadKeeperConfig } from '../config/env.ts';
import { createInvalidSnapshot, fetchHostMetrics } from './node-exporter.ts';

export const SAMPLE_MIN_INTERVAL_MS = 1_000;

export type HostMetricsFetcher = (url: string) => Promise<HostMetricsSnapshot>;

export type HostMetricsCacheOptions = {
  url: string;
  minIntervalMs?: number;
  fetchSnapshot?: HostMetricsFetcher;
  now?: () => number;
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * 以两次采样的差值计算 CPU 使用率。
 * 首次采样、计数器回绕或任一快照无效时返回 null，调用方沿用单次快照比值。
 */
export function computeDeltaCpuUsage(previous: HostMetricsSnapshot | null, next: HostMetricsSnapshot): number | null {
  if (!previous || !previous.isValid || !next.isValid) return null;
  if (previous.cpuTotalSecondsTotal <= 0) return null;

  const totalDelta = next.cpuTotalSecondsTotal - previous.cpuTotalSecondsTotal;
  const idleDelta = next.cpuIdleSecondsTotal - previous.cpuIdleSecondsTotal;
  if (!(totalDelta > 0) || idleDelta < 0) return null;

  return clamp((1 - idleDelta / totalDelta) * 100, 0, 100);
}

export class HostMetricsCache {
  private current: HostMetricsSnapshot | null = null;
  private lastFetchAtMs = Number.NEGATIVE_INFINITY;
  private inflight: Promise<HostMetricsSnapshot> | null = null;
  private readonly url: string;
  private readonly minIntervalMs: number;
  private readonly fetchSnapshot: HostMetricsFetcher;
  private readonly now: () => number;

  constructor(options: HostMetricsCacheOptions) {
    this.url = options.url;
    this.minIntervalMs = options.minIntervalMs ?? SAMPLE_MIN_INTERVAL_MS;
    this.fetchSnapshot = options.fetchSnapshot ?? ((url) => fetchHostMetrics(url));
    this.now = options.now ?? Date.now;
  }

  /** 永不拒绝：失败体现为 isValid=false 的快照 */
  getMetrics(): Promise<HostMetricsSnapshot> {
    if (this.current && this.now() - this.lastFetchAtMs < this.minIntervalMs) {
      return Promise.resolve(this.current);
    }

    // 并发调用共享同一次拉取，网络请求期间不阻塞读缓存
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async refresh(): Promise<HostMetricsSnapshot> {
    let next: HostMetricsSnapshot;
    try {
      next = await this.fetchSnapshot(this.url);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[HostMetrics] 采集异常: ${reason}`);
      next = createInvalidSnapshot(`Connection failed: ${reason}`);
    }

    const deltaUsage = computeDeltaCpuUsage(this.current, next);
    if (deltaUsage !== null) {
      next = { ...next, cpuUsagePercent: deltaUsage };
    }

    // 无效快照同样替换缓存，对调用方可见
    this.current = next;
    this.lastFetchAtMs = this.now();
    return next;
  }
}

declare global {
  var __serverPulseHostMetricsCache: HostMetricsCache | undefined;
}

function getCache(): HostMetricsCache {
  if (!globalThis.__serverPulseHostMetricsCache) {
    const config = loadKeeperConfig();
    globalThis.__serverPulseHostMetricsCache = new HostMetricsCache({
      url: config.metricsUrl,
      fetchSnapshot: (url) => fetchHostMetrics(url, { timeoutMs: config.metricsTimeoutMs, debug: config.debug }),
    });
  }
  return globalThis.__serverPulseHostMetricsCache;
}

export function getHostMetrics(): Promise<HostMetricsSnapshot> {
  return getCache().getMetrics();
}
