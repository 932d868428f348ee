// ============================================================
// Keeper 入口
// 按固定间隔轮询所有游戏服务器与宿主机指标，并输出到日志
// ============================================================

import { v4 as uuidv4 } from 'uuid';
import type { HostMetricsSnapshot, ServerStatus } from '@server-pulse/shared';
import { loadKeeperConfig } from './lib/config/env.ts';
import { describeError } from './lib/errors.ts';
import { diskUsagePercent, formatBytes, memoryUsagePercent, memoryUsedBytes } from './lib/host-metrics/format.ts';
import { getHostMetrics } from './lib/host-metrics/service.ts';
import { queryMcStatusApi } from './lib/query/mcstatus-fallback.ts';
import { runPollCycle, summarizeCycle } from './lib/scheduler/poll-cycle.ts';

const config = loadKeeperConfig();

let isRunning = true;
let sleepTimer: ReturnType<typeof setTimeout> | null = null;
let wakeUp: (() => void) | null = null;

function logServerStatus(cycleId: string, status: ServerStatus): void {
  const state = status.online ? '在线' : '离线';
  console.log(
    `[Keeper] [${cycleId}] ${status.name} (${status.protocol} ${status.displayAddress}, 探测 ${status.target.host}:${status.target.port}) ${state}, 玩家=${status.playerCount}, 原始=${status.result.split('\n')[0]}`,
  );
}

function logHostMetrics(cycleId: string, metrics: HostMetricsSnapshot): void {
  if (!metrics.isValid) {
    console.warn(`[Keeper] [${cycleId}] 宿主机指标不可用: ${metrics.errorMessage}`);
    return;
  }
  const mounts = metrics.mounts
    .map((mount) => `${mount.mountPoint} ${diskUsagePercent(mount).toFixed(1)}%`)
    .join(', ');
  console.log(
    `[Keeper] [${cycleId}] CPU ${metrics.cpuUsagePercent.toFixed(1)}%, 内存 ${formatBytes(memoryUsedBytes(metrics))} / ${formatBytes(metrics.memoryTotalBytes)} (${memoryUsagePercent(metrics).toFixed(1)}%), 磁盘 ${mounts || '-'}`,
  );
}

async function runCycle(): Promise<void> {
  const cycleId = uuidv4().slice(0, 8);
  const startedAt = Date.now();

  const [statuses, metrics] = await Promise.all([
    runPollCycle(config.servers, {
      playerCountPattern: config.playerCountPattern,
      addressPolicy: {
        internalIpStructure: config.internalIpStructure,
        externalServerIp: config.externalServerIp,
      },
      probeOptions: {
        timeoutMs: config.probeTimeoutMs,
        debug: config.debug,
        rconPassword: config.rconPassword,
        rconCommand: config.rconCommand,
        fallback: (target) =>
          queryMcStatusApi(target, { baseUrl: config.mcStatusApiBaseUrl, timeoutMs: config.probeTimeoutMs }),
      },
    }),
    getHostMetrics(),
  ]);

  for (const status of statuses) {
    logServerStatus(cycleId, status);
  }
  logHostMetrics(cycleId, metrics);

  const summary = summarizeCycle(statuses);
  console.log(
    `[Keeper] [${cycleId}] 本轮完成: 在线 ${summary.online}/${statuses.length}, 玩家 ${summary.players}, 耗时 ${Date.now() - startedAt}ms`,
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    wakeUp = resolve;
    sleepTimer = setTimeout(() => {
      sleepTimer = null;
      wakeUp = null;
      resolve();
    }, ms);
  });
}

function stop(signal: string): void {
  console.log(`[Keeper] 收到 ${signal}，准备退出...`);
  isRunning = false;
  if (sleepTimer) {
    clearTimeout(sleepTimer);
    sleepTimer = null;
  }
  wakeUp?.();
  wakeUp = null;
}

async function main(): Promise<void> {
  console.log(`[Keeper] 启动: ${config.servers.length} 个服务器, 间隔 ${config.pollIntervalMs}ms`);
  console.log(`[Keeper] 指标端点: ${config.metricsUrl}`);
  if (config.servers.length === 0) {
    console.warn('[Keeper] 未配置 KEEPER_SERVERS，仅采集宿主机指标');
  }

  while (isRunning) {
    try {
      await runCycle();
    } catch (err) {
      console.error(`[Keeper] 轮询异常: ${describeError(err)}`);
    }
    if (!isRunning) break;
    await sleep(config.pollIntervalMs);
  }

  console.log('[Keeper] 已停止');
}

process.on('SIGTERM', () => stop('SIGTERM'));
process.on('SIGINT', () => stop('SIGINT'));

main().catch((err) => {
  console.error('[Keeper] 致命错误:', err);
  process.exit(1);
});
