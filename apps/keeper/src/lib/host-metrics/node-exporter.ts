// ============================================================
// node-exporter 采集
// 拉取 Prometheus 文本格式并单遍扫描出 CPU / 内存 / 磁盘
// ============================================================

import type { DiskMount, HostMetricsSnapshot } from '@server-pulse/shared';
import { FetchError, describeError, isAbortError } from '../errors.ts';

export const DEFAULT_METRICS_TIMEOUT_MS = 5_000;

const CPU_METRIC = 'node_cpu_seconds_total';
const MEM_TOTAL_PREFIX = 'node_memory_MemTotal_bytes ';
const MEM_AVAILABLE_PREFIX = 'node_memory_MemAvailable_bytes ';

const CPU_VALUE_PATTERN = /node_cpu_seconds_total\{[^}]*\}\s+([0-9.eE+-]+)/;
const MEM_TOTAL_PATTERN = /node_memory_MemTotal_bytes\s+([0-9.eE+-]+)/;
const MEM_AVAILABLE_PATTERN = /node_memory_MemAvailable_bytes\s+([0-9.eE+-]+)/;
const FS_SIZE_PATTERN = /node_filesystem_size_bytes\{[^}]+\}\s+([0-9.eE+-]+)/;
const FS_AVAIL_PATTERN = /node_filesystem_avail_bytes\{[^}]+\}\s+([0-9.eE+-]+)/;
const FS_FREE_PATTERN = /node_filesystem_free_bytes\{[^}]+\}\s+([0-9.eE+-]+)/;
const MOUNTPOINT_LABEL = /mountpoint="([^"]+)"/;
const FSTYPE_LABEL = /fstype="([^"]+)"/;

const PSEUDO_MOUNT_PREFIXES = ['/proc', '/sys', '/dev', '/run', '/etc/'];
export const ALLOWED_FILESYSTEM_TYPES = new Set(['overlay', 'ext4', 'xfs', 'btrfs', 'zfs', 'apfs']);

type MountAccumulator = {
  mountPoint: string;
  filesystemType?: string;
  totalBytes: number;
  availBytes: number | null;
  freeBytes: number | null;
};

export function createEmptySnapshot(): HostMetricsSnapshot {
  return {
    cpuUsagePercent: 0,
    cpuIdleSecondsTotal: 0,
    cpuTotalSecondsTotal: 0,
    memoryTotalBytes: 0,
    memoryAvailableBytes: 0,
    mounts: [],
    isValid: false,
  };
}

export function createInvalidSnapshot(errorMessage: string): HostMetricsSnapshot {
  return { ...createEmptySnapshot(), isValid: false, errorMessage };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** 单次采样内的 CPU 使用率：(total - idle) / total */
export function computeCpuUsagePercent(idleSeconds: number, totalSeconds: number): number {
  if (!Number.isFinite(totalSeconds) || totalSeconds <= 0) return 0;
  return clamp(((totalSeconds - idleSeconds) / totalSeconds) * 100, 0, 100);
}

/** 取指标值；无法解析时返回 null，该指标保持零值而不中断整次扫描 */
function readValue(line: string, pattern: RegExp): number | null {
  const match = pattern.exec(line);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

function toBytes(value: number): number {
  return Math.max(0, Math.floor(value));
}

export function isPseudoMount(mountPoint: string): boolean {
  return PSEUDO_MOUNT_PREFIXES.some((prefix) => mountPoint.startsWith(prefix));
}

function getMount(mounts: Map<string, MountAccumulator>, mountPoint: string): MountAccumulator {
  let mount = mounts.get(mountPoint);
  if (!mount) {
    mount = { mountPoint, totalBytes: 0, availBytes: null, freeBytes: null };
    mounts.set(mountPoint, mount);
  }
  return mount;
}

function finalizeMounts(mounts: Map<string, MountAccumulator>): DiskMount[] {
  return Array.from(mounts.values())
    .filter((mount) => mount.totalBytes > 0)
    .sort((a, b) => (a.mountPoint < b.mountPoint ? -1 : a.mountPoint > b.mountPoint ? 1 : 0))
    .map((mount) => {
      const disk: DiskMount = {
        mountPoint: mount.mountPoint,
        totalBytes: mount.totalBytes,
        availableBytes: mount.availBytes ?? mount.freeBytes ?? 0,
      };
      if (mount.filesystemType) disk.filesystemType = mount.filesystemType;
      return disk;
    });
}

export function parsePrometheusMetrics(text: string): HostMetricsSnapshot {
  const snapshot = createEmptySnapshot();
  const mounts = new Map<string, MountAccumulator>();
  let cpuIdle = 0;
  let cpuTotal = 0;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trimEnd();
    if (!line || line.startsWith('#')) continue;

    if (line.includes(CPU_METRIC)) {
      const value = readValue(line, CPU_VALUE_PATTERN);
      if (value !== null) {
        cpuTotal += value;
        if (line.includes('mode="idle"')) {
          cpuIdle += value;
        }
      }
      continue;
    }

    if (line.startsWith(MEM_TOTAL_PREFIX)) {
      const value = readValue(line, MEM_TOTAL_PATTERN);
      if (value !== null) snapshot.memoryTotalBytes = toBytes(value);
      continue;
    }

    if (line.startsWith(MEM_AVAILABLE_PREFIX)) {
      const value = readValue(line, MEM_AVAILABLE_PATTERN);
      if (value !== null) snapshot.memoryAvailableBytes = toBytes(value);
      continue;
    }

    const mountPoint = MOUNTPOINT_LABEL.exec(line)?.[1];
    if (!mountPoint) continue;

    const pattern = line.includes('node_filesystem_size_bytes{')
      ? FS_SIZE_PATTERN
      : line.includes('node_filesystem_avail_bytes{')
        ? FS_AVAIL_PATTERN
        : line.includes('node_filesystem_free_bytes{')
          ? FS_FREE_PATTERN
          : null;
    if (!pattern) continue;

    // 伪文件系统、/etc/hosts 之类的 bind mount 以及 rootfs 等类型的同名挂载点整行丢弃
    const fsType = FSTYPE_LABEL.exec(line)?.[1] ?? '';
    if (isPseudoMount(mountPoint) || !ALLOWED_FILESYSTEM_TYPES.has(fsType)) continue;

    const value = readValue(line, pattern);
    if (value === null) continue;
    const mount = getMount(mounts, mountPoint);
    if (pattern === FS_SIZE_PATTERN) {
      mount.totalBytes = toBytes(value);
      mount.filesystemType = fsType;
    } else if (pattern === FS_AVAIL_PATTERN) {
      mount.availBytes = toBytes(value);
    } else {
      mount.freeBytes = toBytes(value);
    }
  }

  snapshot.cpuIdleSecondsTotal = cpuIdle;
  snapshot.cpuTotalSecondsTotal = cpuTotal;
  snapshot.mounts = finalizeMounts(mounts);
  snapshot.isValid = true;

  if (cpuTotal > 0) {
    snapshot.cpuUsagePercent = computeCpuUsagePercent(cpuIdle, cpuTotal);
  } else {
    snapshot.isValid = false;
    snapshot.errorMessage = 'no CPU metrics parsed';
  }

  if (snapshot.memoryTotalBytes === 0) {
    snapshot.isValid = false;
    snapshot.errorMessage = snapshot.errorMessage ?? 'no memory metrics parsed';
  }

  return snapshot;
}

async function fetchMetricsText(url: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { signal: controller.signal, headers: { Accept: 'text/plain' } });
    if (!res.ok) {
      throw new FetchError(`HTTP ${res.status}`);
    }
    return await res.text();
  } catch (err) {
    if (err instanceof FetchError) throw err;
    if (isAbortError(err)) {
      throw new FetchError('Request timeout', { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new FetchError(`Connection failed: ${reason}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/** 拉取并解析一次快照；任何失败都转换为 isValid=false 的快照，从不拒绝 */
export async function fetchHostMetrics(
  url: string,
  options?: { timeoutMs?: number; debug?: boolean },
): Promise<HostMetricsSnapshot> {
  let text: string;
  try {
    text = await fetchMetricsText(url, options?.timeoutMs ?? DEFAULT_METRICS_TIMEOUT_MS);
  } catch (err) {
    const message = err instanceof FetchError ? err.message : `Connection failed: ${describeError(err)}`;
    console.error(`[NodeExporter] 拉取失败: url=${url}, ${message}`);
    return createInvalidSnapshot(message);
  }

  if (options?.debug) {
    console.log(`[NodeExporter] 原始响应:\n${text}`);
  }

  try {
    const snapshot = parsePrometheusMetrics(text);
    if (!snapshot.isValid) {
      console.warn(`[NodeExporter] 快照无效: ${snapshot.errorMessage}`);
    }
    return snapshot;
  } catch (err) {
    const message = `Parse error: ${err instanceof Error ? err.message : String(err)}`;
    console.error(`[NodeExporter] 解析失败: ${message}`);
    return createInvalidSnapshot(message);
  }
}
