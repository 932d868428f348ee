import type { DiskMount, HostMetricsSnapshot } from '@server-pulse/shared';

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function diskUsedBytes(mount: DiskMount): number {
  return Math.max(0, mount.totalBytes - mount.availableBytes);
}

export function diskUsagePercent(mount: DiskMount): number {
  if (mount.totalBytes <= 0) return 0;
  return (diskUsedBytes(mount) / mount.totalBytes) * 100;
}

export function memoryUsedBytes(snapshot: HostMetricsSnapshot): number {
  return Math.max(0, snapshot.memoryTotalBytes - snapshot.memoryAvailableBytes);
}

export function memoryUsagePercent(snapshot: HostMetricsSnapshot): number {
  if (snapshot.memoryTotalBytes <= 0) return 0;
  return (memoryUsedBytes(snapshot) / snapshot.memoryTotalBytes) * 100;
}

/** 1536 -> "1.5 KB"，最多两位小数 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return '-';
  let value = bytes;
  let order = 0;
  while (value >= 1024 && order < BYTE_UNITS.length - 1) {
    value /= 1024;
    order += 1;
  }
  return `${Number(value.toFixed(2))} ${BYTE_UNITS[order]}`;
}
