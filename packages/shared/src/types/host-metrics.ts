// ============================================================
// HostMetrics: 宿主机资源快照（来自 node-exporter）
// ============================================================

export interface DiskMount {
  mountPoint: string;
  totalBytes: number;
  availableBytes: number;
  filesystemType?: string;
}

export interface HostMetricsSnapshot {
  cpuUsagePercent: number;
  /** 累计计数器，仅用于与下一次采样做差值 */
  cpuIdleSecondsTotal: number;
  cpuTotalSecondsTotal: number;
  memoryTotalBytes: number;
  memoryAvailableBytes: number;
  /** 按挂载路径排序 */
  mounts: DiskMount[];
  /** 为 false 时数值字段不可信，errorMessage 必定非空 */
  isValid: boolean;
  errorMessage?: string;
}
