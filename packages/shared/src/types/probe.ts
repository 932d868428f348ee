// ============================================================
// Probe: 游戏服务器状态探测模型
// ============================================================

export const GAME_PROTOCOLS = [
  'minecraft-java',
  'minecraft-bedrock',
  'source',
  'rcon',
] as const;

export type GameProtocol = (typeof GAME_PROTOCOLS)[number];

/** 无可用数据的哨兵值（0 人在线写作 "0/<max>"） */
export const PROBE_UNAVAILABLE = 'N/A';

/** 单次探测的目标端点，在一次探测内不可变 */
export interface ProbeTarget {
  readonly host: string;
  readonly port: number;
}

/**
 * 归一化后的探测结果：
 * "<online>/<max>"、协议原始文本（交给人数解析器），或 "N/A"
 */
export type ProbeResult = string;

/** 面板分配给服务器的网络地址 */
export interface ServerAllocation {
  ip: string;
  port: number;
  isDefault: boolean;
  alias?: string | null;
}

/** 一轮轮询中单个服务器的状态 */
export interface ServerStatus {
  name: string;
  protocol: GameProtocol;
  /** 实际探测的端点（已按地址策略解析） */
  target: ProbeTarget;
  /** 对外展示的 "<ip>:<port>" */
  displayAddress: string;
  result: ProbeResult;
  online: boolean;
  playerCount: number;
}
