// ============================================================
// 游戏服务器探测能力集
// 每种协议族一个实现，互不共享基类
// ============================================================

import type { ProbeResult, ProbeTarget } from '@server-pulse/shared';

export interface GameServerProbe {
  /** 建立传输；超时或拒绝时以 ConnectError 拒绝 */
  connect(target: ProbeTarget): Promise<void>;
  /** 执行协议握手并返回归一化结果；从不拒绝 */
  query(): Promise<ProbeResult>;
  /** 释放传输资源，可重复调用 */
  dispose(): void;
}

/** 直连失败时的终端兜底，从不拒绝 */
export type StatusFallback = (target: ProbeTarget) => Promise<ProbeResult>;

export interface ProbeOptions {
  timeoutMs?: number;
  debug?: boolean;
}
