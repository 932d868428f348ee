// ============================================================
// 核心错误分类
// 均在模块边界内被消化，转换为 "N/A" 或无效快照
// ============================================================

/** 传输层不可达：超时、拒绝连接、对端关闭 */
export class ConnectError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectError';
  }
}

/** 帧格式错误：varint 过长、帧被截断、包类型不符 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/** HTTP 拉取失败：网络异常、超时、非 2xx */
export class FetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchError';
  }
}

export function isConnectError(error: unknown): error is ConnectError {
  return error instanceof ConnectError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
