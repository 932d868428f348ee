// ============================================================
// RCON 玩家列表查询（Source RCON over TCP）
// 认证后执行列表命令，返回原始文本交给人数解析器
// ============================================================

import { RCON } from 'minecraft-server-util';
import { PROBE_UNAVAILABLE, type ProbeResult, type ProbeTarget } from '@server-pulse/shared';
import { ConnectError, ProtocolError, describeError } from '../errors.ts';
import { DEFAULT_PROBE_TIMEOUT_MS } from './transport.ts';
import type { GameServerProbe, ProbeOptions } from './types.ts';

export const DEFAULT_RCON_COMMAND = 'ListPlayers';

export type RconProbeOptions = ProbeOptions & {
  password: string;
  command?: string;
};

type RconMessage = {
  requestID: number;
  message: string;
};

/**
 * 按请求 ID 收集响应体。
 * 长输出会被服务端拆成多个 RESPONSE_VALUE 包；服务端按序应答，
 * 因此紧随命令发送一个空命令，收到它的回包即表示命令输出已收齐。
 */
export class RconOutputCollector {
  private readonly received: RconMessage[] = [];
  private commandId: number | null = null;
  private sentinelId: number | null = null;

  push(message: RconMessage): void {
    this.received.push(message);
  }

  setRequestIds(commandId: number, sentinelId: number): void {
    this.commandId = commandId;
    this.sentinelId = sentinelId;
  }

  isComplete(): boolean {
    return this.sentinelId !== null && this.received.some((message) => message.requestID === this.sentinelId);
  }

  output(): string | null {
    if (this.commandId === null) return null;
    const bodies = this.received
      .filter((message) => message.requestID === this.commandId)
      .map((message) => message.message);
    return bodies.length > 0 ? bodies.join('') : null;
  }
}

export class RconProbe implements GameServerProbe {
  private client: RCON | null = null;
  private target: ProbeTarget | null = null;
  private disposed = false;
  private readonly timeoutMs: number;
  private readonly debug: boolean;
  private readonly password: string;
  private readonly command: string;

  constructor(options: RconProbeOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.debug = options.debug ?? false;
    this.password = options.password;
    this.command = options.command?.trim() || DEFAULT_RCON_COMMAND;
  }

  async connect(target: ProbeTarget): Promise<void> {
    this.target = target;
    const client = new RCON();
    // 连接关闭后后台读循环会抛出，必须有 error 监听
    client.on('error', (err: unknown) => {
      if (!this.disposed) {
        console.warn(`[Rcon] ${target.host}:${target.port} 连接错误: ${describeError(err)}`);
      }
    });

    try {
      await client.connect(target.host, target.port, { timeout: this.timeoutMs });
    } catch (err) {
      throw new ConnectError(`connect to ${target.host}:${target.port} failed: ${describeError(err)}`, { cause: err });
    }
    this.client = client;
  }

  async query(): Promise<ProbeResult> {
    const target = this.target;
    const client = this.client;
    if (!client || !target) {
      return PROBE_UNAVAILABLE;
    }

    try {
      await client.login(this.password, { timeout: this.timeoutMs });
      const output = await this.execute(client, this.command);
      if (this.debug) {
        console.log(`[Rcon] ${target.host}:${target.port} ${this.command} 输出:\n${output}`);
      }
      return output;
    } catch (err) {
      console.warn(`[Rcon] 查询失败 ${target.host}:${target.port}: ${describeError(err)}`);
      return PROBE_UNAVAILABLE;
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    const client = this.client;
    this.client = null;
    if (!client) return;
    Promise.resolve(client.close()).catch((err: unknown) => {
      console.warn(`[Rcon] 关闭连接失败: ${describeError(err)}`);
    });
  }

  private execute(client: RCON, command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const collector = new RconOutputCollector();

      const finish = () => {
        clearTimeout(timer);
        client.removeListener('message', onMessage);
        const output = collector.output();
        if (output === null) {
          reject(new ProtocolError(`no RCON reply to "${command}" within ${this.timeoutMs}ms`));
          return;
        }
        resolve(output);
      };
      const onMessage = (message: RconMessage) => {
        collector.push(message);
        if (collector.isComplete()) finish();
      };
      // 不回应空命令的服务端：超时后按已收到的部分返回
      const timer = setTimeout(finish, this.timeoutMs);

      client.on('message', onMessage);
      const send = async () => {
        const commandId = await client.run(command);
        const sentinelId = await client.run('');
        collector.setRequestIds(commandId, sentinelId);
        if (collector.isComplete()) finish();
      };
      send().catch((err: unknown) => {
        clearTimeout(timer);
        client.removeListener('message', onMessage);
        reject(err);
      });
    });
  }
}
