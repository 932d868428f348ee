// ============================================================
// 探测用传输层
// TCP / UDP 连接均带显式超时，失败统一抛出 ConnectError
// ============================================================

import net from 'node:net';
import dgram from 'node:dgram';
import type { ProbeTarget } from '@server-pulse/shared';
import { ConnectError } from '../errors.ts';

export const DEFAULT_PROBE_TIMEOUT_MS = 5_000;

export function openTcpConnection(target: ProbeTarget, timeoutMs: number): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.createConnection({ host: target.host, port: target.port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new ConnectError(`connect to ${target.host}:${target.port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectError(`connect to ${target.host}:${target.port} failed: ${err.message}`, { cause: err }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.off('error', onError);
      socket.setNoDelay(true);
      resolve(socket);
    });
  });
}

export function writeToSocket(socket: net.Socket, data: Buffer, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new ConnectError(`write timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    socket.write(data, (err) => {
      clearTimeout(timer);
      if (err) {
        reject(new ConnectError(`write failed: ${err.message}`, { cause: err }));
        return;
      }
      resolve();
    });
  });
}

export function openUdpSocket(target: ProbeTarget, timeoutMs: number): Promise<dgram.Socket> {
  const type = net.isIPv6(target.host) ? 'udp6' : 'udp4';
  return new Promise<dgram.Socket>((resolve, reject) => {
    const socket = dgram.createSocket(type);
    const timer = setTimeout(() => {
      socket.close();
      reject(new ConnectError(`connect to ${target.host}:${target.port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.close();
      reject(new ConnectError(`connect to ${target.host}:${target.port} failed: ${err.message}`, { cause: err }));
    };

    socket.once('error', onError);
    socket.connect(target.port, target.host, () => {
      clearTimeout(timer);
      socket.off('error', onError);
      // ICMP 不可达等异步错误在交换期间由 exchangeDatagram 接管
      socket.on('error', (err) => {
        console.warn(`[Transport] UDP ${target.host}:${target.port} 错误: ${err.message}`);
      });
      resolve(socket);
    });
  });
}

/** 在已 connect 的 UDP socket 上发送一个数据报并等待一个响应 */
export function exchangeDatagram(socket: dgram.Socket, payload: Buffer, timeoutMs: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      socket.off('message', onMessage);
      socket.off('error', onError);
    };
    const onMessage = (message: Buffer) => {
      cleanup();
      resolve(message);
    };
    const onError = (err: Error) => {
      cleanup();
      reject(new ConnectError(`datagram exchange failed: ${err.message}`, { cause: err }));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new ConnectError(`no datagram reply within ${timeoutMs}ms`));
    }, timeoutMs);

    socket.on('message', onMessage);
    socket.on('error', onError);
    socket.send(payload, (err) => {
      if (err) onError(err);
    });
  });
}
