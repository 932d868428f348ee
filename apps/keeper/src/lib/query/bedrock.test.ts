import test from 'node:test';
import assert from 'node:assert/strict';
import dgram from 'node:dgram';
import { BedrockProbe } from './bedrock.ts';
import { queryServer } from './registry.ts';

const RAKNET_MAGIC = Buffer.from('00ffff00fefefefefdfdfdfd12345678', 'hex');
const MOTD = 'MCPE;Dedicated Server;594;1.20.1;3;10;1234567890;Bedrock level;Survival;1;19132;19133;';

/** Unconnected Pong：ID、回显时间、服务端 GUID、magic、u16 长度 + MOTD */
function pong(ping: Buffer, motd: string): Buffer {
  const text = Buffer.from(motd, 'utf8');
  const length = Buffer.alloc(2);
  length.writeUInt16BE(text.length);
  return Buffer.concat([Buffer.from([0x1c]), ping.subarray(1, 9), Buffer.alloc(8, 0x01), RAKNET_MAGIC, length, text]);
}

async function startBedrockServer(motd: string | null) {
  const server = dgram.createSocket('udp4');
  server.on('message', (message, remote) => {
    if (motd !== null && message[0] === 0x01) {
      server.send(pong(message, motd), remote.port, remote.address);
    }
  });
  await new Promise<void>((resolve) => server.bind(0, '127.0.0.1', resolve));
  return {
    port: server.address().port,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
}

test('BedrockProbe: 返回 online/max', async () => {
  const server = await startBedrockServer(MOTD);
  try {
    const result = await queryServer(new BedrockProbe({ timeoutMs: 1_000 }), { host: '127.0.0.1', port: server.port });
    assert.equal(result, '3/10');
  } finally {
    await server.close();
  }
});

test('BedrockProbe: 无回包时超时返回 N/A', async () => {
  const server = await startBedrockServer(null);
  try {
    const result = await queryServer(new BedrockProbe({ timeoutMs: 300 }), { host: '127.0.0.1', port: server.port });
    assert.equal(result, 'N/A');
  } finally {
    await server.close();
  }
});

test('BedrockProbe: 未调用 connect 时返回 N/A', async () => {
  assert.equal(await new BedrockProbe().query(), 'N/A');
});
