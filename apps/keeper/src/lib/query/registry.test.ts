import test from 'node:test';
import assert from 'node:assert/strict';
import { ConnectError } from '../errors.ts';
import { BedrockProbe } from './bedrock.ts';
import { MinecraftJavaProbe } from './minecraft-java.ts';
import { RconProbe } from './rcon.ts';
import { createServerProbe, queryServer } from './registry.ts';
import { SourceEngineProbe } from './source-engine.ts';
import type { GameServerProbe } from './types.ts';

function stubProbe(options: { connectError?: Error; queryResult?: string; queryError?: Error }) {
  const calls: string[] = [];
  const probe: GameServerProbe = {
    async connect(target) {
      calls.push(`connect ${target.host}:${target.port}`);
      if (options.connectError) throw options.connectError;
    },
    async query() {
      calls.push('query');
      if (options.queryError) throw options.queryError;
      return options.queryResult ?? 'N/A';
    },
    dispose() {
      calls.push('dispose');
    },
  };
  return { probe, calls };
}

test('createServerProbe: 按协议族选择实现', () => {
  assert.ok(createServerProbe('minecraft-java') instanceof MinecraftJavaProbe);
  assert.ok(createServerProbe('minecraft-bedrock') instanceof BedrockProbe);
  assert.ok(createServerProbe('source') instanceof SourceEngineProbe);
  assert.ok(createServerProbe('rcon', { rconPassword: 'test-secret' }) instanceof RconProbe);
});

test('queryServer: 正常路径 connect -> query -> dispose', async () => {
  const { probe, calls } = stubProbe({ queryResult: '2/8' });
  const result = await queryServer(probe, { host: 'mc.local', port: 25565 });
  assert.equal(result, '2/8');
  assert.deepEqual(calls, ['connect mc.local:25565', 'query', 'dispose']);
});

test('queryServer: 连接失败仍交给 query 决定结果', async () => {
  const { probe, calls } = stubProbe({ connectError: new ConnectError('refused'), queryResult: 'fallback' });
  const result = await queryServer(probe, { host: 'mc.local', port: 25565 });
  assert.equal(result, 'fallback');
  assert.deepEqual(calls, ['connect mc.local:25565', 'query', 'dispose']);
});

test('queryServer: query 违约抛出时返回 N/A 并释放', async () => {
  const { probe, calls } = stubProbe({ queryError: new Error('unexpected') });
  const result = await queryServer(probe, { host: 'mc.local', port: 25565 });
  assert.equal(result, 'N/A');
  assert.deepEqual(calls, ['connect mc.local:25565', 'query', 'dispose']);
});
