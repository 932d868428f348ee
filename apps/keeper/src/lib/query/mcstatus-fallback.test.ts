import test from 'node:test';
import assert from 'node:assert/strict';
import { buildMcStatusUrl, parseMcStatusBody, queryMcStatusApi } from './mcstatus-fallback.ts';

const target = { host: 'play.example.com', port: 25565 };

async function withFetch(impl: (input: string, init?: { signal?: AbortSignal }) => Promise<unknown>, run: () => Promise<void>) {
  const originalFetch = globalThis.fetch;
  Object.defineProperty(globalThis, 'fetch', { configurable: true, value: impl });
  try {
    await run();
  } finally {
    Object.defineProperty(globalThis, 'fetch', { configurable: true, value: originalFetch });
  }
}

test('buildMcStatusUrl: 拼接 host:port 并去掉多余斜杠', () => {
  assert.equal(buildMcStatusUrl(target), 'https://api.mcstatus.io/v2/status/java/play.example.com:25565');
  assert.equal(buildMcStatusUrl(target, 'http://localhost:8080/status/'), 'http://localhost:8080/status/play.example.com:25565');
});

test('parseMcStatusBody: 宽松匹配 players.online 与 max', () => {
  assert.equal(parseMcStatusBody('{"online":true,"players":{"online":71,"max":100,"list":[]}}'), '71/100');
  assert.equal(parseMcStatusBody('{"players": {"online": 0, "max": 20}}'), '0/20');
  assert.equal(parseMcStatusBody('{"online":false}'), null);
});

test('queryMcStatusApi: 成功时返回 online/max', async () => {
  const urls: string[] = [];
  await withFetch(
    async (input) => {
      urls.push(input);
      return { ok: true, status: 200, text: async () => '{"online":true,"players":{"online":71,"max":100}}' };
    },
    async () => {
      assert.equal(await queryMcStatusApi(target), '71/100');
    },
  );
  assert.deepEqual(urls, ['https://api.mcstatus.io/v2/status/java/play.example.com:25565']);
});

test('queryMcStatusApi: 非 2xx 返回 N/A', async () => {
  await withFetch(
    async () => ({ ok: false, status: 503, text: async () => 'unavailable' }),
    async () => {
      assert.equal(await queryMcStatusApi(target), 'N/A');
    },
  );
});

test('queryMcStatusApi: 缺少字段返回 N/A', async () => {
  await withFetch(
    async () => ({ ok: true, status: 200, text: async () => '{"online":false}' }),
    async () => {
      assert.equal(await queryMcStatusApi(target), 'N/A');
    },
  );
});

test('queryMcStatusApi: 网络异常返回 N/A', async () => {
  await withFetch(
    async () => {
      throw new Error('getaddrinfo ENOTFOUND');
    },
    async () => {
      assert.equal(await queryMcStatusApi(target), 'N/A');
    },
  );
});

test('queryMcStatusApi: 超时中止后返回 N/A', async () => {
  await withFetch(
    (_input, init) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => {
          const err = new Error('This operation was aborted');
          err.name = 'AbortError';
          reject(err);
        });
      }),
    async () => {
      assert.equal(await queryMcStatusApi(target, { timeoutMs: 50 }), 'N/A');
    },
  );
});
