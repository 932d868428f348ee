import test from 'node:test';
import assert from 'node:assert/strict';
import { computeCpuUsagePercent, fetchHostMetrics, isPseudoMount, parsePrometheusMetrics } from './node-exporter.ts';

const EXPOSITION = [
  '# HELP node_cpu_seconds_total Seconds the CPUs spent in each mode.',
  '# TYPE node_cpu_seconds_total counter',
  'node_cpu_seconds_total{cpu="0",mode="idle"} 100',
  'node_cpu_seconds_total{cpu="0",mode="user"} 300',
  '# HELP node_memory_MemTotal_bytes Memory information field MemTotal_bytes.',
  'node_memory_MemTotal_bytes 8.589934592e+09',
  'node_memory_MemAvailable_bytes 4.294967296e+09',
  'node_filesystem_avail_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 4e+10',
  'node_filesystem_size_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 1e+11',
  'node_filesystem_free_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 5e+10',
  'node_filesystem_size_bytes{device="proc",fstype="ext4",mountpoint="/proc/foo"} 1000',
  'node_filesystem_size_bytes{device="tmpfs",fstype="tmpfs",mountpoint="/tmp"} 2000',
  'node_filesystem_size_bytes{device="/dev/sdb1",fstype="xfs",mountpoint="/data"} 0',
  'node_filesystem_free_bytes{device="/dev/sdc1",fstype="btrfs",mountpoint="/backup"} 1000',
  'node_filesystem_size_bytes{device="/dev/sdc1",fstype="btrfs",mountpoint="/backup"} 5000',
  'node_filesystem_size_bytes{device="overlay",fstype="overlay",mountpoint="/etc/hosts"} 3000',
  '',
].join('\n');

async function withFetch(impl: (input: string, init?: { signal?: AbortSignal }) => Promise<unknown>, run: () => Promise<void>) {
  const originalFetch = globalThis.fetch;
  Object.defineProperty(globalThis, 'fetch', { configurable: true, value: impl });
  try {
    await run();
  } finally {
    Object.defineProperty(globalThis, 'fetch', { configurable: true, value: originalFetch });
  }
}

test('parsePrometheusMetrics: 单次采样 CPU 使用率 (total 含 idle)', () => {
  const snapshot = parsePrometheusMetrics(EXPOSITION);
  assert.equal(snapshot.isValid, true);
  assert.equal(snapshot.errorMessage, undefined);
  assert.equal(snapshot.cpuIdleSecondsTotal, 100);
  assert.equal(snapshot.cpuTotalSecondsTotal, 400);
  assert.equal(snapshot.cpuUsagePercent, 75);
});

test('parsePrometheusMetrics: 内存总量与可用量', () => {
  const snapshot = parsePrometheusMetrics(EXPOSITION);
  assert.equal(snapshot.memoryTotalBytes, 8_589_934_592);
  assert.equal(snapshot.memoryAvailableBytes, 4_294_967_296);
});

test('parsePrometheusMetrics: 过滤伪文件系统、零容量与非允许类型，并按路径排序', () => {
  const snapshot = parsePrometheusMetrics(EXPOSITION);
  assert.deepEqual(snapshot.mounts, [
    { mountPoint: '/', totalBytes: 100_000_000_000, availableBytes: 40_000_000_000, filesystemType: 'ext4' },
    { mountPoint: '/backup', totalBytes: 5000, availableBytes: 1000, filesystemType: 'btrfs' },
  ]);
});

test('parsePrometheusMetrics: 同一挂载点上非允许类型的 avail/free 行不覆盖已有数值', () => {
  const snapshot = parsePrometheusMetrics(
    [
      'node_cpu_seconds_total{cpu="0",mode="idle"} 10',
      'node_memory_MemTotal_bytes 1024',
      'node_filesystem_size_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 100',
      'node_filesystem_avail_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 40',
      'node_filesystem_free_bytes{device="/dev/sda1",fstype="ext4",mountpoint="/"} 50',
      'node_filesystem_avail_bytes{device="rootfs",fstype="rootfs",mountpoint="/"} 0',
      'node_filesystem_free_bytes{device="rootfs",fstype="rootfs",mountpoint="/"} 0',
      'node_filesystem_size_bytes{device="rootfs",fstype="rootfs",mountpoint="/"} 7',
      'node_filesystem_avail_bytes{device="sysfs",fstype="ext4",mountpoint="/sys/fs"} 9',
    ].join('\n'),
  );
  assert.deepEqual(snapshot.mounts, [{ mountPoint: '/', totalBytes: 100, availableBytes: 40, filesystemType: 'ext4' }]);
});

test('parsePrometheusMetrics: 多核多模式累加', () => {
  const snapshot = parsePrometheusMetrics(
    [
      'node_cpu_seconds_total{cpu="0",mode="idle"} 50',
      'node_cpu_seconds_total{cpu="1",mode="idle"} 50',
      'node_cpu_seconds_total{cpu="0",mode="system"} 25',
      'node_cpu_seconds_total{cpu="1",mode="iowait"} 75',
      'node_memory_MemTotal_bytes 1024',
    ].join('\r\n'),
  );
  assert.equal(snapshot.cpuIdleSecondsTotal, 100);
  assert.equal(snapshot.cpuTotalSecondsTotal, 200);
  assert.equal(snapshot.cpuUsagePercent, 50);
  assert.equal(snapshot.memoryTotalBytes, 1024);
});

test('parsePrometheusMetrics: 缺少 CPU 指标时无效，且不覆盖为内存错误', () => {
  const noCpu = parsePrometheusMetrics('node_memory_MemTotal_bytes 1024\n');
  assert.equal(noCpu.isValid, false);
  assert.equal(noCpu.errorMessage, 'no CPU metrics parsed');
  assert.equal(noCpu.cpuUsagePercent, 0);

  const empty = parsePrometheusMetrics('');
  assert.equal(empty.isValid, false);
  assert.equal(empty.errorMessage, 'no CPU metrics parsed');
});

test('parsePrometheusMetrics: 缺少内存指标时无效', () => {
  const snapshot = parsePrometheusMetrics('node_cpu_seconds_total{cpu="0",mode="idle"} 10\n');
  assert.equal(snapshot.isValid, false);
  assert.equal(snapshot.errorMessage, 'no memory metrics parsed');
  assert.equal(snapshot.cpuUsagePercent, 0);
});

test('parsePrometheusMetrics: 无法解析的值保持零值，不中断扫描', () => {
  const snapshot = parsePrometheusMetrics(
    [
      'node_cpu_seconds_total{cpu="0",mode="idle"} 1e+',
      'node_cpu_seconds_total{cpu="0",mode="user"} 40',
      'node_memory_MemTotal_bytes abc',
      'node_memory_MemAvailable_bytes 10',
    ].join('\n'),
  );
  assert.equal(snapshot.cpuTotalSecondsTotal, 40);
  assert.equal(snapshot.cpuIdleSecondsTotal, 0);
  assert.equal(snapshot.memoryTotalBytes, 0);
  assert.equal(snapshot.memoryAvailableBytes, 10);
  assert.equal(snapshot.isValid, false);
});

test('computeCpuUsagePercent: 分母为零返回 0 并夹在 0..100', () => {
  assert.equal(computeCpuUsagePercent(0, 0), 0);
  assert.equal(computeCpuUsagePercent(500, 400), 0);
  assert.equal(computeCpuUsagePercent(0, 400), 100);
});

test('isPseudoMount: /proc /sys /dev /run /etc/ 前缀', () => {
  assert.equal(isPseudoMount('/proc/foo'), true);
  assert.equal(isPseudoMount('/run/docker'), true);
  assert.equal(isPseudoMount('/etc/hostname'), true);
  assert.equal(isPseudoMount('/'), false);
  assert.equal(isPseudoMount('/data'), false);
});

test('fetchHostMetrics: 成功拉取并解析', async () => {
  const urls: string[] = [];
  await withFetch(
    async (input) => {
      urls.push(input);
      return { ok: true, status: 200, text: async () => EXPOSITION };
    },
    async () => {
      const snapshot = await fetchHostMetrics('http://node-exporter:9100/metrics');
      assert.equal(snapshot.isValid, true);
      assert.equal(snapshot.cpuUsagePercent, 75);
    },
  );
  assert.deepEqual(urls, ['http://node-exporter:9100/metrics']);
});

test('fetchHostMetrics: 非 2xx 转为无效快照', async () => {
  await withFetch(
    async () => ({ ok: false, status: 503, text: async () => '' }),
    async () => {
      const snapshot = await fetchHostMetrics('http://node-exporter:9100/metrics');
      assert.equal(snapshot.isValid, false);
      assert.equal(snapshot.errorMessage, 'HTTP 503');
      assert.equal(snapshot.cpuTotalSecondsTotal, 0);
    },
  );
});

test('fetchHostMetrics: 连接失败转为无效快照', async () => {
  await withFetch(
    async () => {
      throw new TypeError('fetch failed');
    },
    async () => {
      const snapshot = await fetchHostMetrics('http://node-exporter:9100/metrics');
      assert.equal(snapshot.isValid, false);
      assert.equal(snapshot.errorMessage, 'Connection failed: fetch failed');
      assert.deepEqual(snapshot.mounts, []);
    },
  );
});

test('fetchHostMetrics: 超时转为无效快照', async () => {
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
      const snapshot = await fetchHostMetrics('http://node-exporter:9100/metrics', { timeoutMs: 50 });
      assert.equal(snapshot.isValid, false);
      assert.equal(snapshot.errorMessage, 'Request timeout');
    },
  );
});
