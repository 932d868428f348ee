export { ConnectError, FetchError, ProtocolError } from './errors.ts';
export { PacketWriter, BufferReader, readVarInt, writeVarInt, readString, writeString, framePacket } from './codec/varint.ts';
export type { ByteSource } from './codec/varint.ts';
export type { GameServerProbe, ProbeOptions, StatusFallback } from './query/types.ts';
export { MinecraftJavaProbe } from './query/minecraft-java.ts';
export { BedrockProbe } from './query/bedrock.ts';
export { SourceEngineProbe } from './query/source-engine.ts';
export { RconProbe } from './query/rcon.ts';
export { queryMcStatusApi } from './query/mcstatus-fallback.ts';
export { createServerProbe, queryServer } from './query/registry.ts';
export type { ServerProbeOptions } from './query/registry.ts';
export { extractPlayerCount, formatPlayerCount } from './players/player-count.ts';
export { fetchHostMetrics, parsePrometheusMetrics } from './host-metrics/node-exporter.ts';
export { HostMetricsCache, getHostMetrics } from './host-metrics/service.ts';
export { diskUsedBytes, diskUsagePercent, memoryUsedBytes, memoryUsagePercent, formatBytes } from './host-metrics/format.ts';
export { getDefaultAllocation, getDisplayIp, getConnectAddress, getQueryIp, isInternalIp, resolveProbeTarget } from './network/allocation.ts';
export { loadKeeperConfig } from './config/env.ts';
export type { KeeperConfig, MonitoredServer } from './config/env.ts';
export { runPollCycle, pollServer, describeServerAddress, resolveServerTarget, summarizeCycle } from './scheduler/poll-cycle.ts';
