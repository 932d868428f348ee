export * from './types/probe.ts';
export * from './types/host-metrics.ts';
