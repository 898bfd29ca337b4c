import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface AppMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  upstreamCalls: Counter<string>;
  cacheLookups: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): AppMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'photo_web_';

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of HTTP requests served',
    labelNames: ['route', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'HTTP request duration in seconds',
    labelNames: ['route', 'status'],
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  const upstreamCalls = new Counter({
    name: `${prefix}upstream_calls_total`,
    help: 'Flickr API calls by method and outcome',
    labelNames: ['method', 'outcome'],
    registers: [registry],
  });

  const cacheLookups = new Counter({
    name: `${prefix}cache_lookups_total`,
    help: 'Response cache lookups by policy and result',
    labelNames: ['policy', 'result'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    upstreamCalls,
    cacheLookups,
  };
}
