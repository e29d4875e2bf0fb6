import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';

export type Metrics = {
  registry: Registry;
  httpRequestDurationMs: Histogram<'method' | 'route' | 'status'>;
  queriesTotal: Counter<'query' | 'status'>;
  totalSupply: Gauge;
};

export function createMetrics(params?: { collectDefault?: boolean }): Metrics {
  const registry = new Registry();

  if (params?.collectDefault ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const httpRequestDurationMs = new Histogram({
    name: 'reflex_http_request_duration_ms',
    help: 'HTTP request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
    registers: [registry],
  });

  const queriesTotal = new Counter({
    name: 'reflex_ledger_queries_total',
    help: 'Ledger queries served, labeled by query and outcome',
    labelNames: ['query', 'status'] as const,
    registers: [registry],
  });

  const totalSupply = new Gauge({
    name: 'reflex_total_supply',
    help: 'Token total supply at the last supply query (smallest unit)',
    registers: [registry],
  });

  return { registry, httpRequestDurationMs, queriesTotal, totalSupply };
}
