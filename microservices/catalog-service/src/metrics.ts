import promClient from 'prom-client';

export interface ServiceMetrics {
  register: promClient.Registry;
  httpRequestDuration: promClient.Histogram<'method' | 'route' | 'status'>;
  dbQueryDuration: promClient.Histogram<'operation' | 'collection'>;
}

export interface MetricsOptions {
  /** Also collect the default Node.js process metrics into the registry. */
  collectDefaults?: boolean;
}

// One registry per app so several apps can live in the same process
export function createMetrics(options: MetricsOptions = {}): ServiceMetrics {
  const register = new promClient.Registry();

  if (options.collectDefaults) {
    promClient.collectDefaultMetrics({ register });
  }

  const httpRequestDuration = new promClient.Histogram({
    name: 'http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [register],
  });

  const dbQueryDuration = new promClient.Histogram({
    name: 'db_query_duration_seconds',
    help: 'Duration of database queries in seconds',
    labelNames: ['operation', 'collection'] as const,
    registers: [register],
  });

  return { register, httpRequestDuration, dbQueryDuration };
}
