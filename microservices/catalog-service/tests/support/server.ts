import type { Server } from 'http';
import { createApp } from '../../src/app';
import type { ServiceConfig } from '../../src/config';
import type { DocumentStore } from '../../src/database';
import { createLogger } from '../../src/logger';
import { createMetrics, type ServiceMetrics } from '../../src/metrics';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export interface TestServerOptions {
  store: DocumentStore | null;
  database?: ServiceConfig['database'];
  metrics?: ServiceMetrics;
}

export async function startTestServer(options: TestServerOptions): Promise<TestServer> {
  const app = createApp({
    store: options.store,
    logger: createLogger({ silent: true }),
    metrics: options.metrics ?? createMetrics(),
    database: options.database ?? {},
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('test server is not bound to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
