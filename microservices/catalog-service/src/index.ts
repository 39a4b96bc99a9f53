import { tracerProvider } from './instrumentation';
import { createApp } from './app';
import { SERVICE_NAME, loadConfig } from './config';
import { connectStore } from './database';
import { createLogger } from './logger';
import { createMetrics } from './metrics';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.logging.level,
    lokiHost: config.logging.lokiHost,
    environment: config.logging.environment,
  });

  const store = await connectStore(config.database, logger);
  const metrics = createMetrics({ collectDefaults: true });
  const app = createApp({ store, logger, metrics, database: config.database });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`${SERVICE_NAME} listening on http://${config.host}:${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store?.close();
    await tracerProvider?.shutdown();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, (received: NodeJS.Signals) => {
      shutdown(received).catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start catalog service:', error);
  process.exit(1);
});
