import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { CATEGORIES } from './categories';
import type { ServiceConfig } from './config';
import type { DocumentStore } from './database';
import { createErrorHandler, notFoundHandler } from './errors';
import type { Logger } from './logger';
import type { ServiceMetrics } from './metrics';
import { ProductService } from './product-service';

export interface AppOptions {
  store: DocumentStore | null;
  logger: Logger;
  metrics: ServiceMetrics;
  database: ServiceConfig['database'];
}

export function createApp(options: AppOptions): Express {
  const { logger, metrics } = options;
  const app = express();

  // Any origin (reflected), credentials allowed
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());

  // Request id + metrics + access log
  app.use((req, res, next) => {
    const requestId = req.get('x-request-id') ?? uuidv4();
    res.setHeader('x-request-id', requestId);

    const startedAt = process.hrtime.bigint();
    const timer = metrics.httpRequestDuration.startTimer({ method: req.method });

    res.on('finish', () => {
      // Unmatched paths share one label to keep cardinality bounded
      const route = req.route ? `${req.baseUrl}${String(req.route.path)}` : 'unmatched';
      timer({ route, status: res.statusCode.toString() });

      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.http(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
        requestId,
        durationMs: Math.round(durationMs * 100) / 100,
      });
    });

    next();
  });

  const productService = new ProductService(options);

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'TopGames API attiva' });
  });

  app.get('/api/hello', (_req: Request, res: Response) => {
    res.json({ message: 'Ciao da TopGames Backend!' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.get('/ready', productService.readiness.bind(productService));
  app.get('/test', productService.diagnostics.bind(productService));

  app.get('/metrics', (_req: Request, res: Response, next: NextFunction) => {
    metrics.register
      .metrics()
      .then((body) => {
        res.set('Content-Type', metrics.register.contentType);
        res.end(body);
      })
      .catch(next);
  });

  // Catalog routes
  const router = express.Router();
  router.get('/categories', (_req: Request, res: Response) => {
    res.json(CATEGORIES);
  });
  router.get('/products', productService.listProducts.bind(productService));
  router.post('/products', productService.createProduct.bind(productService));
  router.get('/featured', productService.featuredProducts.bind(productService));

  app.use('/api', router);

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
