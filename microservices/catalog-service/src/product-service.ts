import type { NextFunction, Request, Response } from 'express';
import { SpanStatusCode, type Span } from '@opentelemetry/api';
import type { ServiceConfig } from './config';
import type { DocumentFilter, DocumentStore, StoredDocument } from './database';
import { HttpError, errorMessage } from './errors';
import type { Logger } from './logger';
import type { ServiceMetrics } from './metrics';
import {
  FeaturedQuery,
  PRODUCT_COLLECTION,
  ProductInput,
  ProductListQuery,
  buildProductFilter,
  featuredFilter,
  toPublicProduct,
} from './products';
import { tracer } from './tracing';

export interface ProductServiceOptions {
  store: DocumentStore | null;
  logger: Logger;
  metrics: ServiceMetrics;
  /** Only used to report which database settings are present. */
  database: ServiceConfig['database'];
}

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

const MAX_REPORTED_COLLECTIONS = 10;
const MAX_REPORTED_ERROR_LENGTH = 50;

function failSpan(span: Span, error: unknown): void {
  span.recordException(error instanceof Error ? error : errorMessage(error));
  span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(error) });
}

export class ProductService {
  private readonly store: DocumentStore | null;
  private readonly logger: Logger;
  private readonly metrics: ServiceMetrics;
  private readonly database: ServiceConfig['database'];

  constructor(options: ProductServiceOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.database = options.database;
  }

  private async timed<T>(operation: string, collection: string, run: () => Promise<T>): Promise<T> {
    const end = this.metrics.dbQueryDuration.startTimer({ operation, collection });
    try {
      return await run();
    } finally {
      end();
    }
  }

  async listProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
    const span = tracer.startSpan('listProducts');

    try {
      const query = ProductListQuery.parse(req.query);
      span.setAttribute('products.limit', query.limit);

      const store = this.store;
      if (!store) {
        // No database: empty result
        span.setAttribute('db.available', false);
        res.json([]);
        return;
      }

      const filter = buildProductFilter(query);
      const docs = await this.timed('find', PRODUCT_COLLECTION, () =>
        store.find(PRODUCT_COLLECTION, filter, { limit: query.limit }),
      );

      span.setStatus({ code: SpanStatusCode.OK });
      this.logger.debug('Listed products', { count: docs.length, category: query.category, q: query.q });

      res.json(docs.map(toPublicProduct));
    } catch (error) {
      failSpan(span, error);
      next(error);
    } finally {
      span.end();
    }
  }

  async createProduct(req: Request, res: Response, next: NextFunction): Promise<void> {
    const span = tracer.startSpan('createProduct');

    try {
      const product = ProductInput.parse(req.body);

      const store = this.store;
      if (!store) {
        throw new HttpError(500, 'Database non disponibile');
      }

      const id = await this.timed('insert', PRODUCT_COLLECTION, () => store.insert(PRODUCT_COLLECTION, product));

      span.setAttribute('product.id', id);
      span.setStatus({ code: SpanStatusCode.OK });
      this.logger.info('Product created', { productId: id, category: product.category });

      res.status(201).json({ id });
    } catch (error) {
      failSpan(span, error);
      next(error);
    } finally {
      span.end();
    }
  }

  async featuredProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
    const span = tracer.startSpan('featuredProducts');

    try {
      const { limit } = FeaturedQuery.parse(req.query);
      span.setAttribute('products.limit', limit);

      const store = this.store;
      if (!store) {
        span.setAttribute('db.available', false);
        res.json([]);
        return;
      }

      const docs = await this.selectFeatured(store, limit);

      span.setStatus({ code: SpanStatusCode.OK });
      res.json(docs.map(toPublicProduct));
    } catch (error) {
      failSpan(span, error);
      next(error);
    } finally {
      span.end();
    }
  }

  /**
   * Products tagged `featured` first, then the most recently created ones
   * until `limit` is reached. Products already picked are not repeated.
   */
  async selectFeatured(store: DocumentStore, limit: number): Promise<StoredDocument[]> {
    const found = await this.timed('find', PRODUCT_COLLECTION, () =>
      store.find(PRODUCT_COLLECTION, featuredFilter(), { limit }),
    );

    if (found.length < limit) {
      const exclude: DocumentFilter = found.length > 0 ? { _id: { $nin: found.map((doc) => doc._id) } } : {};
      const recent = await this.timed('find', PRODUCT_COLLECTION, () =>
        store.find(PRODUCT_COLLECTION, exclude, {
          limit: limit - found.length,
          sort: { field: 'created_at', direction: 'desc' },
        }),
      );
      found.push(...recent);
    }

    return found.slice(0, limit);
  }

  async diagnostics(_req: Request, res: Response): Promise<void> {
    const report: DiagnosticsReport = {
      backend: '✅ Running',
      database: '⚠️  Available but not initialized',
      database_url: this.database.url ? '✅ Set' : '❌ Not Set',
      database_name: this.database.name ? '✅ Set' : '❌ Not Set',
      connection_status: 'Not Connected',
      collections: [],
    };

    const store = this.store;
    if (store) {
      report.connection_status = 'Connected';
      try {
        const collections = await this.timed('listCollections', '*', () => store.listCollections());
        report.collections = collections.slice(0, MAX_REPORTED_COLLECTIONS);
        report.database = '✅ Connected & Working';
      } catch (error) {
        this.logger.warn('Diagnostics could not list collections:', error);
        report.database = `⚠️  Connected but Error: ${errorMessage(error).slice(0, MAX_REPORTED_ERROR_LENGTH)}`;
      }
    }

    res.json(report);
  }

  async readiness(_req: Request, res: Response): Promise<void> {
    const store = this.store;
    if (!store) {
      res.status(503).json({ status: 'not ready', error: 'Database not available' });
      return;
    }

    try {
      await this.timed('ping', '*', () => store.ping());
      res.json({ status: 'ready' });
    } catch (error) {
      res.status(503).json({ status: 'not ready', error: errorMessage(error) });
    }
  }
}
