import mongoose, { mongo } from 'mongoose';
import type { ServiceConfig } from './config';
import type { Logger } from './logger';

export type DocumentFilter = mongo.Filter<mongo.Document>;
export type StoredDocument = mongo.WithId<mongo.Document>;

export interface SortSpec {
  field: string;
  direction: 'asc' | 'desc';
}

export interface FindOptions {
  limit: number;
  sort?: SortSpec;
}

/**
 * Minimal document store contract used by the handlers. The handle is
 * created once at startup and passed in; `null` stands for "no database".
 */
export interface DocumentStore {
  readonly name: string;
  /** Persists a record, stamping created_at/updated_at. Resolves to the new id. */
  insert(collection: string, record: Record<string, unknown>): Promise<string>;
  find(collection: string, filter: DocumentFilter, options: FindOptions): Promise<StoredDocument[]>;
  listCollections(): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export class MongoDocumentStore implements DocumentStore {
  constructor(
    private readonly connection: mongoose.Connection,
    private readonly db: mongo.Db,
  ) {}

  get name(): string {
    return this.db.databaseName;
  }

  async insert(collection: string, record: Record<string, unknown>): Promise<string> {
    const now = new Date();
    const result = await this.db
      .collection(collection)
      .insertOne({ ...record, created_at: now, updated_at: now });
    return String(result.insertedId);
  }

  async find(collection: string, filter: DocumentFilter, options: FindOptions): Promise<StoredDocument[]> {
    const cursor = this.db.collection(collection).find(filter).limit(options.limit);
    if (options.sort) {
      cursor.sort({ [options.sort.field]: options.sort.direction === 'desc' ? -1 : 1 });
    }
    return cursor.toArray();
  }

  async listCollections(): Promise<string[]> {
    const collections = await this.db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((collection) => collection.name);
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

export async function connectStore(
  config: ServiceConfig['database'],
  logger: Logger,
): Promise<DocumentStore | null> {
  if (!config.url || !config.name) {
    logger.warn('DATABASE_URL or DATABASE_NAME not set, running without a database');
    return null;
  }

  let connection: mongoose.Connection | undefined;
  try {
    // Kept before awaiting so a failed initial connect can still be closed
    connection = mongoose.createConnection(config.url, { dbName: config.name, serverSelectionTimeoutMS: 5000 });
    await connection.asPromise();

    const db = connection.db;
    if (!db) {
      throw new Error('connection opened without a database handle');
    }

    const store = new MongoDocumentStore(connection, db);
    await store.ping();
    logger.info(`Connected to database ${store.name}`);
    return store;
  } catch (error) {
    logger.error('Failed to connect to database:', error);
    if (connection) {
      await connection.close().catch((closeError: unknown) => {
        logger.warn('Failed to close database connection:', closeError);
      });
    }
    return null;
  }
}
