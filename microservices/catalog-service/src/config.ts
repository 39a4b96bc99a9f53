import { z } from 'zod';

export const SERVICE_NAME = 'catalog-service';
export const SERVICE_VERSION = '1.0.0';

// Empty strings coming from .env files count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const schema = z.object({
  NODE_ENV: z.enum(['production', 'staging', 'development', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().min(1).default('0.0.0.0'),

  // Database
  DATABASE_URL: optionalString,
  DATABASE_NAME: optionalString,

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  LOKI_HOST: optionalString.pipe(z.string().url().optional()),
  ENVIRONMENT: z.string().min(1).default('development'),

  // Tracing
  OTEL_EXPORTER_OTLP_ENDPOINT: optionalString.pipe(z.string().url().optional()),
});

export type LogLevel = z.infer<typeof schema>['LOG_LEVEL'];

export interface ServiceConfig {
  nodeEnv: 'production' | 'staging' | 'development' | 'test';
  port: number;
  host: string;
  database: {
    url?: string;
    name?: string;
  };
  logging: {
    level: LogLevel;
    lokiHost?: string;
    environment: string;
  };
  tracing: {
    endpoint?: string;
  };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw = schema.parse(source);

  return {
    nodeEnv: raw.NODE_ENV,
    port: raw.PORT,
    host: raw.HOST,
    database: {
      url: raw.DATABASE_URL,
      name: raw.DATABASE_NAME,
    },
    logging: {
      level: raw.LOG_LEVEL,
      lokiHost: raw.LOKI_HOST,
      environment: raw.ENVIRONMENT,
    },
    tracing: {
      endpoint: raw.OTEL_EXPORTER_OTLP_ENDPOINT,
    },
  };
}
