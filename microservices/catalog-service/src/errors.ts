import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ZodError } from 'zod';
import type { Logger } from './logger';

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

// body-parser tags the errors it raises with a `type`
function isMalformedBody(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

// body-parser's own client errors (413, 415, ...) carry a 4xx status
function clientErrorStatus(error: unknown): number | undefined {
  if (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }
  return undefined;
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Not found' });
};

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (error instanceof ZodError) {
      res.status(422).json({ error: 'Validation failed', details: toValidationIssues(error) });
      return;
    }

    if (isMalformedBody(error)) {
      res.status(400).json({ error: 'Invalid JSON body' });
      return;
    }

    if (error instanceof HttpError) {
      if (error.status >= 500) {
        logger.error(`${req.method} ${req.path} failed: ${error.message}`);
      }
      res.status(error.status).json({ error: error.message });
      return;
    }

    const clientStatus = clientErrorStatus(error);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({ error: errorMessage(error) });
      return;
    }

    logger.error(`Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: 'Internal server error' });
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
