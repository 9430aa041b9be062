import type { Request, Response, NextFunction } from 'express';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** The target site could not be fetched or parsed. */
export class FetchError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super(400, 'SCRAPE_FAILED', 'Failed to scrape the website.', details);
    this.name = 'FetchError';
  }
}

/** The model call failed or its answer did not match the record shape. */
export class ExtractionError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super(500, 'EXTRACTION_FAILED', 'Failed to extract information.', details);
    this.name = 'ExtractionError';
  }
}

/** The vector index or the embedding model could not be reached. */
export class StoreError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super(500, 'STORE_UNAVAILABLE', 'Failed to reach the VC index.', details);
    this.name = 'StoreError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
    },
  });
}

function clientErrorStatus(err: Error): number | undefined {
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  console.error('Error:', err);

  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      error: {
        code: err.code,
        message: err.message,
        details: err.details,
      },
    });
    return;
  }

  // body-parser errors carry their own status (malformed JSON, payload too large)
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined) {
    res.status(clientStatus).json({
      error: err instanceof SyntaxError
        ? { code: 'INVALID_JSON', message: 'Request body is not valid JSON' }
        : { code: clientStatus === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST', message: err.message },
    });
    return;
  }

  // Default error
  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: process.env['NODE_ENV'] === 'production'
        ? 'An unexpected error occurred'
        : err.message,
    },
  });
}
