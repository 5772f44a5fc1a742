/**
 * HTTP error types and the Express handlers that render them
 */

import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import type { ErrorResponse, FieldIssue } from '../types/index.js';

// ============================================
// Error Types
// ============================================

export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly headers: Record<string, string> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): ErrorResponse {
    return { error: this.message };
  }
}

export class ValidationError extends HttpError {
  constructor(readonly details: FieldIssue[], message = 'Validation failed') {
    super(422, message);
  }

  toBody(): ErrorResponse {
    return { error: this.message, details: this.details };
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Invalid API key') {
    super(401, message, { 'WWW-Authenticate': 'API-Key' });
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'News item not found') {
    super(404, message);
  }
}

// ============================================
// Client Errors from Express and body-parser
// ============================================

/**
 * Status of an error raised with an http-errors style `status` or
 * `statusCode` in the 4xx range, e.g. body-parser's 415 or a 400 from
 * param decoding. Null for anything else.
 */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error)) return null;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return null;
}

/** express.json() tags unparseable bodies with type "entity.parse.failed" */
function isMalformedBody(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * The router raises a URIError when a path parameter is not valid
 * percent-encoding. The only parameter is the item id.
 */
function isParamDecodeError(err: Error): boolean {
  return err instanceof URIError;
}

// ============================================
// Handlers
// ============================================

export function notFoundHandler(): RequestHandler {
  return (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' } satisfies ErrorResponse);
  };
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HttpError) {
      res.status(err.status).set(err.headers).json(err.toBody());
      return;
    }

    const status = clientErrorStatus(err);
    if (status !== null && err instanceof Error) {
      if (isMalformedBody(err)) {
        res.status(422).json(new ValidationError([{ field: '(body)', message: 'Malformed JSON body' }]).toBody());
      } else if (isParamDecodeError(err)) {
        res.status(422).json(new ValidationError([{ field: 'id', message: 'id must be a positive integer' }]).toBody());
      } else {
        res.status(status).json({ error: err.message } satisfies ErrorResponse);
      }
      return;
    }

    console.error(`API Error: ${req.method} ${req.originalUrl}`, err);
    res.status(500).json({ error: 'Internal server error' } satisfies ErrorResponse);
  };
}
