/**
 * Shared-secret check for mutating routes
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from './errors.js';

export interface ApiKeyOptions {
  /** The configured secret; requests must present it verbatim */
  apiKey: string;
  /** Header carrying the secret */
  header: string;
}

/**
 * Reject the request with 401 unless the header exactly matches the secret.
 * Runs before body parsing so unauthenticated payloads are never inspected.
 */
export function requireApiKey(options: ApiKeyOptions): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const presented = req.get(options.header);
    if (presented !== options.apiKey) {
      next(new UnauthorizedError());
      return;
    }
    next();
  };
}
