/**
 * Server Module Exports
 */

export { ApiServer, type ServerConfig } from './express.js';
export { createNewsRouter, type NewsRouterDeps } from './routes/news.js';
export { requireApiKey, type ApiKeyOptions } from './auth.js';
export {
  HttpError,
  ValidationError,
  UnauthorizedError,
  NotFoundError,
  errorHandler,
  notFoundHandler,
} from './errors.js';
