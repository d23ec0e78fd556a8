/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp, startServer } from '@/api';
 *
 * const app = createApp({ router, environment: 'development' });
 * const server = await startServer(app, { port: 3000, hostname: '0.0.0.0' });
 * ```
 */

export {
  createApp,
  startServer,
  type AppOptions,
  type ServerOptions,
  type RunningServer,
} from './server';

export {
  errorHandler,
  loggerMiddleware,
  validateBody,
  type ErrorHandlerOptions,
  type LoggerConfig,
} from './middleware';

export { success, error } from './utils/response';

export type {
  ApiResponse,
  ApiError,
  ApiErrorResponse,
  ApiResult,
  ValidationErrorDetail,
  IncomingUpdateInput,
  UpdateHandledData,
} from './types';
export { incomingUpdateSchema } from './types';
