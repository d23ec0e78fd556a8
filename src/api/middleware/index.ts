export { errorHandler, type ErrorHandlerOptions } from './error-handler';
export {
  loggerMiddleware,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './logger';
export { validateBody, toValidationDetails } from './validate';
