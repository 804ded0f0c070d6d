export {
  AppError,
  ValidationError,
  NotFoundError,
  ThrottledError,
  ExecutionError,
  TimeoutError,
  CacheUnavailableError,
  errorMessage,
  toError,
  type FieldError,
  type ErrorDetails,
} from './app-error';
export { ErrorCode, ERROR_HTTP_STATUS } from './error-codes';
