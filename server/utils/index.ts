export { AppError, ValidationError, NotFoundError, ExternalServiceError, createValidationError, createExternalServiceError, isAbortError, getErrorMessage } from './errors';

export { createLogger, logger, redact, type Logger, type LogLevel } from './logger';

export { KeyedAsyncLock } from './asyncLock';
