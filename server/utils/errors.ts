export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource', id?: string) {
    const message = id ? `${resource} '${id}' not found` : `${resource} not found`;
    super(message, 404, 'NOT_FOUND', true, { resource, id });
  }
}

export class ExternalServiceError extends AppError {
  public readonly serviceName: string;
  public readonly originalError?: Error;

  constructor(
    serviceName: string,
    message: string = 'External service error',
    originalError?: Error,
    statusCode: number = 502
  ) {
    super(message, statusCode, 'EXTERNAL_SERVICE_ERROR', true, { serviceName });
    this.serviceName = serviceName;
    this.originalError = originalError;
  }
}

export const createValidationError = (field: string, reason: string): ValidationError => {
  return new ValidationError(`Validation failed for '${field}': ${reason}`, { field, reason });
};

export const createExternalServiceError = (
  serviceName: string,
  originalError?: unknown
): ExternalServiceError => {
  const cause = originalError instanceof Error ? originalError : undefined;
  const message = cause?.message || `Failed to communicate with ${serviceName}`;
  return new ExternalServiceError(serviceName, message, cause);
};

export const isAbortError = (error: unknown): boolean => {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
};

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unexpected error occurred';
};
