/**
 * Centralized error type definitions
 * Provides a consistent error hierarchy and error codes
 */

/**
 * Base error class for all application errors
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  // Client errors
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',

  // Server errors
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
  SERVICE_NOT_CONFIGURED = 'SERVICE_NOT_CONFIGURED',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
  PIPELINE_VALIDATION_ERROR = 'PIPELINE_VALIDATION_ERROR',
  PIPELINE_EXECUTION_ERROR = 'PIPELINE_EXECUTION_ERROR',
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, additionalContext?: Record<string, unknown>) {
    const message = identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`;
    super(message, ErrorCode.NOT_FOUND, 404, true, { resource, identifier, ...additionalContext });
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.BAD_REQUEST, 400, true, context);
  }
}

export class ExternalServiceError extends AppError {
  constructor(service: string, message: string, context?: Record<string, unknown>) {
    super(
      `External service error (${service}): ${message}`,
      ErrorCode.EXTERNAL_SERVICE_ERROR,
      502,
      true,
      { service, ...context }
    );
  }
}

/**
 * Thrown when an adapter is constructed without the configuration it needs
 */
export class ServiceConfigurationError extends AppError {
  constructor(serviceName: string, missingConfig: string[]) {
    super(
      `${serviceName} not configured. Missing: ${missingConfig.join(', ')}`,
      ErrorCode.SERVICE_NOT_CONFIGURED,
      503,
      true,
      { serviceName, missingConfig }
    );
  }
}

/**
 * A pipeline step rejected its input. Never retried: the same input fails the same way.
 */
export class PipelineValidationError extends AppError {
  constructor(stepName: string, message: string = 'Input validation failed') {
    super(message, ErrorCode.PIPELINE_VALIDATION_ERROR, 400, true, { stepName });
  }
}

/**
 * Raised by callers of a pipeline whose result reports `success = false`.
 */
export class PipelineExecutionError extends AppError {
  public readonly stepErrors: string[];

  constructor(pipelineName: string, stepErrors: string[]) {
    super(
      stepErrors.length > 0 ? stepErrors.join('; ') : `Pipeline '${pipelineName}' failed`,
      ErrorCode.PIPELINE_EXECUTION_ERROR,
      500,
      true,
      { pipelineName, stepErrors }
    );
    this.stepErrors = stepErrors;
  }
}

/**
 * Standardized error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  message: string;
  statusCode: number;
  timestamp: string;
  path?: string;
  context?: Record<string, unknown>;
  stack?: string; // Only in development
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert any error to AppError
 */
export function toAppError(error: unknown, defaultMessage: string = 'An unexpected error occurred'): AppError {
  if (isAppError(error)) {
    return error;
  }

  // Client errors raised by express body parsers carry their HTTP status
  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return new AppError(error.message, ErrorCode.BAD_REQUEST, error.status, true);
  }

  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
  }

  return new AppError(defaultMessage, ErrorCode.INTERNAL_SERVER_ERROR, 500, false);
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
