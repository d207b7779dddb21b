/**
 * Error types shared by the API and web services, and their mapping to
 * problem details responses.
 */

import { Logger, defaultLogger } from './logger';

export enum WeatherHubErrorType {
  /** Request input failed validation */
  VALIDATION_ERROR = 'validation_error',

  /** The National Weather Service answered with an error or not at all */
  UPSTREAM_ERROR = 'upstream_error',

  /** Failure thrown on purpose to demonstrate error telemetry */
  INJECTED_FAILURE = 'injected_failure',

  CACHE_ERROR = 'cache_error',

  DATABASE_ERROR = 'database_error',

  CONFIGURATION_ERROR = 'configuration_error',

  NOT_FOUND = 'not_found',

  UNKNOWN_ERROR = 'unknown_error'
}

export interface ErrorContext {
  errorType: WeatherHubErrorType;

  operation?: string;

  timestamp: Date;

  details?: Record<string, unknown>;
}

export class WeatherHubError extends Error {
  public readonly context: ErrorContext;

  constructor(
    message: string,
    errorType: WeatherHubErrorType,
    operation?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WeatherHubError';
    this.context = {
      errorType,
      operation,
      timestamp: new Date(),
      details
    };
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Operation: ${this.context.operation || 'unknown'})`;
  }
}

export class ValidationError extends WeatherHubError {
  constructor(message: string, operation?: string, details?: Record<string, unknown>) {
    super(message, WeatherHubErrorType.VALIDATION_ERROR, operation, details);
    this.name = 'ValidationError';
  }
}

export class NwsUpstreamError extends WeatherHubError {
  /** HTTP status of the upstream response, when one arrived */
  public readonly status?: number;

  constructor(message: string, status?: number, operation?: string, details?: Record<string, unknown>) {
    super(message, WeatherHubErrorType.UPSTREAM_ERROR, operation, { ...details, status });
    this.name = 'NwsUpstreamError';
    this.status = status;
  }
}

export class InjectedFailureError extends WeatherHubError {
  constructor(message: string, operation?: string, details?: Record<string, unknown>) {
    super(message, WeatherHubErrorType.INJECTED_FAILURE, operation, details);
    this.name = 'InjectedFailureError';
  }
}

export class NotFoundError extends WeatherHubError {
  constructor(message: string, operation?: string) {
    super(message, WeatherHubErrorType.NOT_FOUND, operation);
    this.name = 'NotFoundError';
  }
}

/**
 * RFC 7807 problem details body
 */
export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
}

const PROBLEM_TYPES: Record<number, { type: string; title: string }> = {
  400: { type: 'https://tools.ietf.org/html/rfc9110#section-15.5.1', title: 'Bad Request' },
  404: { type: 'https://tools.ietf.org/html/rfc9110#section-15.5.5', title: 'Not Found' },
  500: { type: 'https://tools.ietf.org/html/rfc9110#section-15.6.1', title: 'An error occurred while processing your request.' },
  503: { type: 'https://tools.ietf.org/html/rfc9110#section-15.6.4', title: 'Service Unavailable' }
};

/**
 * Build a problem details body for a status code
 */
export function createProblemDetails(status: number, detail?: string, instance?: string): ProblemDetails {
  const known = PROBLEM_TYPES[status] ?? PROBLEM_TYPES[500];
  return {
    type: known.type,
    title: known.title,
    status,
    detail,
    instance
  };
}

/**
 * HTTP status a given error is reported with
 */
export function statusCodeFor(error: Error): number {
  if (!(error instanceof WeatherHubError)) {
    return 500;
  }

  switch (error.context.errorType) {
    case WeatherHubErrorType.VALIDATION_ERROR:
      return 400;
    case WeatherHubErrorType.UPSTREAM_ERROR:
    case WeatherHubErrorType.NOT_FOUND:
      return 404;
    default:
      return 500;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class ErrorHandler {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger || defaultLogger.createSubLogger('error-handler');
  }

  /**
   * Log an error according to its type and return the context it was logged with
   */
  handleError(error: Error, context?: Partial<ErrorContext>): ErrorContext {
    const errorContext: ErrorContext = {
      errorType: WeatherHubErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    if (error instanceof WeatherHubError) {
      errorContext.errorType = error.context.errorType;
      errorContext.operation = error.context.operation || errorContext.operation;
      errorContext.details = {
        ...error.context.details,
        ...errorContext.details
      };
    }

    this.logError(error, errorContext);
    return errorContext;
  }

  /**
   * Map an error to the problem details returned to the client
   */
  toProblemDetails(error: Error, instance?: string): ProblemDetails {
    const status = statusCodeFor(error);
    // Internal messages stay in the logs
    const detail = status === 500 ? undefined : error.message;
    return createProblemDetails(status, detail, instance);
  }

  private logError(error: Error, context: ErrorContext): void {
    const logData = {
      errorType: context.errorType,
      operation: context.operation,
      details: context.details
    };

    switch (context.errorType) {
      case WeatherHubErrorType.VALIDATION_ERROR:
      case WeatherHubErrorType.NOT_FOUND:
        this.logger.warn(`${context.errorType}: ${error.message}`, logData, context.operation);
        break;

      case WeatherHubErrorType.UPSTREAM_ERROR:
        this.logger.error(`Weather service request failed: ${error.message}`, error, logData, context.operation);
        break;

      case WeatherHubErrorType.INJECTED_FAILURE:
        this.logger.error(`Injected failure: ${error.message}`, error, logData, context.operation);
        break;

      case WeatherHubErrorType.CONFIGURATION_ERROR:
        this.logger.fatal(`Configuration error: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`Unhandled error: ${error.message}`, error, logData, context.operation);
    }
  }

  /**
   * Wrap an async operation so its failures are logged before being rethrown
   */
  wrapOperation<T>(operation: () => Promise<T>, operationName?: string): () => Promise<T> {
    return async (): Promise<T> => {
      try {
        return await operation();
      } catch (error) {
        this.handleError(toError(error), { operation: operationName });
        throw error;
      }
    };
  }
}

