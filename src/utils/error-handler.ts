/**
 * Site error types and handling
 */

import { AppLogger, LogData, defaultLogger } from './logger';

export enum SiteErrorType {
  /** Bad or incomplete input from a visitor */
  VALIDATION_ERROR = 'validation_error',

  /** Missing or invalid deployment configuration */
  CONFIGURATION_ERROR = 'configuration_error',

  /** SMTP or webhook delivery failed */
  EMAIL_DELIVERY_ERROR = 'email_delivery_error',

  /** Lead store failure */
  STORAGE_ERROR = 'storage_error',

  NOT_FOUND = 'not_found',

  UNKNOWN_ERROR = 'unknown_error'
}

export interface SiteErrorContext {
  errorType: SiteErrorType;

  operation?: string;

  timestamp: Date;

  details?: LogData;
}

const STATUS_BY_TYPE: Record<SiteErrorType, number> = {
  [SiteErrorType.VALIDATION_ERROR]: 400,
  [SiteErrorType.CONFIGURATION_ERROR]: 500,
  [SiteErrorType.EMAIL_DELIVERY_ERROR]: 502,
  [SiteErrorType.STORAGE_ERROR]: 500,
  [SiteErrorType.NOT_FOUND]: 404,
  [SiteErrorType.UNKNOWN_ERROR]: 500
};

export class SiteError extends Error {
  public readonly context: SiteErrorContext;

  constructor(
    message: string,
    errorType: SiteErrorType,
    operation?: string,
    details?: LogData
  ) {
    super(message);
    this.name = 'SiteError';
    this.context = {
      errorType,
      operation,
      timestamp: new Date(),
      details
    };
  }

  get errorType(): SiteErrorType {
    return this.context.errorType;
  }

  /**
   * HTTP status for this error
   */
  get status(): number {
    return STATUS_BY_TYPE[this.context.errorType];
  }

  toString(): string {
    return `[${this.context.errorType}] ${this.message} (Operation: ${this.context.operation || 'unknown'})`;
  }
}

/**
 * Raised when the process cannot start with the configuration it was given
 */
export class ConfigurationError extends SiteError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Invalid configuration: ${problems.join('; ')}`,
      SiteErrorType.CONFIGURATION_ERROR,
      'load-config',
      { problems }
    );
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function isSiteError(error: unknown): error is SiteError {
  return error instanceof SiteError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class SiteErrorHandler {
  private logger: AppLogger;

  constructor(logger?: AppLogger) {
    this.logger = logger || defaultLogger.createSubLogger('error-handler');
  }

  /**
   * Log an error by type and return the HTTP status it maps to
   */
  handleError(error: unknown, context?: Partial<SiteErrorContext>): number {
    const err = toError(error);
    const errorContext: SiteErrorContext = {
      errorType: SiteErrorType.UNKNOWN_ERROR,
      timestamp: new Date(),
      ...context
    };

    if (err instanceof SiteError) {
      errorContext.errorType = err.context.errorType;
      errorContext.operation = err.context.operation || errorContext.operation;
      errorContext.details = {
        ...err.context.details,
        ...errorContext.details
      };
    }

    this.logError(err, errorContext);
    return STATUS_BY_TYPE[errorContext.errorType];
  }

  private logError(error: Error, context: SiteErrorContext): void {
    const logData: LogData = {
      errorType: context.errorType,
      operation: context.operation,
      details: context.details
    };

    switch (context.errorType) {
      case SiteErrorType.VALIDATION_ERROR:
      case SiteErrorType.NOT_FOUND:
        this.logger.info(`Request rejected: ${error.message}`, logData, context.operation);
        break;

      case SiteErrorType.EMAIL_DELIVERY_ERROR:
        this.logger.warn(`Delivery failed: ${error.message}`, logData, context.operation);
        break;

      case SiteErrorType.CONFIGURATION_ERROR:
        this.logger.fatal(`Configuration error: ${error.message}`, error, logData, context.operation);
        break;

      default:
        this.logger.error(`Unhandled error: ${error.message}`, error, logData, context.operation);
    }
  }
}

export const siteErrorHandler = new SiteErrorHandler();
