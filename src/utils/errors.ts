/**
 * Application error hierarchy and fatal error reporting
 */

import { ZodError } from 'zod';
import { Logger } from 'winston';

// Base error classes
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'APP_ERROR',
    public isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public missing: string[] = [],
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Entity resolution or history pagination failed (network, auth, flood wait).
 * Never retried here: the run is expected to stop.
 */
export class TransientFetchError extends AppError {
  constructor(
    message: string,
    public entityId: string,
    public originalError?: unknown,
  ) {
    super(message, 'TRANSIENT_FETCH_ERROR');
    this.name = 'TransientFetchError';
    if (originalError instanceof Error) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * A single file could not be written. Scoped to one message.
 */
export class SinkWriteError extends AppError {
  constructor(
    public targetPath: string,
    public originalError?: unknown,
  ) {
    super(
      `Failed to save ${targetPath}: ${describeError(originalError)}`,
      'SINK_WRITE_ERROR',
    );
    this.name = 'SinkWriteError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
};

// Validation error handler
export const fromZodError = (error: ZodError): ValidationError => {
  const messages = error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });

  return new ValidationError(
    `Validation failed: ${messages.join(', ')}`,
    error.errors,
  );
};

/**
 * Logs an error that ends the run and returns the process exit code
 */
export const reportFatalError = (error: unknown, logger: Logger): number => {
  if (error instanceof ConfigurationError) {
    logger.error(error.message, { missing: error.missing });
  } else if (error instanceof AppError) {
    logger.error(error.message, { code: error.code });
  } else {
    logger.error('Unexpected error', {
      message: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }

  return 1;
};
