/**
 * Centralized error handling utilities
 * Provides consistent error classification, logging and user-facing messages
 */

import type { Logger } from 'pino';
import { logger } from './logger';

/**
 * Error types for classification
 */
export enum ErrorType {
  VALIDATION = 'VALIDATION_ERROR',
  STORAGE = 'STORAGE_ERROR',
  AUTH = 'AUTH_ERROR',
  NETWORK = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT_ERROR',
  SERVER = 'SERVER_ERROR',
  UNKNOWN = 'UNKNOWN_ERROR',
}

/**
 * Standard error class with metadata
 */
export class AppError extends Error {
  constructor(
    message: string,
    public type: ErrorType = ErrorType.UNKNOWN,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Extracts user-friendly error message from error object
 */
export function getUserMessage(error: unknown, fallback = 'Something went wrong'): string {
  if (error instanceof Error) {
    return error.message || fallback;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'error' in error && typeof error.error === 'string') {
    return error.error;
  }

  return fallback;
}

/**
 * Wraps anything thrown into an AppError, keeping AppErrors as they are
 */
export function toAppError(error: unknown, type: ErrorType, fallback?: string): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError(getUserMessage(error, fallback), type, error);
}

/**
 * Logs error with context
 */
export function logError(
  error: unknown,
  context: Record<string, unknown> = {},
  log: Logger = logger
): void {
  if (error instanceof AppError && error.type === ErrorType.VALIDATION) {
    // Don't log user input errors at error level
    log.warn({ ...context, error: error.message, type: error.type }, 'Client error');
    return;
  }

  log.error({ ...context, err: error }, 'Unhandled error');
}
