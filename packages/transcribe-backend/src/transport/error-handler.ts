// packages/transcribe-backend/src/transport/error-handler.ts
//
// Centralized error handling for Fastify.
// Provides structured error responses, logging, and security considerations.
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { QueueClosedError, ValidationError } from '@media-scribe/contracts';

import { logger } from '../infrastructure/logger.js';

export interface ErrorResponse {
  error: string;
  message: string;
  code?: string;
  timestamp?: string;
  requestId?: string;
}

/**
 * Error classification for consistent handling
 */
export enum ErrorType {
  CLIENT_ERROR = 'client_error',
  SERVER_ERROR = 'server_error',
  VALIDATION_ERROR = 'validation_error',
  UNAVAILABLE_ERROR = 'unavailable_error',
}

function readStringProperty(error: unknown, key: 'code' | 'name' | 'message'): string | undefined {
  if (error && typeof error === 'object' && key in error) {
    const value: unknown = Reflect.get(error, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

function readStatusCode(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

/**
 * Classify error type from various error sources
 */
export function classifyError(error: unknown): ErrorType {
  if (error instanceof ValidationError || error instanceof ZodError) {
    return ErrorType.VALIDATION_ERROR;
  }
  if (error instanceof QueueClosedError) {
    return ErrorType.UNAVAILABLE_ERROR;
  }
  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return ErrorType.CLIENT_ERROR;
  }
  return ErrorType.SERVER_ERROR;
}

/**
 * Create standardized error response
 */
function createErrorResponse(
  error: unknown,
  request: FastifyRequest,
  errorType: ErrorType,
): ErrorResponse {
  const baseResponse: ErrorResponse = {
    error: getErrorCode(errorType),
    message: getSafeErrorMessage(error, errorType),
    code:
      errorType === ErrorType.SERVER_ERROR
        ? undefined
        : (readStringProperty(error, 'code') ?? readStringProperty(error, 'name')),
    timestamp: new Date().toISOString(),
    requestId: request.id,
  };

  // For ZodError, surface the first issue
  if (error instanceof ZodError) {
    const firstIssue = error.issues[0];
    if (firstIssue) {
      const path = firstIssue.path.join('.');
      baseResponse.message = path ? `${path}: ${firstIssue.message}` : firstIssue.message;
      baseResponse.code = firstIssue.code || 'validation_failed';
    }
  }

  return baseResponse;
}

/**
 * Get HTTP status code for error type
 */
export function getHttpStatus(errorType: ErrorType, originalError?: unknown): number {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 400;
    }
    case ErrorType.UNAVAILABLE_ERROR: {
      return 503;
    }
    case ErrorType.CLIENT_ERROR: {
      return readStatusCode(originalError) ?? 400;
    }
    default: {
      return 500;
    }
  }
}

/**
 * Get error code string for response
 */
function getErrorCode(errorType: ErrorType): string {
  switch (errorType) {
    case ErrorType.VALIDATION_ERROR: {
      return 'validation_failed';
    }
    case ErrorType.UNAVAILABLE_ERROR: {
      return 'service_unavailable';
    }
    case ErrorType.CLIENT_ERROR: {
      return 'client_error';
    }
    default: {
      return 'internal_error';
    }
  }
}

/**
 * Get safe error message that doesn't leak sensitive information
 */
function getSafeErrorMessage(error: unknown, errorType: ErrorType): string {
  // For server errors, always use generic message
  if (errorType === ErrorType.SERVER_ERROR) {
    return 'An internal server error occurred';
  }

  const message = readStringProperty(error, 'message');

  if (errorType === ErrorType.VALIDATION_ERROR) {
    return message ?? 'Validation failed';
  }

  if (errorType === ErrorType.UNAVAILABLE_ERROR) {
    return 'Service is shutting down';
  }

  // For other client errors, use the original message if safe
  if (message !== undefined && message.length < 200) {
    return message;
  }

  return 'An error occurred';
}

/**
 * Redact sensitive data from error context
 */
export function redactSensitiveData(context: Record<string, unknown>): Record<string, unknown> {
  const sensitiveKeys = ['password', 'token', 'secret', 'key', 'auth', 'authorization'];
  const redacted: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    if (sensitiveKeys.some((sensitive) => lowerKey.includes(sensitive))) {
      redacted[key] = '[REDACTED]';
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      redacted[key] = redactSensitiveData(Object.fromEntries(Object.entries(value)));
    } else {
      redacted[key] = value;
    }
  }

  return redacted;
}

/**
 * Log error with appropriate level and context
 */
function logError(error: unknown, request: FastifyRequest, errorType: ErrorType): void {
  const logContext = {
    event: 'http_error',
    errorType,
    method: request.method,
    url: request.url,
    ip: request.ip,
    userAgent: request.headers['user-agent'],
    requestId: request.id,
    ...redactSensitiveData({
      error:
        error instanceof Error
          ? {
              name: error.name,
              message: error.message,
              stack: error.stack,
            }
          : String(error),
    }),
  };

  // Log server errors as errors, client errors as warnings
  if (errorType === ErrorType.SERVER_ERROR) {
    logger.error('HTTP request failed with server error', logContext);
  } else {
    logger.warn('HTTP request failed with client error', logContext);
  }
}

/**
 * Global error handler for Fastify
 */
export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  try {
    const errorType = classifyError(error);
    const statusCode = getHttpStatus(errorType, error);

    logError(error, request, errorType);

    void reply.code(statusCode).send(createErrorResponse(error, request, errorType));
  } catch (handlerError) {
    // If error handling itself fails, log and send generic response
    logger.error('Error handler failed', {
      originalError: String(error),
      handlerError: handlerError instanceof Error ? handlerError.message : String(handlerError),
      requestId: request.id,
      method: request.method,
      url: request.url,
    });

    void reply.code(500).send({
      error: 'internal_error',
      message: 'An internal server error occurred',
      timestamp: new Date().toISOString(),
      requestId: request.id,
    });
  }
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(errorHandler);
}
