import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { ConflictError, DomainError, NotFoundError, ValidationError } from '@sms-gateway/core';

import { logger } from '../config/logger';
import { HttpError, toFieldErrors } from '../utils/http-errors';

export interface ApiError {
  status: number;
  code: string;
  message: string;
  details?: unknown;
  stack?: string;
}

const hasErrorName = (error: unknown, expected: string): boolean =>
  typeof error === 'object' && error !== null && 'name' in error && error.name === expected;

// body-parser marks malformed payloads with `type` and an HTTP status.
const isBodyParserError = (error: unknown): error is Error & { status: number; type: string } =>
  error instanceof Error &&
  'type' in error &&
  typeof error.type === 'string' &&
  'status' in error &&
  typeof error.status === 'number';

const toApiError = (error: Error): ApiError => {
  if (error instanceof HttpError) {
    return { status: error.status, code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof ValidationError || hasErrorName(error, 'ValidationError')) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: error.message,
      details: error instanceof DomainError ? error.details : undefined,
    };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, code: 'NOT_FOUND', message: error.message, details: error.details };
  }
  if (error instanceof ConflictError) {
    return { status: 409, code: 'CONFLICT', message: error.message, details: error.details };
  }
  if (error instanceof DomainError) {
    return { status: 400, code: error.code || 'DOMAIN_ERROR', message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    return {
      status: 400,
      code: 'VALIDATION_ERROR',
      message: 'Invalid request data',
      details: { errors: toFieldErrors(error.errors) },
    };
  }
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    return {
      status: error.status,
      code: error.type === 'entity.parse.failed' ? 'INVALID_JSON' : 'INVALID_REQUEST_BODY',
      message: error.message,
    };
  }

  return {
    status: 500,
    code: 'INTERNAL_SERVER_ERROR',
    message: process.env.NODE_ENV === 'production' ? 'Internal server error' : error.message,
  };
};

export const errorHandler = (error: Error, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const apiError = toApiError(error);
  const requestId = req.rid ?? null;

  if (process.env.NODE_ENV !== 'production' && apiError.status >= 500) {
    apiError.stack = error.stack;
  }

  const logLevel = apiError.status >= 500 ? 'error' : 'warn';
  logger[logLevel]('API Error', {
    requestId,
    error: {
      status: apiError.status,
      code: apiError.code,
      message: apiError.message,
      details: apiError.details,
      stack: apiError.status >= 500 ? error.stack : undefined,
    },
    request: {
      method: req.method,
      path: req.originalUrl,
      params: req.params,
      query: req.query,
      ip: req.ip,
      userAgent: req.get('User-Agent'),
    },
  });

  if (requestId) {
    res.setHeader('X-Request-Id', requestId);
  }

  res.status(apiError.status).json({
    success: false,
    error: {
      code: apiError.code,
      message: apiError.message,
      details: apiError.details,
      stack: apiError.stack,
      requestId,
    },
    timestamp: new Date().toISOString(),
    path: req.path,
    method: req.method,
  });
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown;

// Forwards rejected handlers to errorHandler.
export const asyncHandler =
  (fn: AsyncRequestHandler): RequestHandler =>
  (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
