import { Request, Response, NextFunction } from 'express';
import {
  AgentError,
  CompletionError,
  ConfigValidationError,
  InvalidStateError,
  SessionNotFoundError,
} from '../utils/errors';

export class ApiError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }
}

export const toApiError = (error: unknown): ApiError => {
  if (error instanceof ApiError) return error;
  if (error instanceof ConfigValidationError) return new ApiError(400, error.message);
  if (error instanceof SessionNotFoundError) return new ApiError(404, error.message);
  if (error instanceof InvalidStateError) return new ApiError(409, error.message);
  if (error instanceof AgentError || error instanceof CompletionError) return new ApiError(502, error.message);
  return new ApiError(500, 'Internal server error');
};

export const errorHandler = (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    console.error(`❌ ${req.method} ${req.originalUrl} failed:`, error);
  } else {
    console.warn(`⚠️  ${req.method} ${req.originalUrl}: ${apiError.message}`);
  }

  res.status(apiError.statusCode).json({
    success: false,
    error: apiError.message,
  });
};
