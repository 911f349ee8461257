import { NextFunction, Request, Response } from 'express';
import { ApiResponse } from '@safetrail/shared';
import { TrackingError } from '../types/tracking';

/**
 * Maps TrackingError subclasses to their status codes; anything else is a 500
 * with a generic message.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof TrackingError) {
    if (error.statusCode >= 500) {
      console.error(`${req.method} ${req.originalUrl} failed:`, error);
    }
    const body: ApiResponse = { success: false, error: error.message, code: error.code };
    res.status(error.statusCode).json(body);
    return;
  }

  // Malformed JSON from express.json()
  if (error instanceof SyntaxError && 'body' in error) {
    const body: ApiResponse = { success: false, error: 'Request body must be valid JSON', code: 'INVALID_ARGUMENT' };
    res.status(400).json(body);
    return;
  }

  console.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  const body: ApiResponse = { success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' };
  res.status(500).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ApiResponse = { success: false, error: `Route not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' };
  res.status(404).json(body);
}
