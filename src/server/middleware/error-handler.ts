/**
 * Error Handler Middleware
 *
 * Centralized error handling for the Express application.
 */

import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ProcessingError } from '../utils/processing-error';

/**
 * Express error handling middleware.
 * Should be registered after all routes.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  // Log error for debugging
  console.error(`[Error] ${req.method} ${req.path}:`, err.message);

  // Failed mid-stream (e.g. during a download); Express closes the connection
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ProcessingError) {
    res.status(400).json(err.toResponseBody());
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({
      error: err.message,
      code: err.code
    });
    return;
  }

  // Default to 500 for unknown errors
  console.error('[Error] Unhandled error:', err);
  res.status(500).json({
    error: 'Internal server error',
    ...(process.env['NODE_ENV'] === 'development' && {
      details: err.message,
      stack: err.stack
    })
  });
}

/**
 * 404 handler for unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: `Route not found: ${req.method} ${req.path}`
  });
}
