/**
 * Async Wrapper Middleware
 *
 * Wraps async route handlers to properly catch and forward errors.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Type for async request handlers.
 */
type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async route handler to catch errors and forward them to Express error handler.
 *
 * @example
 * router.post('/', asyncHandler(async (req, res) => {
 *   const table = readTable(req.file.buffer, req.file.originalname);
 *   res.json({ rows: table.rowCount });
 * }));
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
