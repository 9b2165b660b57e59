/**
 * Routes Index
 *
 * Aggregates all route modules and exports a configured router.
 */

import { Router } from 'express';

// Import all route modules
import healthRoutes from './health.routes';
import processRoutes from './process.routes';
import dedupeRoutes from './dedupe.routes';

/**
 * Create and configure the main API router.
 */
export function createApiRouter(): Router {
  const router = Router();

  // Mount all route modules
  router.use('/', healthRoutes);
  router.use('/process', processRoutes);
  router.use('/dedupe', dedupeRoutes);

  return router;
}
