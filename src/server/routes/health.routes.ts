/**
 * Health Routes
 */

import { Router } from 'express';
import * as healthController from '../controllers/health.controller';
import { asyncHandler } from '../middleware';

const router = Router();

// GET / - Service status
router.get('/', asyncHandler(healthController.status));

export default router;
