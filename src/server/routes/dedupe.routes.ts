/**
 * Dedupe Routes
 */

import { Router } from 'express';
import * as dedupeController from '../controllers/dedupe.controller';
import { asyncHandler, uploadSingle } from '../middleware';

const router = Router();

// POST /dedupe - All_Rows sheet with duplicate annotations
router.post('/', uploadSingle('file'), asyncHandler(dedupeController.dedupeFile));

export default router;
