/**
 * Process Routes
 *
 * Reconciliation of two uploaded tables.
 */

import { Router } from 'express';
import * as reconcileController from '../controllers/reconcile.controller';
import { asyncHandler, uploadFields } from '../middleware';

const router = Router();

// POST /process - Matches, Only_in_File_A, Only_in_File_B and Summary sheets
router.post(
  '/',
  uploadFields([{ name: 'file_a', maxCount: 1 }, { name: 'file_b', maxCount: 1 }]),
  asyncHandler(reconcileController.processFiles)
);

export default router;
