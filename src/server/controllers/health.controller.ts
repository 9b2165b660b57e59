/**
 * Health Controller
 */

import { Request, Response } from 'express';
import { requestConfig } from '../config';

/**
 * GET /
 */
export async function status(req: Request, res: Response): Promise<void> {
  res.json({ status: `${requestConfig(req).serviceName} running` });
}
