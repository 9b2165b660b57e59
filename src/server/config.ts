/**
 * Configuration
 *
 * Reads settings from the environment. A `.env` file beside the server
 * sources is loaded first; variables already set in the process win.
 */

import * as dotenv from 'dotenv';
import type { Request } from 'express';
import * as path from 'path';

export interface AppConfig {
  port: number;
  serviceName: string;
  tmpDir: string;
  corsOrigin: string;
  maxUploadBytes: number;
}

declare global {
  namespace Express {
    interface Locals {
      config: AppConfig;
    }
  }
}

const DEFAULT_PORT = 8000;
const DEFAULT_MAX_UPLOAD_MB = 25;

export function loadEnvFile(): void {
  dotenv.config({ path: path.join(__dirname, '.env') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveNumber(env['PORT'], DEFAULT_PORT, 'PORT'),
    serviceName: env['SERVICE_NAME'] || 'SheetFix API',
    tmpDir: path.resolve(env['TMP_DIR'] || path.join(process.cwd(), 'tmp')),
    corsOrigin: env['CORS_ORIGIN'] || '*',
    maxUploadBytes: positiveNumber(env['MAX_UPLOAD_MB'], DEFAULT_MAX_UPLOAD_MB, 'MAX_UPLOAD_MB') * 1024 * 1024
  };
}

/**
 * Settings of the app serving this request, set by `createApp`.
 */
export function requestConfig(req: Request): AppConfig {
  return req.app.locals.config;
}

function positiveNumber(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    console.warn(`[Config] Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}
