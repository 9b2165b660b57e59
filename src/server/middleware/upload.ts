/**
 * Upload Middleware
 *
 * Multipart parsing for spreadsheet uploads. Files stay in memory; only the
 * generated workbook ever touches the disk.
 */

import { RequestHandler } from 'express';
import multer from 'multer';
import { AppConfig, requestConfig } from '../config';

// One multer instance per app config, built on first use
const uploads = new WeakMap<AppConfig, multer.Multer>();

export function createUpload(maxUploadBytes: number): multer.Multer {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 2 }
  });
}

function uploadFor(config: AppConfig): multer.Multer {
  let upload = uploads.get(config);
  if (!upload) {
    upload = createUpload(config.maxUploadBytes);
    uploads.set(config, upload);
  }
  return upload;
}

export function uploadSingle(field: string): RequestHandler {
  return (req, res, next) => uploadFor(requestConfig(req)).single(field)(req, res, next);
}

export function uploadFields(fields: multer.Field[]): RequestHandler {
  return (req, res, next) => uploadFor(requestConfig(req)).fields(fields)(req, res, next);
}

/**
 * First uploaded file for a field, from either `uploadSingle` or `uploadFields`.
 */
export function uploadedFile(
  file: Express.Multer.File | undefined,
  files: { [fieldname: string]: Express.Multer.File[] } | Express.Multer.File[] | undefined,
  field: string
): Express.Multer.File | undefined {
  if (file && file.fieldname === field) return file;
  if (!files) return undefined;
  const list = Array.isArray(files) ? files.filter(f => f.fieldname === field) : files[field];
  return list?.[0];
}
