/**
 * Temp Files
 *
 * Request-scoped output artifacts: written under a unique name, removed
 * once the response is done. Removal never throws.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';

export async function writeTempFile(dir: string, data: Buffer, extension: string): Promise<string> {
  await fs.promises.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${randomUUID()}${extension}`);
  await fs.promises.writeFile(filePath, data);
  return filePath;
}

export function removeTempFile(filePath: string): void {
  try {
    fs.unlinkSync(filePath);
  } catch (error) {
    if (isMissingFileError(error)) return;
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[TempFiles] Could not delete temp file ${filePath}: ${reason}`);
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
