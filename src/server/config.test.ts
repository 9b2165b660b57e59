import * as path from 'path';
import { describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 8000,
      serviceName: 'SheetFix API',
      tmpDir: path.join(process.cwd(), 'tmp'),
      corsOrigin: '*',
      maxUploadBytes: 25 * 1024 * 1024
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '9100',
      SERVICE_NAME: 'Sheets',
      TMP_DIR: '/var/tmp/sheets',
      CORS_ORIGIN: 'https://example.test',
      MAX_UPLOAD_MB: '2'
    });

    expect(config).toEqual({
      port: 9100,
      serviceName: 'Sheets',
      tmpDir: path.resolve('/var/tmp/sheets'),
      corsOrigin: 'https://example.test',
      maxUploadBytes: 2 * 1024 * 1024
    });
  });

  it('falls back on invalid numbers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = loadConfig({ PORT: 'abc', MAX_UPLOAD_MB: '-1' });

    expect(config.port).toBe(8000);
    expect(config.maxUploadBytes).toBe(25 * 1024 * 1024);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });
});
