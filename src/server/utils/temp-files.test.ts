import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { removeTempFile, writeTempFile } from './temp-files';

describe('temp files', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'temp-files-test-'));

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes data under a unique name in a fresh directory', async () => {
    const target = path.join(dir, 'nested');

    const first = await writeTempFile(target, Buffer.from('one'), '.xlsx');
    const second = await writeTempFile(target, Buffer.from('two'), '.xlsx');

    expect(first).not.toBe(second);
    expect(path.dirname(first)).toBe(target);
    expect(path.extname(first)).toBe('.xlsx');
    expect(fs.readFileSync(first, 'utf-8')).toBe('one');
  });

  it('removes a file', async () => {
    const filePath = await writeTempFile(dir, Buffer.from('x'), '.bin');

    removeTempFile(filePath);

    expect(fs.existsSync(filePath)).toBe(false);
  });

  it('ignores a file that is already gone', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(() => removeTempFile(path.join(dir, 'missing.xlsx'))).not.toThrow();
    expect(warn).not.toHaveBeenCalled();
  });

  it('logs other failures instead of throwing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const subdir = fs.mkdtempSync(path.join(dir, 'dir-'));

    // unlink on a directory fails with something other than ENOENT
    expect(() => removeTempFile(subdir)).not.toThrow();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
