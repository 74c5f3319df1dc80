import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { atomicWriteFile } from './atomic-write.js';

describe('atomicWriteFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'peakmap-write-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('should create missing parent directories', async () => {
    const target = join(dir, 'docs', 'index.html');
    await atomicWriteFile(target, '<!DOCTYPE html>');

    expect(await readFile(target, 'utf-8')).toBe('<!DOCTYPE html>');
  });

  it('should replace an existing file and leave no temp file', async () => {
    const target = join(dir, 'index.html');
    await writeFile(target, 'old');

    await atomicWriteFile(target, 'new');

    expect(await readFile(target, 'utf-8')).toBe('new');
    expect(await readdir(dir)).toEqual(['index.html']);
  });

  it('should reject when the target cannot be written', async () => {
    const blocker = join(dir, 'docs');
    await writeFile(blocker, 'not a directory');

    await expect(atomicWriteFile(join(blocker, 'index.html'), 'x')).rejects.toThrow();
  });

  it('should surface the write error when the temp file cannot be removed', async () => {
    const target = join(dir, 'index.html');
    vi.spyOn(Date, 'now').mockReturnValue(1_000);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    // A directory in the temp file's place fails both the write and the unlink
    await mkdir(`${target}.${process.pid}.1000.tmp`);

    await expect(atomicWriteFile(target, 'x')).rejects.toMatchObject({ syscall: 'open' });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain('Could not remove temp file');
  });
});
