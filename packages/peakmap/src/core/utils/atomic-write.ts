/**
 * Atomic Write Utilities
 *
 * Writes the rendered map via write-to-temp-then-rename, so an interrupted
 * build leaves either the previous page or the new one on disk, never a
 * truncated file.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from './logger.js';

const log = createLogger({ module: 'atomic-write' });

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('docs/index.html', renderHtml(document));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  // Ensure parent directory exists
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent builds from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // The temp file may never have been created
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isMissingFileError(cleanupError)) {
        log.warn('Could not remove temp file', {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      }
    });
    throw error;
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
