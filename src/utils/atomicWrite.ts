/**
 * Atomic file writes: write a `.tmp` sibling, then rename it into place, so a reader
 * never observes a partially written file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

export interface AtomicWriteOptions {
  /** File mode for the written file, e.g. 0o600 for secrets */
  mode?: number;
}

export const atomicWriteFile = async (
  filePath: string,
  data: string,
  options: AtomicWriteOptions = {}
): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, data, { encoding: 'utf-8', mode: options.mode });
  try {
    await fs.rename(tmp, filePath);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
};

/**
 * Read a UTF-8 file, resolving to null when it does not exist.
 */
export const readFileIfExists = async (filePath: string): Promise<string | null> => {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
};

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error && typeof error.code === 'string';
