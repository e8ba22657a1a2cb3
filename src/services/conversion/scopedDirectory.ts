import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';

import { describeError } from '../../errors';
import { logger } from '../../logger';

/**
 * Runs `work` inside a fresh private directory and removes the directory afterwards,
 * whether `work` resolves or rejects.
 */
export async function withScopedDirectory<T>(
  prefix: string,
  work: (directory: string) => Promise<T>,
  root: string = os.tmpdir()
): Promise<T> {
  const directory = await mkdtemp(path.join(root, prefix));
  try {
    return await work(directory);
  } finally {
    await rm(directory, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn(`[Convert] Could not remove ${directory}: ${describeError(error)}`);
    });
  }
}
