import fs from 'fs/promises';
import type { Logger } from './logger';

/**
 * Deletes a file, logging instead of throwing when it cannot be removed.
 */
export async function removeFileQuietly(filePath: string, logger: Logger): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    logger.warn(`Could not remove file ${filePath}:`, err);
  }
}
