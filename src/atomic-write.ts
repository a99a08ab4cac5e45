/**
 * All-or-nothing file commit: write a temporary sibling, then rename it over the target
 */

import { renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import { AppError, describeError, logger } from './logger.js';

export function temporaryPathFor(targetPath: string): string {
  const absolute = resolve(targetPath);
  return join(
    dirname(absolute),
    `.${basename(absolute)}.${process.pid}-${Date.now().toString(36)}.tmp`
  );
}

/**
 * Either the target holds the full new content afterwards, or it is left as it was.
 * Throws OUTPUT_WRITE_FAILURE.
 */
export function writeFileAtomic(targetPath: string, content: string): void {
  const tempPath = temporaryPathFor(targetPath);

  try {
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, targetPath);
  } catch (error) {
    try {
      rmSync(tempPath, { force: true });
    } catch (cleanupError) {
      logger.warn(
        `Could not remove temporary file ${tempPath}`,
        { error: describeError(cleanupError) },
        'AtomicWrite'
      );
    }
    throw new AppError(
      `Cannot write output file ${targetPath}: ${describeError(error)}`,
      'OUTPUT_WRITE_FAILURE',
      1,
      { path: targetPath }
    );
  }

  logger.debug(`Wrote ${Buffer.byteLength(content, 'utf-8')} bytes`, { path: targetPath }, 'AtomicWrite');
}
