/**
 * Media Fetcher
 * Copies media files out of the host application's media store, at most once
 * per destination path.
 */

import { existsSync } from 'fs';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import { getErrorMessage } from '../utils/error-handler.js';
import type { ExportLogger } from '../utils/logger.js';
import type { HostCollaborator } from './types.js';

/**
 * Target path for `filename` inside `destinationDir`, or null when the name
 * would land outside of it.
 */
export function resolveMediaPath(filename: string, destinationDir: string): string | null {
  const base = resolve(destinationDir);
  const target = resolve(base, filename);
  const relativePath = relative(base, target);

  if (relativePath === '' || relativePath === '..' || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath)) {
    return null;
  }
  return target;
}

export class MediaFetcher {
  constructor(
    private readonly client: HostCollaborator,
    private readonly logger: ExportLogger
  ) {}

  /**
   * Returns false when the file could not be placed. Never throws.
   */
  async fetch(filename: string, destinationDir: string): Promise<boolean> {
    const targetPath = resolveMediaPath(filename, destinationDir);
    if (!targetPath) {
      this.logger.warn(`  ⚠️  Refusing media path outside the media folder: ${filename}`);
      return false;
    }

    // Already exported by this run or a previous one
    if (existsSync(targetPath)) {
      return true;
    }

    const response = await this.client.getMediaBytes(filename);
    if (!response.success) {
      this.logger.warn(`  ⚠️  Could not retrieve ${filename}: ${response.error.message}`);
      return false;
    }
    if (response.data === null) {
      this.logger.warn(`  ⚠️  Media not found in Anki: ${filename}`);
      return false;
    }

    // Written next to the target first so an interrupted write never sits at the final path
    const partialPath = `${targetPath}.${process.pid}.part`;
    try {
      await mkdir(dirname(targetPath), { recursive: true });
      await writeFile(partialPath, response.data);
      await rename(partialPath, targetPath);
    } catch (error) {
      await rm(partialPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`  ⚠️  Could not remove ${partialPath}: ${getErrorMessage(cleanupError)}`);
      });
      this.logger.warn(`  ⚠️  Could not save ${filename}: ${getErrorMessage(error)}`);
      return false;
    }

    this.logger.info(`  📸 ${filename}`);
    return true;
  }
}
