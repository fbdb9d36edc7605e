/**
 * Directory Scanner
 *
 * Finds asset directories, i.e. directories that hold a diffuse texture.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ERROR_MESSAGES } from '../constants/errors';
import { TEXTURE_FILE_NAMES } from '../constants/material';
import { MaterialErrorFactory } from '../errors';
import { isDirectory } from '../utils/file-utils';
import { logger as defaultLogger, type Logger } from '../utils/logger';

function readEntries(dirPath: string): fs.Dirent[] {
  try {
    return fs.readdirSync(dirPath, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw MaterialErrorFactory.fileSystemError(ERROR_MESSAGES.DIRECTORY_READ_FAILED, dirPath, 'readdir', error);
  }
}

/**
 * Whether an entry is a directory, following symbolic links
 */
function pointsToDirectory(dirPath: string, entry: fs.Dirent): boolean {
  if (entry.isDirectory()) return true;
  return entry.isSymbolicLink() && isDirectory(path.join(dirPath, entry.name));
}

/**
 * Walk `rootDir` recursively and return every directory containing `D.png`.
 *
 * Directories are returned in pre-order with entries sorted by name.
 * Symbolic links to directories are not followed, and a `D.png` that is or
 * links to a directory does not count. A subdirectory that cannot be listed
 * is skipped; failing to list `rootDir` itself throws.
 */
export function findAssetDirectories(rootDir: string, logger: Logger = defaultLogger): string[] {
  const found: string[] = [];

  const walk = (dirPath: string, entries: fs.Dirent[]): void => {
    const hasDiffuse = entries.some(
      entry => entry.name === TEXTURE_FILE_NAMES.DIFFUSE && !pointsToDirectory(dirPath, entry)
    );
    if (hasDiffuse) {
      found.push(dirPath);
    }

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const childPath = path.join(dirPath, entry.name);
      let childEntries: fs.Dirent[];
      try {
        childEntries = readEntries(childPath);
      } catch (error) {
        logger.debug(`Skipping unreadable directory ${childPath}`, {
          filePath: childPath,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }
      walk(childPath, childEntries);
    }
  };

  const root = path.resolve(rootDir);
  walk(root, readEntries(root));
  return found;
}
