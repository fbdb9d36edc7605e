/**
 * Name Utilities
 *
 * Derives material names from asset directory paths.
 */

import { MATERIAL_NAMESPACE_PREFIX, STRIPPED_PATH_SEGMENTS } from '../constants/material';
import { toRelativePosixPath } from './file-utils';

/**
 * Derives the material name of an asset directory.
 *
 * The path relative to the scan root loses every occurrence of the
 * stripped segments and gains the global namespace prefix.
 * Example: "<root>/textures/rock/01" -> "/global/rock/01"
 *
 * Removal is a plain substring replace, so "mytextures/" also becomes "my".
 */
export function deriveMaterialName(directory: string, rootDir: string): string {
  let name = toRelativePosixPath(rootDir, directory);
  for (const segment of STRIPPED_PATH_SEGMENTS) {
    name = name.split(segment).join('');
  }
  return `${MATERIAL_NAMESPACE_PREFIX}${name}`;
}
