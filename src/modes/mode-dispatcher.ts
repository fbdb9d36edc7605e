/**
 * Mode Dispatcher
 *
 * Applies a run mode to a single asset directory.
 */

import { generateMaterial } from '../materials/material-script-builder';
import { isValidMaterialFile } from '../materials/material-validator';
import type { MaterialMode } from '../schemas';
import { isFile, removeFile } from '../utils/file-utils';
import type { Logger } from '../utils/logger';

/**
 * An asset directory and the material derived from it
 */
export interface AssetDirectory {
  directory: string;
  materialFile: string;
  materialName: string;
}

/**
 * What a mode did with a directory
 */
export type DirectoryOutcome = 'reported' | 'generated' | 'regenerated' | 'skipped';

export interface DispatchOptions {
  workingDir: string;
  logger?: Logger;
}

/**
 * Apply `mode` to one asset directory
 */
export function processAssetDirectory(
  asset: AssetDirectory,
  mode: MaterialMode,
  options: DispatchOptions
): DirectoryOutcome {
  const { directory, materialFile, materialName } = asset;
  const exists = isFile(materialFile);

  switch (mode) {
    case 'find-missing':
      return exists ? 'skipped' : 'reported';

    case 'create-missing':
      if (exists) {
        return 'skipped';
      }
      generateMaterial(directory, materialFile, materialName, options);
      return 'generated';

    case 'refresh':
      if (exists) {
        removeFile(materialFile);
      }
      generateMaterial(directory, materialFile, materialName, options);
      return 'regenerated';

    case 'find-invalid':
      if (!exists) {
        return 'skipped';
      }
      return isValidMaterialFile(materialFile, materialName) ? 'skipped' : 'reported';
  }
}
