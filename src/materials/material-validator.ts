/**
 * Material Validator
 */

import { readLines } from '../utils/file-utils';

/**
 * Checks whether a material file mentions the expected material name.
 * This is a textual containment check on each line, not a parse.
 */
export function isValidMaterialFile(materialFile: string, materialName: string): boolean {
  return readLines(materialFile).some(line => line.includes(materialName));
}
