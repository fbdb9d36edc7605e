/**
 * Texture Presence Inspector
 *
 * Detects which texture maps exist in an asset directory.
 */

import * as path from 'path';
import { PNG_HEADER, TEXTURE_FILE_NAMES } from '../constants/material';
import { isFile, readFileHeader } from '../utils/file-utils';

/**
 * Texture maps present in a directory
 */
export interface TexturePresence {
  hasNormalMap: boolean;
  hasSpecularMap: boolean;
  /** Diffuse texture stored with an alpha channel */
  hasAlphaDiffuseMap: boolean;
}

export function hasNormalMap(directory: string): boolean {
  return isFile(path.join(directory, TEXTURE_FILE_NAMES.NORMAL));
}

export function hasSpecularMap(directory: string): boolean {
  return isFile(path.join(directory, TEXTURE_FILE_NAMES.SPECULAR));
}

/**
 * Whether the diffuse texture is an RGBA PNG.
 *
 * Only the colour type byte of the IHDR chunk is inspected. A missing or
 * truncated file counts as no alpha.
 */
export function hasAlphaDiffuseMap(directory: string): boolean {
  const diffusePath = path.join(directory, TEXTURE_FILE_NAMES.DIFFUSE);
  if (!isFile(diffusePath)) {
    return false;
  }

  const header = readFileHeader(diffusePath, PNG_HEADER.LENGTH);
  if (header.length !== PNG_HEADER.LENGTH) {
    return false;
  }
  return header[PNG_HEADER.COLOR_TYPE_OFFSET] === PNG_HEADER.COLOR_TYPE_RGBA;
}

/**
 * Inspect all auxiliary texture maps of a directory
 */
export function inspectTextures(directory: string): TexturePresence {
  return {
    hasNormalMap: hasNormalMap(directory),
    hasSpecularMap: hasSpecularMap(directory),
    hasAlphaDiffuseMap: hasAlphaDiffuseMap(directory),
  };
}
