/**
 * Material Classifier
 *
 * Picks the parent material a generated material inherits from.
 */

import { PARENT_MATERIALS } from '../constants/material';
import type { TexturePresence } from './texture-inspector';

/**
 * Classify the parent material for a set of texture maps.
 *
 * A specular map without a normal map still yields the simple parent.
 * Alpha materials are all assumed to be non-culled.
 */
export function classifyParentMaterial(presence: TexturePresence): string {
  let parent: string = PARENT_MATERIALS.SIMPLE;
  if (presence.hasNormalMap && presence.hasSpecularMap) {
    parent = PARENT_MATERIALS.NORMALMAP_SPECULAR;
  } else if (presence.hasNormalMap) {
    parent = PARENT_MATERIALS.NORMALMAP;
  }

  // TODO: detect culling from the asset instead of assuming it for every alpha material
  if (presence.hasAlphaDiffuseMap) {
    parent += PARENT_MATERIALS.ALPHA_SUFFIX;
  }
  return parent;
}
