/**
 * Material Script Constants
 *
 * Texture file names and the literal tokens of the material script grammar.
 * The material interpreter parses these verbatim.
 */

/**
 * Recognised texture file names (exact, case-sensitive)
 */
export const TEXTURE_FILE_NAMES = {
  DIFFUSE: 'D.png',
  NORMAL: 'N.png',
  SPECULAR: 'S.png',
} as const;

/**
 * PNG header layout used for alpha detection
 */
export const PNG_HEADER = {
  LENGTH: 26,
  COLOR_TYPE_OFFSET: 25,
  COLOR_TYPE_RGBA: 6,
} as const;

/**
 * Material name derivation
 */
export const MATERIAL_NAMESPACE_PREFIX = '/global/';

export const STRIPPED_PATH_SEGMENTS = [
  'textures/',
  '3d_objects/',
  '3d_skeletons/',
] as const;

/**
 * Parent materials
 */
export const PARENT_MATERIALS = {
  SIMPLE: '/base/simple',
  NORMALMAP: '/base/normalmap',
  NORMALMAP_SPECULAR: '/base/normalmap/specular',
  ALPHA_SUFFIX: '/nonculled/alpharejected',
} as const;

/**
 * Imported script resources
 */
export const MATERIAL_IMPORTS = {
  BASE: 'resources/ogre/scripts/materials/base.material',
  DEPTH_SHADOWMAP: 'resources/ogre/scripts/programs/DepthShadowmap.material',
} as const;

/**
 * Shadow caster block
 */
export const SHADOW_CASTER = {
  NAME_SUFFIX: '/shadowcaster',
  PARENT: 'Ogre/DepthShadowmap/Caster/Float',
  PROPERTY: '$shadow_caster_material',
} as const;

/**
 * Texture alias slots
 */
export const TEXTURE_ALIASES = {
  DIFFUSE: 'DiffuseMap',
  NORMAL: 'NormalHeightMap',
  SPECULAR: 'SpecularMap',
} as const;

export const SCRIPT_INDENT = '    ';
