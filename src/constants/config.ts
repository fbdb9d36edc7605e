/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  MATERIAL_FILE_NAME: 'ogre.material',
  LOG_PREFIX: 'MaterialManager',
} as const;

/**
 * Supported Run Modes
 */
export const MATERIAL_MODES = [
  'find-missing',
  'create-missing',
  'find-invalid',
  'refresh',
] as const;
