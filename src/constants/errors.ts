/**
 * Error Constants for the Material Script Manager
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  CONFIG_VALIDATION_ERROR: 'MATERIAL_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'MATERIAL_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  CONFIG_VALIDATION_ERROR: 'Configuration validation failed',
  INVALID_MODE: 'Invalid mode',
  FILE_READ_FAILED: 'Failed to read file',
  FILE_WRITE_FAILED: 'Failed to write file',
  FILE_REMOVE_FAILED: 'Failed to remove file',
  DIRECTORY_READ_FAILED: 'Failed to read directory',
} as const;
