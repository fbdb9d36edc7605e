/**
 * Zod Schemas for the Material Script Manager
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevel } from '../utils/logger';
import { LogLevelSchema, MaterialModeSchema } from './base-schemas';

/**
 * Directory Path Schema
 */
export const DirectoryPathSchema = z.string()
  .min(1, 'Directory path cannot be empty');

/**
 * Material File Name Schema
 *
 * A bare file name, written inside each asset directory.
 */
export const MaterialFileNameSchema = z.string()
  .min(1, 'Material file name cannot be empty')
  .regex(/^[^/\\]+$/, 'Material file name must not contain path separators')
  .refine(name => name !== '.' && name !== '..', 'Material file name must name a file');

/**
 * Material Manager Configuration Schema
 */
export const MaterialManagerConfigSchema = z.object({
  rootDir: DirectoryPathSchema.optional().default(() => process.cwd()),
  workingDir: DirectoryPathSchema.optional().default(() => process.cwd()),
  materialFileName: MaterialFileNameSchema.optional().default(DEFAULT_CONFIG.MATERIAL_FILE_NAME),
  logLevel: LogLevelSchema.optional().default(LogLevel.INFO),
});

/**
 * Type exports for TypeScript inference
 */
export type MaterialManagerConfig = z.infer<typeof MaterialManagerConfigSchema>;
export type MaterialManagerOptions = z.input<typeof MaterialManagerConfigSchema>;
export type MaterialMode = z.infer<typeof MaterialModeSchema>;

export { MaterialModeSchema, LogLevelSchema } from './base-schemas';
