/**
 * Base Schemas
 *
 * Common validation schemas shared by the configuration and the CLI.
 */

import { z } from 'zod';
import { MATERIAL_MODES } from '../constants/config';
import { LogLevel } from '../utils/logger';

/**
 * Run Mode Schema
 */
export const MaterialModeSchema = z.enum(MATERIAL_MODES);

/**
 * Log Level Schema
 */
export const LogLevelSchema = z.nativeEnum(LogLevel);
