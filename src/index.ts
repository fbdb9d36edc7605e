/**
 * Material Script Manager
 *
 * Generates and validates Ogre material scripts for texture asset directories.
 * A directory qualifies when it holds a diffuse texture `D.png`; normal
 * (`N.png`) and specular (`S.png`) maps and an alpha channel in the diffuse
 * texture select the material variant.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'material-script-manager';
 *
 * const manager = defineConfig({ rootDir: './assets' });
 *
 * const report = manager.run('find-missing');
 * console.log(report.reported);
 * ```
 */

import * as path from 'path';
import { ZodError } from 'zod';
import { MaterialErrorFactory } from './errors';
import { ERROR_MESSAGES } from './constants/errors';
import { processAssetDirectory, type AssetDirectory } from './modes/mode-dispatcher';
import { findAssetDirectories } from './scanner/directory-scanner';
import {
  MaterialManagerConfigSchema,
  MaterialModeSchema,
  type MaterialManagerConfig,
  type MaterialManagerOptions,
  type MaterialMode
} from './schemas';
import { LoggerFactory, LogLevel, type Logger } from './utils/logger';
import { deriveMaterialName } from './utils/name-utils';

/**
 * Result of a run
 */
export interface MaterialRunReport {
  mode: MaterialMode;
  /** Number of asset directories found */
  directories: number;
  /** Material files printed by the find modes */
  reported: string[];
  /** Material files written */
  generated: string[];
}

/**
 * Main manager class
 */
export class MaterialManager {
  private config: MaterialManagerConfig;
  private logger: Logger;

  constructor(config: MaterialManagerOptions = {}) {
    try {
      this.config = MaterialManagerConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw MaterialErrorFactory.configError(
          ERROR_MESSAGES.CONFIG_VALIDATION_ERROR,
          'MaterialManagerConfig',
          error
        );
      }
      throw error;
    }

    this.logger = LoggerFactory.forRun(this.config.logLevel);
    this.logger.logConfig({ ...this.config });
  }

  /**
   * List asset directories under the root, with their material file and name
   */
  scan(): AssetDirectory[] {
    const rootDir = path.resolve(this.config.rootDir);
    return findAssetDirectories(rootDir, this.logger).map(directory => ({
      directory,
      materialFile: path.join(directory, this.config.materialFileName),
      materialName: deriveMaterialName(directory, rootDir),
    }));
  }

  /**
   * Apply a mode to every asset directory.
   *
   * Paths found by `find-missing` and `find-invalid` are printed to stdout,
   * one per line, as they are found. Subdirectories that cannot be listed
   * are skipped; any other file system error aborts the run.
   */
  run(mode: string): MaterialRunReport {
    const parsedMode = MaterialModeSchema.safeParse(mode);
    if (!parsedMode.success) {
      throw MaterialErrorFactory.configError(
        `${ERROR_MESSAGES.INVALID_MODE}: ${mode}`,
        'mode',
        parsedMode.error
      );
    }

    const report: MaterialRunReport = {
      mode: parsedMode.data,
      directories: 0,
      reported: [],
      generated: [],
    };
    const operation = `run ${report.mode}`;
    const workingDir = path.resolve(this.config.workingDir);

    this.logger.startTiming(operation);
    for (const asset of this.scan()) {
      report.directories++;
      const outcome = processAssetDirectory(asset, report.mode, {
        workingDir,
        logger: this.logger,
      });

      if (outcome === 'reported') {
        console.log(asset.materialFile);
        report.reported.push(asset.materialFile);
      } else if (outcome === 'generated' || outcome === 'regenerated') {
        report.generated.push(asset.materialFile);
      }
    }
    this.logger.endTiming(operation, {
      mode: report.mode,
      directories: report.directories,
      reported: report.reported.length,
      generated: report.generated.length,
    }, LogLevel.DEBUG);

    return report;
  }

  /**
   * Get current configuration
   */
  getConfig(): MaterialManagerConfig {
    return { ...this.config };
  }
}

/**
 * Create manager instance with configuration
 */
export function defineConfig(config: MaterialManagerOptions = {}): MaterialManager {
  return new MaterialManager(config);
}

export type { MaterialManagerConfig, MaterialManagerOptions, MaterialMode } from './schemas';
export type { AssetDirectory, DirectoryOutcome } from './modes/mode-dispatcher';
export type { TexturePresence } from './materials/texture-inspector';
export type { MaterialScriptInput } from './materials/material-script-builder';
export {
  BaseMaterialError,
  MaterialConfigError,
  MaterialFileSystemError,
  type MaterialError
} from './errors';
export { LogLevel } from './utils/logger';

/**
 * Direct operation exports
 */
export { findAssetDirectories } from './scanner/directory-scanner';
export { inspectTextures, hasAlphaDiffuseMap, hasNormalMap, hasSpecularMap } from './materials/texture-inspector';
export { classifyParentMaterial } from './materials/material-classifier';
export { buildMaterialScript, generateMaterial } from './materials/material-script-builder';
export { isValidMaterialFile } from './materials/material-validator';
export { processAssetDirectory } from './modes/mode-dispatcher';
export { deriveMaterialName } from './utils/name-utils';
