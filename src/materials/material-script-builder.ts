/**
 * Material Script Builder
 *
 * Renders Ogre material scripts for asset directories and writes them to disk.
 */

import {
  MATERIAL_IMPORTS,
  SCRIPT_INDENT,
  SHADOW_CASTER,
  TEXTURE_ALIASES,
  TEXTURE_FILE_NAMES
} from '../constants/material';
import { toRelativePosixPath, writeTextFile } from '../utils/file-utils';
import { logger as defaultLogger, type Logger } from '../utils/logger';
import { classifyParentMaterial } from './material-classifier';
import { inspectTextures, type TexturePresence } from './texture-inspector';

/**
 * Inputs of a material script
 */
export interface MaterialScriptInput {
  materialName: string;
  parentMaterial: string;
  /** Directory of the textures, relative to the working directory */
  textureDir: string;
  presence: TexturePresence;
}

/**
 * Options for generating a material file
 */
export interface GenerateMaterialOptions {
  /** Base directory for texture paths written into the script */
  workingDir: string;
  logger?: Logger;
}

function importLine(resource: string): string {
  return `import * from "${resource}"`;
}

function textureAliasLine(alias: string, texturePath: string): string {
  return `${SCRIPT_INDENT}set_texture_alias ${alias} ${texturePath}`;
}

/**
 * Build the material script text.
 *
 * Lines are separated by '\n' and the script ends with the closing brace of
 * the main material, without a trailing newline.
 */
export function buildMaterialScript(input: MaterialScriptInput): string {
  const { materialName, parentMaterial, textureDir, presence } = input;
  const diffusePath = `${textureDir}/${TEXTURE_FILE_NAMES.DIFFUSE}`;
  const shadowCasterName = `${materialName}${SHADOW_CASTER.NAME_SUFFIX}`;

  const lines: string[] = [importLine(MATERIAL_IMPORTS.BASE)];

  if (presence.hasAlphaDiffuseMap) {
    lines.push(
      importLine(MATERIAL_IMPORTS.DEPTH_SHADOWMAP),
      `material ${shadowCasterName} : ${SHADOW_CASTER.PARENT}`,
      '{',
      textureAliasLine(TEXTURE_ALIASES.DIFFUSE, diffusePath),
      '}'
    );
  }

  lines.push(
    `material ${materialName} : ${parentMaterial}`,
    '{',
    textureAliasLine(TEXTURE_ALIASES.DIFFUSE, diffusePath)
  );
  if (presence.hasAlphaDiffuseMap) {
    lines.push(`${SCRIPT_INDENT}set ${SHADOW_CASTER.PROPERTY} ${shadowCasterName}`);
  }
  if (presence.hasNormalMap) {
    lines.push(textureAliasLine(TEXTURE_ALIASES.NORMAL, `${textureDir}/${TEXTURE_FILE_NAMES.NORMAL}`));
  }
  if (presence.hasSpecularMap) {
    lines.push(textureAliasLine(TEXTURE_ALIASES.SPECULAR, `${textureDir}/${TEXTURE_FILE_NAMES.SPECULAR}`));
  }
  lines.push('}');

  return lines.join('\n');
}

/**
 * Generate the material file for an asset directory.
 *
 * Overwrites the file in place; a failure part way through can leave a
 * partial file behind.
 *
 * @returns The script that was written
 */
export function generateMaterial(
  directory: string,
  materialFile: string,
  materialName: string,
  options: GenerateMaterialOptions
): string {
  const log = options.logger ?? defaultLogger;
  log.info(`Generating material file ${materialFile}`);

  const presence = inspectTextures(directory);
  const script = buildMaterialScript({
    materialName,
    parentMaterial: classifyParentMaterial(presence),
    textureDir: toRelativePosixPath(options.workingDir, directory),
    presence,
  });

  writeTextFile(materialFile, script);
  log.logFileOperation('write', materialFile, { ...presence });
  return script;
}
