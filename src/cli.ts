/**
 * Command line entry point.
 *
 * Usage: material-manager {find-missing,create-missing,find-invalid,refresh}
 *
 * Scans the current working directory.
 */

import { MATERIAL_MODES } from './constants/config';
import { BaseMaterialError, MaterialConfigError } from './errors';
import { MaterialManager } from './index';
import { LoggerFactory } from './utils/logger';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

const USAGE = `usage: material-manager [-h] {${MATERIAL_MODES.join(',')}}`;

const HELP = `${USAGE}

Manages generated material definitions for textures named D.png, N.png or S.png.

positional arguments:
  mode            one of ${MATERIAL_MODES.join(', ')}

options:
  -h, --help      show this help message and exit`;

function usageError(message: string): number {
  console.error(USAGE);
  console.error(`material-manager: error: ${message}`);
  return EXIT_CODES.USAGE;
}

/**
 * Run the CLI with the given arguments (without node and script path)
 * and return the exit code.
 */
export function main(args: string[], cwd: string = process.cwd()): number {
  if (args.includes('-h') || args.includes('--help')) {
    console.log(HELP);
    return EXIT_CODES.OK;
  }
  if (args.length === 0) {
    return usageError('the following arguments are required: mode');
  }
  if (args.length > 1) {
    return usageError(`unrecognized arguments: ${args.slice(1).join(' ')}`);
  }

  const logger = LoggerFactory.forCli();
  try {
    const manager = new MaterialManager({ rootDir: cwd, workingDir: cwd });
    manager.run(args[0]);
    return EXIT_CODES.OK;
  } catch (error) {
    if (error instanceof MaterialConfigError && error.configKey === 'mode') {
      return usageError(`argument mode: invalid choice: '${args[0]}' (choose from ${MATERIAL_MODES.join(', ')})`);
    }
    if (error instanceof BaseMaterialError) {
      logger.logError(error, { details: error.getDetails() });
    } else if (error instanceof Error) {
      logger.logError(error);
    } else {
      logger.error(`Error occurred: ${String(error)}`);
    }
    return EXIT_CODES.FAILURE;
  }
}
