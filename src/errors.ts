/**
 * Custom Error Classes for Material Operations
 *
 * Tagged union errors with Zod integration for configuration failures.
 */

import type { ZodError } from 'zod';
import { ERROR_CODES } from './constants/errors';

/**
 * Base Material Error Class
 */
export abstract class BaseMaterialError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Material Configuration Error
 *
 * Raised for an invalid configuration or an unknown run mode.
 */
export class MaterialConfigError extends BaseMaterialError {
  readonly _tag = 'MaterialConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;
  readonly zodError?: ZodError;

  constructor(message: string, configKey: string, zodError?: ZodError) {
    super(message, { configKey });
    this.configKey = configKey;
    this.zodError = zodError;
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return (this.zodError?.issues || []).map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
  }
}

/**
 * Material File System Error
 *
 * Keeps the underlying Node error in `context.cause`.
 */
export class MaterialFileSystemError extends BaseMaterialError {
  readonly _tag = 'MaterialFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, cause?: unknown) {
    super(message, { filePath, operation, cause });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all material errors
 */
export type MaterialError =
  | MaterialConfigError
  | MaterialFileSystemError;

/**
 * Error factory functions
 */
export const MaterialErrorFactory = {
  configError(message: string, configKey: string, zodError?: ZodError): MaterialConfigError {
    return new MaterialConfigError(message, configKey, zodError);
  },

  /**
   * Create file system error, keeping the original error as cause
   */
  fileSystemError(message: string, filePath: string, operation: string, cause?: unknown): MaterialFileSystemError {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    return new MaterialFileSystemError(`${message} ${filePath}${reason}`, filePath, operation, cause);
  },
};
