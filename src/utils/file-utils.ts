/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MaterialErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';

/**
 * Check if a path is a directory (symlinks are followed)
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file (symlinks are followed)
 */
export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Read up to `length` bytes from the start of a file.
 * The returned buffer is shorter than `length` when the file is.
 */
export function readFileHeader(filePath: string, length: number): Buffer {
  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, 'r');
    const buffer = Buffer.alloc(length);
    let offset = 0;
    while (offset < length) {
      const bytesRead = fs.readSync(fd, buffer, offset, length - offset, offset);
      if (bytesRead === 0) break;
      offset += bytesRead;
    }
    return buffer.subarray(0, offset);
  } catch (error) {
    throw MaterialErrorFactory.fileSystemError(ERROR_MESSAGES.FILE_READ_FAILED, filePath, 'read', error);
  } finally {
    if (fd !== undefined) fs.closeSync(fd);
  }
}

/**
 * Read a text file and split it into lines
 */
export function readLines(filePath: string): string[] {
  try {
    return fs.readFileSync(filePath, 'utf-8').split(/\r?\n/);
  } catch (error) {
    throw MaterialErrorFactory.fileSystemError(ERROR_MESSAGES.FILE_READ_FAILED, filePath, 'read', error);
  }
}

/**
 * Write a text file, truncating any previous content
 */
export function writeTextFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (error) {
    throw MaterialErrorFactory.fileSystemError(ERROR_MESSAGES.FILE_WRITE_FAILED, filePath, 'write', error);
  }
}

/**
 * Remove a file if it exists
 */
export function removeFile(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true });
  } catch (error) {
    throw MaterialErrorFactory.fileSystemError(ERROR_MESSAGES.FILE_REMOVE_FAILED, filePath, 'remove', error);
  }
}

/**
 * Relative path with forward slashes.
 * Returns '.' when both paths point at the same directory.
 */
export function toRelativePosixPath(from: string, to: string): string {
  const relative = path.relative(from, to);
  if (relative === '') {
    return '.';
  }
  return relative.split(path.sep).join('/');
}
