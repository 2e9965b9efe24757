/**
 * File Utilities
 *
 * Utility functions for file system operations.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FILE_EXTENSIONS } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { BvhErrorFactory } from '../errors';
import type { Encoding } from '../schemas';

/**
 * Check if a path is a directory
 */
export function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whether a path names a BVH file (case-insensitive extension)
 */
export function isBvhFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === FILE_EXTENSIONS.BVH;
}

/**
 * Find all BVH files in a directory (non-recursive)
 * Returns paths to all .bvh files, sorted by name
 */
export function findBvhFiles(dirPath: string): string[] {
  if (!isDirectory(dirPath)) {
    throw BvhErrorFactory.fileSystemError(`Not a directory: ${dirPath}`, dirPath, 'readdir');
  }

  return fs.readdirSync(dirPath)
    .filter(file => isBvhFile(file))
    .map(file => path.join(dirPath, file))
    .filter(filePath => !isDirectory(filePath))
    .sort();
}

/**
 * Get basename of file without extension
 * Example: "/path/to/walk.bvh" -> "walk"
 */
export function getBasenameWithoutExt(filePath: string): string {
  const basename = path.basename(filePath);
  return basename.replace(/\.[^/.]+$/, '');
}

/**
 * Check if path exists
 */
export function pathExists(filePath: string): boolean {
  try {
    fs.accessSync(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a whole BVH file as text
 */
export function readBvhFile(filePath: string, encoding: Encoding): string {
  if (!isBvhFile(filePath)) {
    throw BvhErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.UNSUPPORTED_EXTENSION}: ${path.extname(filePath) || '(none)'}`,
      filePath,
      'read'
    );
  }

  if (!pathExists(filePath)) {
    throw BvhErrorFactory.fileSystemError(`${ERROR_MESSAGES.FILE_NOT_FOUND}: ${filePath}`, filePath, 'read');
  }

  try {
    return fs.readFileSync(filePath, { encoding });
  } catch (error) {
    throw BvhErrorFactory.fileSystemError(
      `Failed to read ${filePath}`,
      filePath,
      'read',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
}
