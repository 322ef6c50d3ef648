/**
 * File system helpers that validate every path before touching the disk.
 *
 * Paths are rejected when empty or when they contain null bytes, and are
 * resolved to absolute paths before use.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export async function safeReadTextFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Synchronously checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeExistsSync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  return fsSync.existsSync(validatedPath);
}

/**
 * Synchronously checks whether a path names an existing directory.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists and is a directory.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeIsDirectorySync(filePath: string): boolean {
  const validatedPath = validatePath(filePath);
  const stats = fsSync.statSync(validatedPath, { throwIfNoEntry: false });
  return stats?.isDirectory() ?? false;
}

/**
 * Existence check that treats an invalid path as a missing one.
 *
 * @param filePath - The path to check.
 * @returns True if the path is valid and exists.
 */
export function pathExists(filePath: string): boolean {
  try {
    return safeExistsSync(filePath);
  } catch (error) {
    if (error instanceof PathValidationError) {
      return false;
    }
    throw error;
  }
}
