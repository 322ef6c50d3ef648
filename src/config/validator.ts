/**
 * Semantic validation for the loader configuration.
 *
 * Checks what the types cannot:
 * - At least one candidate path, none of them unusable
 * - Search paths are usable and, given a checker, existing directories
 *
 * @packageDocumentation
 */

import { PathValidationError, safeExistsSync, safeIsDirectorySync, validatePath } from '../utils/safe-fs.js';
import type { LoaderConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  /** Whether the path exists. */
  exists: boolean;
  /** Whether the path is a directory (if it exists). */
  isDirectory?: boolean;
  /** Error message if the check failed. */
  errorMessage?: string;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string, isDirectory: boolean) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateLoaderConfigOptions {
  /**
   * Function to check if search directories exist.
   * If not provided, existence checks are skipped.
   */
  pathChecker?: PathChecker;
}

/**
 * Path checker backed by the file system.
 */
export const fileSystemPathChecker: PathChecker = (filePath) => {
  if (!safeExistsSync(filePath)) {
    return { exists: false };
  }
  return { exists: true, isDirectory: safeIsDirectorySync(filePath) };
};

/**
 * Records a path that is empty or contains null bytes.
 */
function validatePathSyntax(pathValue: string, fieldPath: string, errors: ValidationError[]): boolean {
  try {
    validatePath(pathValue);
    return true;
  } catch (error) {
    if (!(error instanceof PathValidationError)) {
      throw error;
    }
    errors.push({ field: fieldPath, value: pathValue, message: error.message });
    return false;
  }
}

/**
 * Validates that a path exists using the provided checker.
 *
 * @param pathValue - The path to validate.
 * @param fieldPath - The field path for error reporting.
 * @param pathChecker - Function to check path existence.
 * @param errors - Array to accumulate errors into.
 * @param isDirectory - Whether the path should be a directory.
 */
function validatePathExists(
  pathValue: string,
  fieldPath: string,
  pathChecker: PathChecker,
  errors: ValidationError[],
  isDirectory: boolean
): void {
  const result = pathChecker(pathValue, isDirectory);

  if (!result.exists) {
    errors.push({
      field: fieldPath,
      value: pathValue,
      message: result.errorMessage ?? `Path does not exist: '${pathValue}'`,
    });
    return;
  }

  if (isDirectory && result.isDirectory === false) {
    errors.push({
      field: fieldPath,
      value: pathValue,
      message: `Path exists but is not a directory: '${pathValue}'`,
    });
  }
}

/**
 * Validates the loader configuration semantically.
 *
 * @param config - The loader configuration to validate.
 * @param options - Validation options.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateLoaderConfig(config, { pathChecker: fileSystemPathChecker });
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateLoaderConfig(
  config: LoaderConfig,
  options: ValidateLoaderConfigOptions = {}
): ValidationResult {
  const { pathChecker } = options;
  const errors: ValidationError[] = [];

  if (config.candidate_paths.length === 0) {
    errors.push({
      field: 'candidate_paths',
      value: config.candidate_paths,
      message: 'At least one candidate path is required',
    });
  }
  config.candidate_paths.forEach((candidate, index) => {
    validatePathSyntax(candidate, `candidate_paths[${String(index)}]`, errors);
  });

  const searchPaths = [
    ['sound_search_path', config.sound_search_path],
    ['vibration_search_path', config.vibration_search_path],
  ] as const;
  for (const [field, value] of searchPaths) {
    if (value === undefined) {
      continue;
    }
    if (validatePathSyntax(value, field, errors) && pathChecker !== undefined) {
      validatePathExists(value, field, pathChecker, errors, true);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates the loader configuration and throws if invalid.
 *
 * @param config - The loader configuration to validate.
 * @param options - Validation options.
 * @throws ConfigValidationError if validation fails.
 */
export function assertLoaderConfigValid(
  config: LoaderConfig,
  options: ValidateLoaderConfigOptions = {}
): void {
  const result = validateLoaderConfig(config, options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
