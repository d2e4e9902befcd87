/**
 * Error types for flask-kickstart
 *
 * Every failure the generator can report is a KickstartError subclass.
 * All of them are terminal: the run stops and the process exits with `exitCode`.
 */

export const CLI_NAME = 'flask-kickstart';

export class KickstartError extends Error {
  readonly code: string;
  readonly exitCode: number = 1;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KickstartError';
    this.code = code;
  }
}

/**
 * Wrong number of arguments
 */
export class UsageError extends KickstartError {
  constructor() {
    super(
      `Usage: ${CLI_NAME} <project_name>\nExample: ${CLI_NAME} my-flask-app`,
      'E_USAGE'
    );
    this.name = 'UsageError';
  }
}

export class InvalidNameError extends KickstartError {
  readonly projectName: string;

  constructor(projectName: string, reason: string) {
    super(reason, 'E_INVALID_NAME');
    this.name = 'InvalidNameError';
    this.projectName = projectName;
  }
}

export class AlreadyExistsError extends KickstartError {
  readonly path: string;

  constructor(targetPath: string) {
    super(`'${targetPath}' already exists`, 'E_EXISTS');
    this.name = 'AlreadyExistsError';
    this.path = targetPath;
  }
}

export type FilesystemOperation = 'inspect' | 'mkdir' | 'write' | 'chmod';

/**
 * Wraps an OS-level failure with the path and operation that triggered it
 */
export class FilesystemError extends KickstartError {
  readonly path: string;
  readonly operation: FilesystemOperation;
  readonly errno: string | undefined;

  constructor(operation: FilesystemOperation, targetPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} '${targetPath}': ${detail}`, 'E_FILESYSTEM', { cause });
    this.name = 'FilesystemError';
    this.path = targetPath;
    this.operation = operation;
    this.errno = isErrnoException(cause) ? cause.code : undefined;
  }
}

/**
 * The packaged template catalog is missing or malformed
 */
export class CatalogError extends KickstartError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'E_CATALOG', options);
    this.name = 'CatalogError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
