/**
 * Argument and project name validation
 */

import { InvalidNameError, UsageError } from '../errors';

const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Longest single path component most filesystems accept */
export const MAX_PROJECT_NAME_LENGTH = 255;

/**
 * Check the raw positional arguments and return the project name unchanged
 */
export function validateArguments(args: readonly string[]): string {
  if (args.length !== 1) {
    throw new UsageError();
  }
  return validateProjectName(args[0]);
}

export function validateProjectName(name: string): string {
  if (!PROJECT_NAME_PATTERN.test(name)) {
    throw new InvalidNameError(
      name,
      'App name should only contain letters, numbers, hyphens, and underscores'
    );
  }
  if (name.length > MAX_PROJECT_NAME_LENGTH) {
    throw new InvalidNameError(
      name,
      `App name must be at most ${MAX_PROJECT_NAME_LENGTH} characters long`
    );
  }
  return name;
}
