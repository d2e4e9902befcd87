/**
 * Directory planning and creation
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { AlreadyExistsError, FilesystemError, isErrnoException } from '../errors';
import type { TemplateCatalog } from '../templates/types';

/**
 * Every directory the catalog needs below the project root, parents first.
 * Union of the manifest's `directories` and each destination's parent chain.
 */
export function planDirectories(catalog: TemplateCatalog): string[] {
  const planned = new Set<string>();

  const addWithParents = (dir: string): void => {
    const segments = dir.split('/');
    for (let i = 1; i <= segments.length; i++) {
      planned.add(segments.slice(0, i).join('/'));
    }
  };

  for (const dir of catalog.directories) {
    addWithParents(dir);
  }

  for (const entry of catalog.entries) {
    const parent = path.posix.dirname(entry.destination);
    if (parent !== '.') {
      addWithParents(parent);
    }
  }

  return [...planned];
}

/**
 * Create the project root and its subdirectories.
 *
 * The root is created without `recursive` so a path that appeared after the
 * collision check still surfaces as AlreadyExistsError.
 */
export async function buildDirectories(
  projectRoot: string,
  directories: readonly string[]
): Promise<string[]> {
  try {
    await fs.mkdir(projectRoot);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      throw new AlreadyExistsError(projectRoot);
    }
    throw new FilesystemError('mkdir', projectRoot, error);
  }

  const created: string[] = [];
  for (const dir of directories) {
    const fullPath = path.join(projectRoot, dir);
    try {
      await fs.mkdir(fullPath, { recursive: true });
    } catch (error) {
      throw new FilesystemError('mkdir', fullPath, error);
    }
    created.push(dir);
  }

  return created;
}
