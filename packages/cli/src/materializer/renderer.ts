/**
 * Template rendering
 *
 * Only the placeholders an entry declares are substituted. Entries without
 * placeholders are written byte-for-byte. Project names are restricted to
 * [A-Za-z0-9_-], so interpolated values never need escaping.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { FilesystemError } from '../errors';
import { placeholderToken } from '../templates/catalog';
import type { TemplateEntry, TemplateVariables } from '../templates/types';

export const EXECUTABLE_MODE = 0o755;

export function renderEntry(entry: TemplateEntry, variables: TemplateVariables): string {
  let content = entry.content;
  for (const name of entry.placeholders) {
    const value = variables[name];
    content = content.replaceAll(placeholderToken(name), () => value);
  }
  return content;
}

/**
 * Parent directories are created by the directory builder; writing into a
 * missing one means the steps ran out of order.
 */
async function assertDirectory(dir: string, targetPath: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(dir)).isDirectory();
  } catch (error) {
    throw new FilesystemError('write', targetPath, error);
  }
  if (!isDirectory) {
    const notDir = Object.assign(new Error(`${dir} is not a directory`), { code: 'ENOTDIR' });
    throw new FilesystemError('write', targetPath, notDir);
  }
}

/**
 * Write entries in catalog order. Stops at the first failure; earlier files stay on disk.
 */
export async function writeEntries(
  projectRoot: string,
  entries: readonly TemplateEntry[],
  variables: TemplateVariables,
  onWritten?: (entry: TemplateEntry) => void
): Promise<string[]> {
  const written: string[] = [];

  for (const entry of entries) {
    const targetPath = path.join(projectRoot, entry.destination);
    await assertDirectory(path.dirname(targetPath), targetPath);

    try {
      await fs.writeFile(targetPath, renderEntry(entry, variables), { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      throw new FilesystemError('write', targetPath, error);
    }

    written.push(entry.destination);
    onWritten?.(entry);
  }

  return written;
}

/**
 * Runs once every entry is on disk
 */
export async function applyPostWriteSteps(
  projectRoot: string,
  entries: readonly TemplateEntry[]
): Promise<string[]> {
  const executables: string[] = [];

  for (const entry of entries.filter((e) => e.executable)) {
    const targetPath = path.join(projectRoot, entry.destination);
    try {
      await fs.chmod(targetPath, EXECUTABLE_MODE);
    } catch (error) {
      throw new FilesystemError('chmod', targetPath, error);
    }
    executables.push(entry.destination);
  }

  return executables;
}
