/**
 * Template catalog loader
 *
 * A catalog is a directory under templates/ holding a manifest.json and a
 * files/ directory with the payloads. The manifest is validated with zod and
 * every payload is read before anything is written.
 */

import { existsSync } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { CatalogError } from '../errors';
import { PLACEHOLDER_NAMES, type TemplateCatalog, type TemplateEntry } from './types';

export const DEFAULT_CATALOG = 'flask';
const MANIFEST_FILENAME = 'manifest.json';
const FILES_DIR = 'files';
const TEMPLATES_DIR = 'templates';

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

const relativePath = z
  .string()
  .min(1)
  .refine(isSafeRelativePath, { message: 'must be a relative path without "." or ".." segments' });

const ManifestEntrySchema = z.object({
  destination: relativePath,
  source: relativePath,
  placeholders: z.array(z.enum(PLACEHOLDER_NAMES)).default([]),
  executable: z.boolean().default(false),
});

const ManifestSchema = z.object({
  name: z.string().min(1),
  directories: z.array(relativePath).default([]),
  entries: z.array(ManifestEntrySchema).min(1),
});

export type TemplateManifest = z.infer<typeof ManifestSchema>;

/**
 * `/`-separated, relative, and free of empty, "." and ".." segments
 */
export function isSafeRelativePath(value: string): boolean {
  if (value.includes('\\') || path.posix.isAbsolute(value) || path.win32.isAbsolute(value)) {
    return false;
  }
  return value.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

export function placeholderToken(name: string): string {
  return `{{${name}}}`;
}

/**
 * Locate the templates/ directory shipped with the package.
 * Walks up from this module so it resolves from both src/ and the bundled dist/.
 */
export function getTemplatesDir(startDir: string = moduleDir): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, TEMPLATES_DIR);
    if (existsSync(path.join(candidate, DEFAULT_CATALOG, MANIFEST_FILENAME))) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new CatalogError(`Could not find the ${TEMPLATES_DIR}/ directory above ${startDir}`);
    }
    dir = parent;
  }
}

/**
 * Parse and validate a manifest
 */
export function parseManifest(raw: string, source: string = MANIFEST_FILENAME): TemplateManifest {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CatalogError(`Invalid JSON in ${source}: ${detail}`, { cause: error });
  }

  const result = ManifestSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new CatalogError(`Invalid template manifest ${source}: ${issues}`, { cause: result.error });
  }

  const seen = new Set<string>();
  for (const entry of result.data.entries) {
    if (seen.has(entry.destination)) {
      throw new CatalogError(`Duplicate destination in ${source}: ${entry.destination}`);
    }
    seen.add(entry.destination);
  }

  return result.data;
}

/**
 * Load a catalog and all of its payloads
 */
export async function loadCatalog(
  name: string = DEFAULT_CATALOG,
  templatesDir: string = getTemplatesDir()
): Promise<TemplateCatalog> {
  const catalogDir = path.join(templatesDir, name);
  const manifestPath = path.join(catalogDir, MANIFEST_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, 'utf-8');
  } catch (error) {
    throw new CatalogError(`Template catalog '${name}' not found at ${manifestPath}`, { cause: error });
  }

  const manifest = parseManifest(raw, manifestPath);
  const entries: TemplateEntry[] = [];

  for (const entry of manifest.entries) {
    const sourcePath = path.join(catalogDir, FILES_DIR, entry.source);
    let content: string;
    try {
      content = await fs.readFile(sourcePath, 'utf-8');
    } catch (error) {
      throw new CatalogError(`Missing template payload for ${entry.destination}: ${sourcePath}`, {
        cause: error,
      });
    }

    for (const placeholder of entry.placeholders) {
      if (!content.includes(placeholderToken(placeholder))) {
        throw new CatalogError(
          `${entry.destination} declares ${placeholderToken(placeholder)} but its payload never uses it`
        );
      }
    }

    entries.push({ ...entry, content });
  }

  return {
    name: manifest.name,
    directories: manifest.directories,
    entries,
  };
}
