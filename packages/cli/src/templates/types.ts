/**
 * Types for the template catalog
 */

export const PLACEHOLDER_NAMES = ['projectName'] as const;

export type PlaceholderName = (typeof PLACEHOLDER_NAMES)[number];

export type TemplateVariables = Record<PlaceholderName, string>;

export interface TemplateEntry {
  /** Path relative to the project root, `/`-separated */
  destination: string;
  /** Payload file relative to the catalog's files/ directory */
  source: string;
  placeholders: PlaceholderName[];
  executable: boolean;
  content: string;
}

export interface TemplateCatalog {
  name: string;
  /** Directories created even when no entry lives directly in them */
  directories: string[];
  entries: TemplateEntry[];
}
