/**
 * Types for project materialization
 */

import type { TemplateCatalog } from '../templates/types';

export type StepEvent =
  | { kind: 'directories'; paths: string[] }
  | { kind: 'file'; path: string }
  | { kind: 'executable'; path: string };

export interface MaterializeOptions {
  /** Directory the project folder is created in */
  cwd: string;
  dryRun?: boolean;
  loadCatalog?: () => Promise<TemplateCatalog>;
  /** Called once the name is valid and the target is free, before any write */
  onStart?: (projectName: string, projectRoot: string) => void;
  onStep?: (event: StepEvent) => void;
}

export interface MaterializeResult {
  projectName: string;
  projectRoot: string;
  directories: string[];
  files: string[];
  executables: string[];
  dryRun: boolean;
}
