/**
 * Project materializer
 *
 * validate → load catalog → collision guard → directories → templates → post-write
 */

import * as path from 'path';
import { loadCatalog } from '../templates/catalog';
import { buildDirectories, planDirectories } from './directories';
import { assertTargetAvailable } from './guard';
import { applyPostWriteSteps, writeEntries } from './renderer';
import { validateArguments } from './validate';
import type { MaterializeOptions, MaterializeResult } from './types';

export { validateArguments, validateProjectName, MAX_PROJECT_NAME_LENGTH } from './validate';
export { assertTargetAvailable } from './guard';
export { planDirectories, buildDirectories } from './directories';
export { renderEntry, writeEntries, applyPostWriteSteps, EXECUTABLE_MODE } from './renderer';
export type { MaterializeOptions, MaterializeResult, StepEvent } from './types';

export async function materializeProject(
  args: readonly string[],
  options: MaterializeOptions
): Promise<MaterializeResult> {
  const projectName = validateArguments(args);
  const catalog = await (options.loadCatalog ?? (() => loadCatalog()))();
  const projectRoot = path.resolve(options.cwd, projectName);

  await assertTargetAvailable(projectRoot);

  const directories = planDirectories(catalog);
  const dryRun = options.dryRun ?? false;

  options.onStart?.(projectName, projectRoot);

  if (dryRun) {
    return {
      projectName,
      projectRoot,
      directories,
      files: catalog.entries.map((entry) => entry.destination),
      executables: catalog.entries.filter((entry) => entry.executable).map((entry) => entry.destination),
      dryRun,
    };
  }

  await buildDirectories(projectRoot, directories);
  options.onStep?.({ kind: 'directories', paths: directories });

  const files = await writeEntries(projectRoot, catalog.entries, { projectName }, (entry) =>
    options.onStep?.({ kind: 'file', path: entry.destination })
  );

  const executables = await applyPostWriteSteps(projectRoot, catalog.entries);
  for (const executable of executables) {
    options.onStep?.({ kind: 'executable', path: executable });
  }

  return { projectName, projectRoot, directories, files, executables, dryRun };
}
