/**
 * flask-kickstart <project_name>
 *
 * Scaffold a Flask web-service project into a new directory
 */

import { Command } from 'commander';
import ora from 'ora';
import { FilesystemError, KickstartError } from '../errors';
import { configureLogger, createCommandLogger, getDefaultLogPath, logFullError } from '../logger';
import { materializeProject } from '../materializer';
import { ConsoleReporter, describeStep, type ProgressReporter } from '../reporter';
import { loadCatalog } from '../templates/catalog';
import type { TemplateCatalog } from '../templates/types';

const log = createCommandLogger('create');

export interface RunCreateOptions {
  cwd: string;
  dryRun?: boolean;
  reporter?: ProgressReporter;
  loadCatalog?: () => Promise<TemplateCatalog>;
}

interface CreateCommandOptions {
  cwd?: string;
  dryRun?: boolean;
  debugLog?: string | false;
}

/**
 * Run the generator and report the outcome. Returns the process exit code.
 */
export async function runCreate(args: readonly string[], options: RunCreateOptions): Promise<number> {
  const reporter = options.reporter ?? new ConsoleReporter();
  log.command('create', { args, cwd: options.cwd, dryRun: options.dryRun ?? false });

  try {
    const result = await materializeProject(args, {
      cwd: options.cwd,
      dryRun: options.dryRun,
      loadCatalog: options.loadCatalog,
      onStart: (projectName, projectRoot) => {
        log.info(`Materializing ${projectName}`, { projectRoot });
        reporter.start(projectName, options.dryRun ?? false);
      },
      onStep: (event) => {
        log.debug(describeStep(event));
        reporter.step(event);
      },
    });

    log.info(result.dryRun ? 'Dry run complete' : 'Project created', {
      projectRoot: result.projectRoot,
      files: result.files.length,
      dryRun: result.dryRun,
    });
    reporter.success(result);
    return 0;
  } catch (error) {
    if (error instanceof FilesystemError) {
      log.warn('Aborted after a filesystem error; partial output may remain', { path: error.path });
    }
    logFullError('create', error, { args, cwd: options.cwd });
    reporter.failure(error);
    return error instanceof KickstartError ? error.exitCode : 1;
  }
}

/**
 * Catalog loader that shows a spinner on stderr
 */
function loadCatalogWithSpinner(): Promise<TemplateCatalog> {
  const spinner = ora('Loading templates...').start();
  return loadCatalog().then(
    (catalog) => {
      spinner.succeed(`Loaded ${catalog.entries.length} templates`);
      return catalog;
    },
    (error: unknown) => {
      spinner.fail('Could not load templates');
      throw error;
    }
  );
}

/**
 * Attach the create arguments, options and action to the root program.
 *
 * Every option is long-form only and unknown dash tokens are kept as operands,
 * so a project name such as `-api` or `-h` reaches the validator. The exact
 * option names below can still be used as project names after `--`.
 */
export function registerCreateCommand(program: Command): Command {
  return program
    .argument('[project_name...]', 'name of the project directory to create')
    .option('--cwd <dir>', 'directory to create the project in')
    .option('--dry-run', 'list what would be created without writing anything')
    .option('--debug-log <file>', `debug log location (default: ${getDefaultLogPath()})`)
    .option('--no-debug-log', 'disable the debug log')
    .helpOption('--help', 'display help for command')
    .allowUnknownOption()
    .action(async (names: string[], options: CreateCommandOptions) => {
      if (options.debugLog !== undefined) {
        configureLogger({ logFile: options.debugLog === false ? null : options.debugLog });
      }

      const exitCode = await runCreate(names, {
        cwd: options.cwd ?? process.cwd(),
        dryRun: options.dryRun,
        loadCatalog: loadCatalogWithSpinner,
      });

      if (exitCode !== 0) {
        process.exitCode = exitCode;
      }
    });
}
