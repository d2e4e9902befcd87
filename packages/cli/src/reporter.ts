/**
 * Progress reporting for the create command
 */

import chalk, { type ChalkInstance } from 'chalk';
import { FilesystemError, UsageError } from './errors';
import type { MaterializeResult, StepEvent } from './materializer/types';

export const APP_URL = 'http://localhost:8080';

/** Anything with a write(string) method: process.stdout, a test buffer */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ProgressReporter {
  start(projectName: string, dryRun: boolean): void;
  step(event: StepEvent): void;
  success(result: MaterializeResult): void;
  failure(error: unknown): void;
}

export interface ConsoleReporterOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  colors?: ChalkInstance;
}

export function describeStep(event: StepEvent): string {
  switch (event.kind) {
    case 'directories':
      return '📁 Created directory structure';
    case 'file':
      return `✅ Created ${event.path}`;
    case 'executable':
      return `🔧 Made ${event.path} executable`;
  }
}

export function nextSteps(projectName: string): string[] {
  return [
    'Next steps:',
    `1. cd ${projectName}`,
    '2. python -m venv venv',
    '3. source venv/bin/activate',
    '4. pip install -r requirements.txt',
    '5. python run.py',
    '',
    'Or use Docker:',
    `1. cd ${projectName}`,
    '2. make build',
    '3. make up',
    '',
    `Your app will be available at: ${APP_URL}`,
  ];
}

export class ConsoleReporter implements ProgressReporter {
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly colors: ChalkInstance;

  constructor(options: ConsoleReporterOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.colors = options.colors ?? chalk;
  }

  start(projectName: string, dryRun: boolean): void {
    const suffix = dryRun ? this.colors.gray(' (dry run)') : '';
    this.out(`Creating Flask app boilerplate: ${this.colors.bold(projectName)}${suffix}`);
  }

  step(event: StepEvent): void {
    this.out(this.colors.green(describeStep(event)));
  }

  success(result: MaterializeResult): void {
    if (result.dryRun) {
      this.out('');
      this.out(this.colors.bold('Directories that would be created:'));
      this.out(`  ${result.projectName}/`);
      result.directories.forEach((dir) => this.out(`  ${result.projectName}/${dir}/`));
      this.out('');
      this.out(this.colors.bold('Files that would be created:'));
      result.files.forEach((file) => this.out(`  ${result.projectName}/${file}`));
      this.out('');
      this.out(this.colors.yellow('Dry run: nothing was written.'));
      return;
    }

    this.out('');
    this.out(this.colors.bold(`🎉 Flask app '${result.projectName}' created successfully!`));
    this.out('');
    for (const line of nextSteps(result.projectName)) {
      this.out(line.startsWith('Your app') ? this.colors.cyan(line) : line);
    }
  }

  failure(error: unknown): void {
    if (error instanceof UsageError) {
      this.err(error.message);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.err(this.colors.red(`Error: ${message}`));

    if (error instanceof FilesystemError) {
      this.err(this.colors.yellow('Partially created files may remain; remove them before retrying.'));
    }
  }

  private out(line: string): void {
    this.stdout.write(line + '\n');
  }

  private err(line: string): void {
    this.stderr.write(line + '\n');
  }
}
