import { Command } from 'commander';
import { registerCreateCommand } from './commands';

export const VERSION = '0.1.0';

/**
 * Root commander program for flask-kickstart
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('flask-kickstart')
    .description('Scaffold a Flask web-service project')
    .version(VERSION, '--version');

  return registerCreateCommand(program);
}
