/**
 * flask-kickstart
 *
 * CLI entry point: scaffolds a Flask web-service project into a new directory.
 */

import { createProgram } from './program';

await createProgram().parseAsync();
