/**
 * flask-kickstart CLI commands
 */

export { registerCreateCommand, runCreate, type RunCreateOptions } from './create';
