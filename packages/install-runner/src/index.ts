/**
 * Install Runner
 *
 * A declarative, fail-fast runner for ordered installation steps.
 */

export * from './dsl/index.js';
export * from './dsl/loader.js';
export * from './config/index.js';
export * from './guards/index.js';
export * from './executor/index.js';
export * from './host/index.js';
export * from './patches/index.js';
export * from './patches/replacements.js';
export * from './shared/argv.js';
export * from './shared/errors.js';
export * from './shared/logger.js';
export { runCli, EXIT_USAGE } from './run.js';
