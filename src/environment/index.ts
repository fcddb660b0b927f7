/**
 * Execution environment module.
 * Shell, file and git capabilities the agent reaches through tools.
 * The core never imports from here; the CLI wires it in.
 */

export type { ExecutionEnvironment } from './types.js';
export { createLocalEnvironment } from './local.js';
export type { LocalEnvironmentConfig } from './local.js';
export { runCommand, formatCommandOutput } from './shell.js';
export type { CommandOptions } from './shell.js';
export { generatePatch, hasPendingChanges } from './git.js';
export { createEnvironmentTools, createChangesGuard } from './tools.js';
