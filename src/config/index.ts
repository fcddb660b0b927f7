/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Instructions are read once and handed to the agent as a value.
 */

export {
  LIMITS,
  TIMEOUTS,
  TOKEN_GUARDS,
  DEFAULT_MARKERS,
  BUDGET_EXHAUSTED_RESULT,
  DEFAULT_CONFIG_PATH,
  DEFAULT_REPORT_PATH,
} from './defaults.js';
export { loadConfigFile, loadConfigFileIfPresent } from './loader.js';
export { loadInstructions, DEFAULT_INSTRUCTIONS_PATH } from './prompts.js';
