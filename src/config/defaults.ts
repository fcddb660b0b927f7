/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const LIMITS = {
  DEFAULT_MAX_STEPS: 30,
  STEP_CEILING: 100,
} as const;

export const TIMEOUTS = {
  COMMAND_TIMEOUT: 120_000,
  RATE_LIMIT_BACKOFF: 5_000,
} as const;

export const TOKEN_GUARDS = {
  MAX_TOKENS: 4096,
  MAX_APPEND_TAIL_CHARS: 5_000,
} as const;

export const DEFAULT_MARKERS = {
  begin: '----BEGIN_FUNCTION_CALL----',
  end: '----END_FUNCTION_CALL----',
  arg: '----ARG----',
  value: '----VALUE----',
} as const;

// Returned (through `finish`) when the step budget runs out.
export const BUDGET_EXHAUSTED_RESULT = 'budget exhausted';

export const DEFAULT_CONFIG_PATH = '.steploop.yaml';
export const DEFAULT_REPORT_PATH = '.artifacts';
