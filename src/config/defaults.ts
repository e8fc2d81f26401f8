/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const LIMITS = {
  MAX_TOTAL_STEPS: 30,
  MAX_CONSECUTIVE_REGENERATIONS: 3,
} as const;

export const MEMORY = {
  CAPACITY: 20,
  SUMMARY_WINDOW: 10,
  RECENT_TURNS: 5,
} as const;

export const TOKEN_GUARDS = {
  MAX_RAW_RESPONSE_CHARS: 2_000,
  MAX_RESULT_PREVIEW_CHARS: 200,
} as const;

export const PATHS = {
  CONFIG_FILE: '.planloop.yaml',
  REPORTS_DIR: 'reports',
} as const;
