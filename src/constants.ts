/**
 * Global constants for regsync
 */

export const VERSION = "0.1.0";

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  config: 2,
  cancelled: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// Environment variables read by the CLI
export const ENV_LOG_LEVEL = "REGSYNC_LOG_LEVEL";
export const ENV_SOURCE_USERNAME = "REGSYNC_SOURCE_USERNAME";
export const ENV_SOURCE_TOKEN = "REGSYNC_SOURCE_TOKEN";
export const ENV_AZ_PATH = "REGSYNC_AZ_PATH";

// Username sent with a source token when none is configured
export const DEFAULT_TOKEN_USERNAME = "token";
