import { z } from 'zod';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Path templates of the endpoints the client calls; `{projectId}` is substituted. */
export interface RoblePaths {
  login: string;
  refresh: string;
  logout: string;
  signup: string;
  /** Base of the database endpoints (`/read`, `/insert`, `/update`, `/delete`). */
  database: string;
}

export const DEFAULT_PATHS: Readonly<RoblePaths> = Object.freeze({
  login: 'auth/{projectId}/login',
  refresh: 'auth/{projectId}/refresh-token',
  logout: 'auth/{projectId}/logout',
  signup: 'auth/{projectId}/signup-direct',
  database: 'database/{projectId}',
});

export const DEFAULT_TOKEN_SKEW_SECONDS = 5;
export const DEFAULT_TOKEN_TTL_SECONDS = 900;
export const DEFAULT_MAX_RETRIES = 1;

/** Number of refresh-and-resend cycles allowed per request after a 401/403. */
export type MaxRetries = 0 | 1;

/** Plain, serializable client settings. */
export interface RobleConfig {
  /** Service root, e.g. `https://roble-api.example.com` */
  baseUrl: string;
  /** Project the auth and database endpoints are scoped to */
  projectId: string;
  /** @default 5 */
  tokenSkewSeconds?: number;
  /** @default 1 */
  maxRetries?: MaxRetries;
  /** Transport timeout in milliseconds. @default 30000 */
  timeout?: number | false;
  /** Lifetime assumed for tokens whose expiry the service does not state. @default 900 */
  defaultTokenTtlSeconds?: number;
  /** Call the logout endpoint on {@link RobleClient.logout}. @default true */
  serverLogout?: boolean;
  /** Overrides of the default endpoint path templates */
  paths?: Partial<RoblePaths>;
}

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((value) => (value === undefined || value === '' ? undefined : Number(value)), schema.optional());

const envSchema = z
  .object({
    ROBLE_BASE_URL: z.string().url(),
    ROBLE_PROJECT_ID: z.string().min(1),
    ROBLE_TOKEN_SKEW_SECONDS: optionalNumber(z.number().min(0)),
    ROBLE_MAX_RETRIES: optionalNumber(z.number().int().min(0).max(1)),
    ROBLE_TIMEOUT_MS: optionalNumber(z.number().int().min(0)),
    ROBLE_TOKEN_TTL_SECONDS: optionalNumber(z.number().positive()),
  })
  .transform((env): RobleConfig => {
    const config: RobleConfig = { baseUrl: env.ROBLE_BASE_URL, projectId: env.ROBLE_PROJECT_ID };
    if (env.ROBLE_TOKEN_SKEW_SECONDS !== undefined) {
      config.tokenSkewSeconds = env.ROBLE_TOKEN_SKEW_SECONDS;
    }
    if (env.ROBLE_MAX_RETRIES !== undefined) {
      config.maxRetries = env.ROBLE_MAX_RETRIES === 0 ? 0 : 1;
    }
    if (env.ROBLE_TIMEOUT_MS !== undefined) {
      config.timeout = env.ROBLE_TIMEOUT_MS === 0 ? false : env.ROBLE_TIMEOUT_MS;
    }
    if (env.ROBLE_TOKEN_TTL_SECONDS !== undefined) {
      config.defaultTokenTtlSeconds = env.ROBLE_TOKEN_TTL_SECONDS;
    }
    return config;
  });

/**
 * Reads client settings from environment variables.
 *
 * Required: `ROBLE_BASE_URL`, `ROBLE_PROJECT_ID`.
 * Optional: `ROBLE_TOKEN_SKEW_SECONDS`, `ROBLE_MAX_RETRIES` (0 or 1), `ROBLE_TIMEOUT_MS`
 * (0 disables the timeout), `ROBLE_TOKEN_TTL_SECONDS`.
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): SafeWrapAsync<ValidationError, RobleConfig> {
  return validator(env, envSchema);
}

/** Resolves the full set of path templates, with `{projectId}` filled in. */
export function resolvePaths(projectId: string, overrides: Partial<RoblePaths> = {}): RoblePaths {
  const merged: RoblePaths = { ...DEFAULT_PATHS, ...overrides };
  const fill = (template: string) => template.replace(/\{projectId\}/g, encodeURIComponent(projectId));

  return {
    login: fill(merged.login),
    refresh: fill(merged.refresh),
    logout: fill(merged.logout),
    signup: fill(merged.signup),
    database: fill(merged.database),
  };
}
