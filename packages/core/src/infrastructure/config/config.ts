/**
 * @fileoverview Configuration - Environment and Override Loading
 *
 * @packageDocumentation
 * @module @weavearc/core/infrastructure/config
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * ## Precedence
 *
 * ```
 * overrides  >  environment  >  defaults
 * ```
 *
 * | Setting                     | Environment variable          | Default                  |
 * |-----------------------------|-------------------------------|--------------------------|
 * | `serviceName`               | `WEAVEARC_SERVICE_NAME`       | `'weavearc'`             |
 * | `logLevel`                  | `LOG_LEVEL`                   | by `NODE_ENV`            |
 * | `container.validateScopes`  | `WEAVEARC_VALIDATE_SCOPES`    | `true`                   |
 * | `container.eagerSingletons` | `WEAVEARC_EAGER_SINGLETONS`   | `false`                  |
 * | `cache.enabled`             | `WEAVEARC_CACHE_ENABLED`      | `true`                   |
 * | `cache.ttlMs`               | `WEAVEARC_CACHE_TTL_MS`       | `60000`                  |
 * | `cache.maxEntries`          | `WEAVEARC_CACHE_MAX_ENTRIES`  | `1000`                   |
 *
 * @version 1.0.0
 */

import { z } from 'zod';

import { createToken } from '../../domain/di';
import { LOG_LEVELS, type LogLevel, getDefaultLevel } from '../logging';

import { ConfigurationError } from './configuration.error';

// ============================================================================
// Schemas
// ============================================================================

const booleanEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1')
  .optional();

const intEnv = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform((v) => parseInt(v, 10))
  .optional();

/**
 * Environment variables read by `loadConfig`.
 */
export const EnvSchema = z.object({
  WEAVEARC_SERVICE_NAME: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  WEAVEARC_VALIDATE_SCOPES: booleanEnv,
  WEAVEARC_EAGER_SINGLETONS: booleanEnv,
  WEAVEARC_CACHE_ENABLED: booleanEnv,
  WEAVEARC_CACHE_TTL_MS: intEnv,
  WEAVEARC_CACHE_MAX_ENTRIES: intEnv,
});

export const ConfigSchema = z.object({
  serviceName: z.string().min(1).default('weavearc'),
  logLevel: z.enum(LOG_LEVELS),
  container: z
    .object({
      validateScopes: z.boolean().default(true),
      eagerSingletons: z.boolean().default(false),
    })
    .default({}),
  cache: z
    .object({
      enabled: z.boolean().default(true),
      ttlMs: z.number().int().positive().default(60_000),
      maxEntries: z.number().int().positive().default(1_000),
    })
    .default({}),
});

export type WeavearcConfig = z.infer<typeof ConfigSchema>;

export interface ConfigOverrides {
  serviceName?: string;
  logLevel?: LogLevel;
  container?: Partial<WeavearcConfig['container']>;
  cache?: Partial<WeavearcConfig['cache']>;
}

export const CONFIG_TOKEN = createToken<WeavearcConfig>('WeavearcConfig');

// ============================================================================
// Loading
// ============================================================================

/**
 * Build the configuration from environment variables and overrides.
 *
 * @param env - Environment (default: process.env)
 * @param overrides - Values taking precedence over the environment
 * @throws ConfigurationError if a variable or override is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig(process.env, { cache: { ttlMs: 5_000 } });
 * ```
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): WeavearcConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigurationError('environment configuration', parsedEnv.error.issues);
  }
  const vars = parsedEnv.data;

  const parsed = ConfigSchema.safeParse({
    serviceName: overrides.serviceName ?? vars.WEAVEARC_SERVICE_NAME,
    logLevel: overrides.logLevel ?? vars.LOG_LEVEL ?? getDefaultLevel({ NODE_ENV: env.NODE_ENV }),
    container: {
      validateScopes: overrides.container?.validateScopes ?? vars.WEAVEARC_VALIDATE_SCOPES,
      eagerSingletons: overrides.container?.eagerSingletons ?? vars.WEAVEARC_EAGER_SINGLETONS,
    },
    cache: {
      enabled: overrides.cache?.enabled ?? vars.WEAVEARC_CACHE_ENABLED,
      ttlMs: overrides.cache?.ttlMs ?? vars.WEAVEARC_CACHE_TTL_MS,
      maxEntries: overrides.cache?.maxEntries ?? vars.WEAVEARC_CACHE_MAX_ENTRIES,
    },
  });
  if (!parsed.success) {
    throw new ConfigurationError('configuration', parsed.error.issues);
  }

  return parsed.data;
}
