/**
 * Centralized Configuration Module
 *
 * Reads the process environment into typed values. Two layers live here:
 *
 * - Resolvers (`resolveBool`, `resolveString`, `resolveList`) turn a single
 *   environment variable into a typed value. They are pure given the
 *   environment snapshot they receive (defaults to `process.env`).
 * - `loadConfig()` assembles the full application configuration from the
 *   resolvers and validates it against a Zod schema.
 *
 * Usage:
 *   import { loadConfig } from './config';
 *
 *   const config = loadConfig();
 *   console.log(config.server.port);
 *   console.log(config.auth.apiKeys.length);
 *
 * @module config
 */

import { z } from 'zod';
import { PROJECT_NAME } from './metadata';

/** Environment snapshot the resolvers read from. */
export type Environment = Record<string, string | undefined>;

// =============================================================================
// Resolvers
// =============================================================================

/**
 * Reads a boolean environment variable.
 *
 * Only the literal `true` (in any case) is truthy. `1`, `yes` and every other
 * non-empty value resolve to `false`. Unset or empty values return `defaultValue`.
 *
 * @example
 * ```typescript
 * resolveBool('OTEL_ENABLED');          // false when unset
 * resolveBool('DATABASE_ECHO', true);   // true when unset
 * ```
 */
export function resolveBool(
  name: string,
  defaultValue: boolean = false,
  env: Environment = process.env
): boolean {
  const value = (env[name] ?? '').toLowerCase();
  if (!value) {
    return defaultValue;
  }
  return value === 'true';
}

/**
 * Reads a string environment variable, or `defaultValue` when it is unset.
 */
export function resolveString(
  name: string,
  defaultValue: string = '',
  env: Environment = process.env
): string {
  return env[name] ?? defaultValue;
}

/**
 * Reads a delimited list from an environment variable.
 *
 * Elements are trimmed and empty elements are dropped. Order and duplicates
 * are preserved.
 *
 * @example
 * ```typescript
 * // API_KEYS="a, ,b,,c"
 * resolveList('API_KEYS'); // ['a', 'b', 'c']
 *
 * // ALLOWED_HOSTS="x;y"
 * resolveList('ALLOWED_HOSTS', ';'); // ['x', 'y']
 * ```
 */
export function resolveList(
  name: string,
  separator: string = ',',
  defaultValue: string[] = [],
  env: Environment = process.env
): string[] {
  const value = env[name] ?? '';
  if (!value) {
    return defaultValue;
  }
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// =============================================================================
// Configuration Schema
// =============================================================================

/**
 * Log level names accepted by LOG_LEVEL. Lowercased before matching, and the
 * `warning`/`critical` spellings map onto pino's `warn`/`fatal`.
 */
const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: 'warn',
  critical: 'fatal',
};

const logLevelSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value;
    const lowered = value.trim().toLowerCase();
    return LOG_LEVEL_ALIASES[lowered] ?? lowered;
  },
  z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
);

export type LogLevel = z.infer<typeof logLevelSchema>;

const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().min(0).max(65535),
    host: z.string().min(1),
    nodeEnv: z.enum(['development', 'production', 'test']),
  }),

  auth: z.object({
    apiKeys: z.array(z.string().min(1)),
  }),

  database: z.object({
    url: z.string(),
    echo: z.boolean(),
  }),

  logging: z.object({
    level: logLevelSchema,
  }),

  // Checked by setupTelemetry() once telemetry is enabled, not here
  telemetry: z.object({
    enabled: z.boolean(),
    serviceName: z.string(),
    endpoint: z.string().optional(),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Thrown by `loadConfig()` when one or more environment variables hold a
 * value the schema rejects.
 */
export class ConfigValidationError extends Error {
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(message: string, invalidVars: { name: string; reason: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.invalidVars = invalidVars;
  }
}

/** Maps schema paths back to the environment variable that fed them. */
const ENV_VAR_BY_PATH: Record<string, string> = {
  'server.port': 'PORT',
  'server.host': 'HOST',
  'server.nodeEnv': 'NODE_ENV',
  'auth.apiKeys': 'API_KEYS',
  'database.url': 'DATABASE_URL',
  'database.echo': 'DATABASE_ECHO',
  'logging.level': 'LOG_LEVEL',
  'telemetry.enabled': 'OTEL_ENABLED',
  'telemetry.serviceName': 'OTEL_SERVICE_NAME',
  'telemetry.endpoint': 'OTEL_EXPORTER_OTLP_ENDPOINT',
};

function readEnvironment(env: Environment) {
  const endpoint = resolveString('OTEL_EXPORTER_OTLP_ENDPOINT', '', env);

  return {
    server: {
      port: resolveString('PORT', '8000', env),
      host: resolveString('HOST', '0.0.0.0', env),
      nodeEnv: resolveString('NODE_ENV', 'development', env),
    },
    auth: {
      apiKeys: resolveList('API_KEYS', ',', [], env),
    },
    database: {
      url: resolveString('DATABASE_URL', '', env),
      echo: resolveBool('DATABASE_ECHO', false, env),
    },
    logging: {
      level: resolveString('LOG_LEVEL', 'info', env),
    },
    telemetry: {
      enabled: resolveBool('OTEL_ENABLED', false, env),
      serviceName: resolveString('OTEL_SERVICE_NAME', '', env) || PROJECT_NAME,
      endpoint: endpoint || undefined,
    },
  };
}

/**
 * Builds the validated application configuration from an environment snapshot.
 *
 * @throws {ConfigValidationError} when a variable holds an unusable value
 *
 * @example
 * ```typescript
 * const config = loadConfig({ API_KEYS: 'test-token', LOG_LEVEL: 'DEBUG' });
 * config.auth.apiKeys; // ['test-token']
 * config.logging.level; // 'debug'
 * ```
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const result = configSchema.safeParse(readEnvironment(env));

  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => {
      const path = issue.path.filter((p) => typeof p === 'string').join('.');
      return { name: ENV_VAR_BY_PATH[path] ?? path, reason: issue.message };
    });
    const summary = invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ');
    throw new ConfigValidationError(`Invalid configuration: ${summary}`, invalidVars);
  }

  return result.data;
}
