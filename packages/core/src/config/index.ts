/**
 * @fileoverview Configuration loading: defaults, then environment, then overrides
 */

import { ResourceError, ResourceErrorCode } from '../errors';
import { LifecycleDebug, parseDebugLevel } from '../logging/debug';
import { DEFAULT_CONFIG, ENV_VARS } from './defaults';
import { lifeguardConfigSchema, type ConnectionDefaults, type LifeguardConfig } from './schema';

export * from './schema';
export { DEFAULT_CONFIG, ENV_VARS } from './defaults';

export type LifeguardConfigOverrides = Partial<Omit<LifeguardConfig, 'connection'>> & {
  connection?: Partial<ConnectionDefaults>;
};

/**
 * Read overrides from environment variables. Values are left unparsed
 * where the schema will reject them with a useful message. `DEBUG` and
 * `DEBUG_LEVEL` apply when the `LIFEGUARD_LOG_*` variables are unset.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const connection: Record<string, unknown> = {};

  const logLevel = env[ENV_VARS.logLevel] || env[ENV_VARS.debugLevel];
  if (logLevel) overrides.logLevel = logLevel.toLowerCase();
  const logNamespace = env[ENV_VARS.logNamespace] ?? env[ENV_VARS.debugNamespace];
  if (logNamespace !== undefined) overrides.logNamespace = logNamespace;
  if (env[ENV_VARS.workDir]) overrides.workDir = env[ENV_VARS.workDir];
  if (env[ENV_VARS.dbHost]) connection.host = env[ENV_VARS.dbHost];
  if (env[ENV_VARS.dbUser]) connection.user = env[ENV_VARS.dbUser];

  const port = env[ENV_VARS.dbPort];
  if (port) {
    connection.port = /^\d+$/.test(port) ? Number(port) : port;
  }

  if (Object.keys(connection).length > 0) {
    overrides.connection = connection;
  }

  return overrides;
}

function layer(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const current = merged[key];
    if (isPlainObject(current) && isPlainObject(value)) {
      merged[key] = { ...current, ...value };
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge user configuration with defaults and validate the result
 */
export function mergeConfig(
  overrides: LifeguardConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LifeguardConfig {
  const merged = layer(layer({ ...DEFAULT_CONFIG }, readEnvOverrides(env)), { ...overrides });
  const result = lifeguardConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ResourceError(ResourceErrorCode.ConfigInvalid, issues.join('; '), {
      context: { operation: 'config.merge', metadata: { issues } },
    });
  }

  return result.data;
}

/**
 * Build the configuration and apply its logging settings
 */
export function loadConfig(
  overrides: LifeguardConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LifeguardConfig {
  const config = mergeConfig(overrides, env);
  LifecycleDebug.getInstance().configure({
    level: parseDebugLevel(config.logLevel),
    namespace: config.logNamespace,
  });
  return config;
}
