/**
 * @fileoverview Default configuration values and environment overrides
 */

import type { LifeguardConfig } from './schema';

/**
 * Default values for lifeguard configuration
 */
export const DEFAULT_CONFIG: LifeguardConfig = {
  logLevel: 'warn',
  logNamespace: '',
  workDir: '.',
  fileMarkers: true,
  connection: {
    host: 'localhost',
    port: 5432,
    user: 'admin',
  },
};

/**
 * Environment variables read by loadConfig
 */
export const ENV_VARS = {
  logLevel: 'LIFEGUARD_LOG_LEVEL',
  logNamespace: 'LIFEGUARD_LOG_NAMESPACE',
  workDir: 'LIFEGUARD_WORK_DIR',
  dbHost: 'LIFEGUARD_DB_HOST',
  dbPort: 'LIFEGUARD_DB_PORT',
  dbUser: 'LIFEGUARD_DB_USER',
  /** Fallbacks for logLevel and logNamespace, shared with the debug logger */
  debugLevel: 'DEBUG_LEVEL',
  debugNamespace: 'DEBUG',
} as const;
