import { z } from 'zod';

/**
 * Validation schemas using Zod for runtime type checking
 */

export const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace'], {
  errorMap: () => ({ message: 'Log level must be error, warn, info, debug or trace' })
});

export const connectionDefaultsSchema = z.object({
  host: z.string()
    .min(1, 'Host is required')
    .max(255, 'Host too long'),

  port: z.number()
    .int('Port must be an integer')
    .min(1, 'Port must be between 1 and 65535')
    .max(65535, 'Port must be between 1 and 65535'),

  user: z.string().min(1, 'User is required')
});

export const lifeguardConfigSchema = z.object({
  logLevel: logLevelSchema,

  /** Comma separated namespace globs; empty logs every namespace */
  logNamespace: z.string(),

  /** Directory relative file identifiers are resolved against */
  workDir: z.string().min(1, 'Work directory is required'),

  /** Write opening and closing marker lines on writable files */
  fileMarkers: z.boolean(),

  connection: connectionDefaultsSchema
});

export type LogLevelName = z.infer<typeof logLevelSchema>;
export type ConnectionDefaults = z.infer<typeof connectionDefaultsSchema>;
export type LifeguardConfig = z.infer<typeof lifeguardConfigSchema>;
