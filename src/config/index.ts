/**
 * Configuration entry point
 */

import { z } from 'zod';
import { ConfigError } from '../errors';
import type { ProcessEnvironment } from './resolver';

export * from './defaults';
export {
  resolveDeploymentConfig,
  REQUIRED_SECRET_VARIABLES,
  type ProcessEnvironment,
  type ResolverDefaults,
} from './resolver';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LogLevelSchema = z.enum(LOG_LEVELS);

export interface RuntimeSettings {
  logLevel: LogLevel;
}

/**
 * Process-wide settings that are not part of a deployment. The CLI flag
 * wins over LOG_LEVEL.
 */
export function loadRuntimeSettings(
  env: ProcessEnvironment,
  overrides: { logLevel?: string } = {},
): RuntimeSettings {
  const raw = overrides.logLevel ?? env.LOG_LEVEL ?? 'info';
  const parsed = LogLevelSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new ConfigError(`Invalid log level "${raw}": expected one of ${LOG_LEVELS.join(', ')}`, ['LOG_LEVEL']);
  }
  return { logLevel: parsed.data };
}
