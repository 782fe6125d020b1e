/**
 * Environment Resolver
 *
 * Turns positional arguments and process environment into a validated,
 * frozen DeploymentConfig. Pure: reads only its inputs and calls nothing
 * external.
 */

import { z } from 'zod';
import { ConfigError } from '../errors';
import {
  CLOUD_PROVIDERS,
  DEPLOY_TARGETS,
  ENVIRONMENTS,
  type DeploymentConfig,
  type DeployTarget,
  type Environment,
} from '../domain/types';
import { DEFAULT_DEPLOYMENT, DEFAULT_ENDPOINTS, DEFAULT_TIMEOUTS } from './defaults';

export type ProcessEnvironment = Readonly<Record<string, string | undefined>>;

export interface ResolverDefaults {
  registry?: string;
  tag?: string;
}

/**
 * Variables that must be present whenever cluster secrets get provisioned
 */
export const REQUIRED_SECRET_VARIABLES = ['DATABASE_URL', 'REDIS_URL'] as const;

const EnvironmentSchema = z.enum(ENVIRONMENTS);
const CloudProviderSchema = z.enum(CLOUD_PROVIDERS);
const DeployTargetSchema = z.enum(DEPLOY_TARGETS);

// Docker's tag grammar: up to 128 word characters, dots and dashes, not leading with . or -
const TagSchema = z
  .string()
  .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, 'must be a valid image tag');

const RegistrySchema = z
  .string()
  .min(1, 'must not be empty')
  .regex(/^[^\s:]+(:\d+)?(\/[^\s]+)*$/, 'must be a registry host or host/namespace')
  .transform((value) => value.replace(/\/+$/, ''));

const SecondsSchema = z.coerce.number().int().positive();

const UrlSchema = z.string().url();

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function fail(field: string, issue: z.ZodError, raw: unknown): never {
  const detail = issue.issues.map((i) => i.message).join('; ');
  throw new ConfigError(`Invalid ${field} "${String(raw)}": ${detail}`, [field]);
}

function parseField<S extends z.ZodTypeAny>(schema: S, field: string, raw: unknown): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) fail(field, parsed.error, raw);
  return parsed.data;
}

function defaultTarget(environment: Environment): DeployTarget {
  return environment === 'production' ? 'kubernetes' : 'local';
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Resolve a deployment configuration.
 *
 * @throws ConfigError on an unknown environment, malformed registry, tag,
 *   provider or override, or missing secret variables for a cluster deploy
 */
export function resolveDeploymentConfig(
  rawEnvironment: string | undefined,
  rawRegistry: string | undefined,
  rawTag: string | undefined,
  env: ProcessEnvironment,
  defaults: ResolverDefaults = {},
): DeploymentConfig {
  const environment = parseField(
    EnvironmentSchema,
    'environment',
    blankToUndefined(rawEnvironment) ?? DEFAULT_DEPLOYMENT.environment,
  );
  const registry = parseField(
    RegistrySchema,
    'registry',
    blankToUndefined(rawRegistry) ?? defaults.registry ?? DEFAULT_DEPLOYMENT.registry,
  );
  const tag = parseField(
    TagSchema,
    'tag',
    blankToUndefined(rawTag) ?? defaults.tag ?? DEFAULT_DEPLOYMENT.tag,
  );
  const cloudProvider = parseField(
    CloudProviderSchema,
    'CLOUD_PROVIDER',
    blankToUndefined(env.CLOUD_PROVIDER) ?? DEFAULT_DEPLOYMENT.cloudProvider,
  );
  const targetOverride = blankToUndefined(env.DEPLOY_TARGET);
  const target =
    targetOverride === undefined
      ? defaultTarget(environment)
      : parseField(DeployTargetSchema, 'DEPLOY_TARGET', targetOverride);

  if (environment === 'production' && target !== 'kubernetes') {
    throw new ConfigError('Production deployments must target kubernetes', ['DEPLOY_TARGET']);
  }

  let secrets: DeploymentConfig['secrets'];
  if (target === 'kubernetes') {
    const missing = REQUIRED_SECRET_VARIABLES.filter((name) => blankToUndefined(env[name]) === undefined);
    if (missing.length > 0) {
      throw new ConfigError(
        `Missing required environment variables for ${environment} deployment: ${missing.join(', ')}`,
        [...missing],
      );
    }
    secrets = {
      databaseUrl: env.DATABASE_URL ?? '',
      redisUrl: env.REDIS_URL ?? '',
    };
  }

  const username = blankToUndefined(env.REGISTRY_USERNAME);
  const password = blankToUndefined(env.REGISTRY_PASSWORD);
  if ((username === undefined) !== (password === undefined)) {
    throw new ConfigError('REGISTRY_USERNAME and REGISTRY_PASSWORD must be set together', [
      username === undefined ? 'REGISTRY_USERNAME' : 'REGISTRY_PASSWORD',
    ]);
  }

  const readyTimeout = blankToUndefined(env.READY_TIMEOUT);
  const readySeconds =
    readyTimeout === undefined ? undefined : parseField(SecondsSchema, 'READY_TIMEOUT', readyTimeout);

  const composeCommand = (blankToUndefined(env.COMPOSE_COMMAND) ?? DEFAULT_DEPLOYMENT.composeCommand)
    .split(/\s+/)
    .filter((part) => part.length > 0);

  const config: DeploymentConfig = {
    environment,
    registry,
    tag,
    namespace: DEFAULT_DEPLOYMENT.namespace,
    cloudProvider,
    target,
    image: {
      registry,
      name: blankToUndefined(env.IMAGE_NAME) ?? DEFAULT_DEPLOYMENT.imageName,
      tag,
    },
    dockerfile: blankToUndefined(env.DOCKERFILE) ?? DEFAULT_DEPLOYMENT.dockerfile,
    buildContext: blankToUndefined(env.BUILD_CONTEXT) ?? DEFAULT_DEPLOYMENT.buildContext,
    composeFile: blankToUndefined(env.COMPOSE_FILE) ?? DEFAULT_DEPLOYMENT.composeFile,
    composeCommand,
    manifestsPath: blankToUndefined(env.K8S_MANIFESTS) ?? DEFAULT_DEPLOYMENT.manifestsPath,
    secretName: DEFAULT_DEPLOYMENT.secretName,
    serviceName: DEFAULT_DEPLOYMENT.serviceName,
    podSelector: DEFAULT_DEPLOYMENT.podSelector,
    dashboardUrl: parseField(
      UrlSchema,
      'DASHBOARD_URL',
      blankToUndefined(env.DASHBOARD_URL) ?? DEFAULT_ENDPOINTS.dashboard,
    ),
    airflowUrl: parseField(
      UrlSchema,
      'AIRFLOW_URL',
      blankToUndefined(env.AIRFLOW_URL) ?? DEFAULT_ENDPOINTS.airflow,
    ),
    timeouts: {
      podsMs: readySeconds === undefined ? DEFAULT_TIMEOUTS.podsReady : readySeconds * 1000,
      servicesMs: readySeconds === undefined ? DEFAULT_TIMEOUTS.servicesReady : readySeconds * 1000,
      pollIntervalMs: DEFAULT_TIMEOUTS.pollInterval,
    },
    ...(secrets !== undefined && { secrets }),
    ...(username !== undefined && password !== undefined && { registryAuth: { username, password } }),
  };

  return deepFreeze(config);
}
