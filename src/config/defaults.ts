/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used throughout the deployer.
 */

export const DEFAULT_DEPLOYMENT = {
  environment: 'development',
  registry: 'docker.io/yourusername',
  tag: 'latest',
  namespace: 'dashboard',
  imageName: 'dashboard',
  dockerfile: 'infrastructure/Dockerfile',
  buildContext: '.',
  composeFile: 'infrastructure/docker-compose.yml',
  composeCommand: 'docker-compose',
  manifestsPath: 'infrastructure/k8s',
  secretName: 'dashboard-secrets',
  serviceName: 'dashboard-service',
  podSelector: 'app=dashboard',
  cloudProvider: 'generic',
} as const;

export const DEFAULT_ENDPOINTS = {
  dashboard: 'http://localhost:8501',
  airflow: 'http://localhost:8080',
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  command: 30000, // 30 seconds
  dockerBuild: 600000, // 10 minutes
  dockerPush: 300000, // 5 minutes
  compose: 300000, // 5 minutes
  kubernetes: 30000, // 30 seconds
  podsReady: 300000, // 5 minutes
  servicesReady: 60000, // 1 minute
  pollInterval: 5000, // 5 seconds
  httpProbe: 5000, // 5 seconds per request
} as const;

export const DEFAULT_RETRY = {
  maxAttempts: 3,
  delayMs: 2000,
} as const;

/**
 * Directories created by `init`
 */
export const WORKSPACE_DIRECTORIES = [
  'data',
  'logs',
  'infrastructure/airflow_logs',
  'infrastructure/airflow_config',
] as const;

/**
 * Secret keys written into the cluster secret
 */
export const SECRET_KEYS = {
  databaseUrl: 'database-url',
  redisUrl: 'redis-url',
} as const;
