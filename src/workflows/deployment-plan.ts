/**
 * Deployment plan
 *
 * prerequisites -> build -> deployLocal -> deployKubernetes. Exactly one of
 * the deploy steps applies to the resolved target; the other reports
 * `skipped`.
 */

import type { DeploymentConfig } from '../domain/types';
import { DEFAULT_TIMEOUTS, SECRET_KEYS } from '../config/defaults';
import type { Step } from './pipeline';
import { compositeStep, gatewayStep, readinessStep } from './steps';

const onlyFor =
  (target: DeploymentConfig['target']) =>
  (config: DeploymentConfig): string | undefined =>
    config.target === target ? undefined : `Not a ${target} deployment (target: ${config.target})`;

const pushImage = (options: { productionOnly: boolean }): Step =>
  gatewayStep(
    'push',
    (config) => ({
      operation: 'pushImage',
      image: config.image,
      ...(config.registryAuth !== undefined && { credentials: { ...config.registryAuth } }),
    }),
    {
      description: 'Push the image to the registry',
      retryable: true,
      ...(options.productionOnly && {
        skipWhen: (config: DeploymentConfig) =>
          config.environment === 'production' ? undefined : `Push skipped for ${config.environment}`,
      }),
    },
  );

export function prerequisitesStep(): Step {
  return compositeStep(
    'prerequisites',
    [
      gatewayStep('dockerEngine', () => ({ operation: 'pingEngine' }), {
        description: 'Docker engine is reachable',
      }),
      gatewayStep(
        'composeTool',
        (config) => ({ operation: 'checkTool', command: config.composeCommand[0] ?? 'docker-compose' }),
        { description: 'Compose tool is installed', skipWhen: onlyFor('local') },
      ),
      gatewayStep('clusterAccess', () => ({ operation: 'pingCluster' }), {
        description: 'Cluster API is reachable',
        skipWhen: onlyFor('kubernetes'),
      }),
      gatewayStep('minikubeTool', () => ({ operation: 'checkTool', command: 'minikube', args: ['version'] }), {
        description: 'minikube is installed',
        skipWhen: (config) =>
          config.target === 'kubernetes' && config.cloudProvider === 'minikube'
            ? undefined
            : 'Not a minikube deployment',
      }),
    ],
    { description: 'Check tools and connectivity' },
  );
}

export function buildStep(): Step {
  return gatewayStep(
    'build',
    (config) => ({
      operation: 'buildImage',
      image: config.image,
      dockerfile: config.dockerfile,
      context: config.buildContext,
      buildArgs: { ENVIRONMENT: config.environment },
    }),
    { description: 'Build the application image' },
  );
}

export function deployLocalStep(): Step {
  return compositeStep(
    'deployLocal',
    [
      pushImage({ productionOnly: true }),
      gatewayStep(
        'stopExisting',
        (config) => ({ operation: 'composeDown', command: [...config.composeCommand], file: config.composeFile }),
        { description: 'Stop running services', advisory: true },
      ),
      gatewayStep(
        'startServices',
        (config) => ({ operation: 'composeUp', command: [...config.composeCommand], file: config.composeFile }),
        { description: 'Start services with compose' },
      ),
      readinessStep(
        'awaitDashboard',
        (config) => ({
          target: { kind: 'http', url: config.dashboardUrl },
          timeoutMs: config.timeouts.servicesMs,
          pollIntervalMs: config.timeouts.pollIntervalMs,
        }),
        { description: 'Wait for the dashboard to answer' },
      ),
      readinessStep(
        'awaitAirflow',
        (config) => ({
          target: { kind: 'http', url: config.airflowUrl },
          timeoutMs: config.timeouts.servicesMs,
          pollIntervalMs: config.timeouts.pollIntervalMs,
        }),
        { description: 'Wait for Airflow to answer', advisory: true },
      ),
    ],
    { description: 'Deploy with docker compose', skipWhen: onlyFor('local') },
  );
}

export function deployKubernetesStep(): Step {
  return compositeStep(
    'deployKubernetes',
    [
      pushImage({ productionOnly: false }),
      gatewayStep('ensureNamespace', (config) => ({ operation: 'ensureNamespace', namespace: config.namespace }), {
        description: 'Create the namespace if missing',
      }),
      gatewayStep(
        'createSecret',
        (config) => ({
          operation: 'createSecret',
          namespace: config.namespace,
          name: config.secretName,
          data: {
            [SECRET_KEYS.databaseUrl]: config.secrets?.databaseUrl ?? '',
            [SECRET_KEYS.redisUrl]: config.secrets?.redisUrl ?? '',
          },
        }),
        { description: 'Write database and cache connection secrets' },
      ),
      gatewayStep(
        'applyManifests',
        (config) => ({ operation: 'applyManifests', namespace: config.namespace, path: config.manifestsPath }),
        { description: 'Apply Kubernetes manifests', retryable: true },
      ),
      gatewayStep(
        'awaitPods',
        (config) => ({
          operation: 'waitForCondition',
          namespace: config.namespace,
          selector: config.podSelector,
          timeoutMs: config.timeouts.podsMs,
          pollIntervalMs: config.timeouts.pollIntervalMs,
        }),
        { description: 'Wait for pods to become ready' },
      ),
      gatewayStep(
        'resolveServiceUrl',
        (config) => ({
          operation: 'queryServiceEndpoint',
          namespace: config.namespace,
          service: config.serviceName,
          provider: config.cloudProvider ?? 'generic',
          timeoutMs: DEFAULT_TIMEOUTS.command,
        }),
        { description: 'Resolve the dashboard service URL', retryable: true },
      ),
    ],
    { description: 'Deploy to Kubernetes', skipWhen: onlyFor('kubernetes') },
  );
}

/**
 * The full default plan, in execution order
 */
export function createDeploymentPlan(): Step[] {
  return [prerequisitesStep(), buildStep(), deployLocalStep(), deployKubernetesStep()];
}

export interface PlannedStep {
  name: string;
  depth: number;
  description?: string;
  applies: boolean;
  note?: string;
  advisory: boolean;
  retryable: boolean;
}

/**
 * Flatten a plan for `--dry-run`, evaluating skip conditions against the
 * config without invoking any action
 */
export function describePlan(steps: readonly Step[], config: DeploymentConfig, depth = 0): PlannedStep[] {
  return steps.flatMap((step) => {
    const note = step.skipWhen?.(config);
    const entry: PlannedStep = {
      name: step.name,
      depth,
      applies: note === undefined,
      advisory: step.advisory,
      retryable: step.retryable,
      ...(step.description !== undefined && { description: step.description }),
      ...(note !== undefined && { note }),
    };
    const nested =
      step.children !== undefined && note === undefined ? describePlan(step.children, config, depth + 1) : [];
    return [entry, ...nested];
  });
}
