/**
 * Main export file for programmatic use
 */

export * from './domain/types';
export * from './errors';
export {
  resolveDeploymentConfig,
  loadRuntimeSettings,
  REQUIRED_SECRET_VARIABLES,
  DEFAULT_DEPLOYMENT,
  DEFAULT_TIMEOUTS,
  type ProcessEnvironment,
  type RuntimeSettings,
} from './config';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';

export {
  ExternalCommandGateway,
  type CommandGateway,
  type GatewayDependencies,
} from './infrastructure/command-gateway';
export { commandSpecSchema, type CommandSpec, type CommandOperation } from './infrastructure/command-spec';
export { CommandExecutor, type CommandRunner, type CommandResult } from './infrastructure/command-executor';
export { createDockerClient, type DockerClient } from './infrastructure/docker';
export { createKubernetesClient, type KubernetesClient } from './infrastructure/kubernetes';

export { awaitReady, type ReadinessProbe, type ProbeOptions, type ReadinessResult } from './workflows/readiness';
export {
  runPipeline,
  createStepContext,
  type Step,
  type StepContext,
  type PipelineReport,
  type PipelineStatus,
} from './workflows/pipeline';
export { defineStep, gatewayStep, readinessStep, compositeStep, type StepOptions } from './workflows/steps';
export { createDeploymentPlan, describePlan, type PlannedStep } from './workflows/deployment-plan';
export { initWorkspace } from './workflows/workspace-setup';
export { systemClock, type Clock } from './shared/async';
