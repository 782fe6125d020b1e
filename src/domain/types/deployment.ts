/**
 * Deployment Domain Types
 *
 * Shapes shared by the resolver, the pipeline, the gateway and the prober.
 */

export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const CLOUD_PROVIDERS = ['minikube', 'generic'] as const;
export type CloudProvider = (typeof CLOUD_PROVIDERS)[number];

export const DEPLOY_TARGETS = ['local', 'kubernetes'] as const;
export type DeployTarget = (typeof DEPLOY_TARGETS)[number];

/**
 * Fully qualified image reference, rendered as `registry/name:tag`.
 */
export interface ImageRef {
  registry: string;
  name: string;
  tag: string;
}

export interface ReadinessTimeouts {
  /** Deadline for the Kubernetes pod readiness wait */
  podsMs: number;
  /** Deadline for the local service checks */
  servicesMs: number;
  pollIntervalMs: number;
}

/**
 * Immutable description of one deployment run.
 */
export interface DeploymentConfig {
  readonly environment: Environment;
  readonly registry: string;
  readonly tag: string;
  readonly namespace: string;
  readonly cloudProvider?: CloudProvider;
  readonly target: DeployTarget;
  readonly image: Readonly<ImageRef>;
  readonly dockerfile: string;
  readonly buildContext: string;
  readonly composeFile: string;
  readonly composeCommand: readonly string[];
  readonly manifestsPath: string;
  readonly secretName: string;
  readonly serviceName: string;
  readonly podSelector: string;
  readonly dashboardUrl: string;
  readonly airflowUrl: string;
  readonly timeouts: Readonly<ReadinessTimeouts>;
  readonly secrets?: Readonly<{ databaseUrl: string; redisUrl: string }>;
  readonly registryAuth?: Readonly<{ username: string; password: string }>;
}

export type StepOutcome = 'succeeded' | 'failed' | 'skipped';

export type ResultLevel = 'info' | 'warning' | 'error';

/**
 * Machine-readable cause attached to a failed result.
 */
export type FailureReason =
  | 'InvalidCommand'
  | 'ToolUnavailable'
  | 'CommandFailed'
  | 'CommandTimedOut'
  | 'ApiError'
  | 'EndpointUnresolved'
  | 'TimedOut'
  | 'Cancelled'
  | 'StepThrew'
  | 'ChildFailed';

export interface StepResult {
  step: string;
  outcome: StepOutcome;
  message: string;
  exitCode: number;
  level: ResultLevel;
  durationMs: number;
  reason?: FailureReason;
  /** Captured output worth surfacing, e.g. a resolved service URL */
  output?: string;
  /** Captured diagnostic text from the underlying tool */
  diagnostics?: string;
  attempts?: number;
  children?: StepResult[];
}

export type ReadinessTarget =
  | { kind: 'http'; url: string }
  | { kind: 'pods'; namespace: string; selector: string };

export interface ReadinessCheck {
  target: ReadinessTarget;
  timeoutMs: number;
  pollIntervalMs: number;
}

export function formatImageRef(image: ImageRef): string {
  return `${image.registry}/${image.name}:${image.tag}`;
}

export function describeTarget(target: ReadinessTarget): string {
  return target.kind === 'http' ? target.url : `pods ${target.selector} in ${target.namespace}`;
}
