/**
 * External Command Gateway
 *
 * The only component that talks to the container engine, the compose tool,
 * minikube or the cluster API. Every call comes back as a StepResult; tool
 * and API failures never escape as exceptions.
 *
 * @example
 * ```typescript
 * const gateway = new ExternalCommandGateway({ docker, kubernetes, runner, logger });
 * const result = await gateway.run({
 *   operation: 'pushImage',
 *   image: { registry: 'registry.example.com/team', name: 'dashboard', tag: 'v1' },
 * });
 * if (result.outcome === 'failed') logger.error(result, 'Push failed');
 * ```
 */

import type { Logger } from 'pino';
import type { DockerClient, RegistryAuth } from './docker/client';
import type { KubernetesClient } from './kubernetes/client';
import type { CommandResult, CommandRunner } from './command-executor';
import {
  commandSpecSchema,
  type CommandOperation,
  type CommandSpec,
  type CommandSpecOf,
  type ParsedCommandSpec,
} from './command-spec';
import {
  Success,
  Failure,
  formatImageRef,
  type FailureReason,
  type ImageRef,
  type ReadinessTarget,
  type Result,
  type StepResult,
} from '../domain/types';
import { CancelledError, TimeoutError, errorMessage } from '../errors';
import { DEFAULT_TIMEOUTS } from '../config/defaults';
import { createTimer } from '../lib/logger';
import { systemClock, withTimeout, type Clock } from '../shared/async';
import { awaitReady } from '../workflows/readiness';

/** Exit code reported for calls cut off by their deadline, as timeout(1) does */
export const TIMEOUT_EXIT_CODE = 124;

export interface GatewayDependencies {
  docker: DockerClient;
  /** Created on first use so local deployments never need a kubeconfig */
  kubernetes: () => KubernetesClient;
  runner: CommandRunner;
  logger: Logger;
  clock?: Clock;
  fetch?: typeof fetch;
  signal?: AbortSignal;
}

export interface CommandGateway {
  run: (spec: CommandSpec) => Promise<StepResult>;
  /**
   * One-shot readiness check. Resolves false when the target answers but is
   * not ready; rejects when it cannot be reached at all or `signal` aborts.
   */
  checkReady: (target: ReadinessTarget, signal?: AbortSignal) => Promise<boolean>;
}

interface Completed {
  message: string;
  output?: string;
}

interface Failed {
  message: string;
  reason: FailureReason;
  exitCode?: number;
  diagnostics?: string;
}

type OperationResult = Result<Completed, Failed>;

const done = (message: string, output?: string): OperationResult =>
  Success<Completed, Failed>(output === undefined ? { message } : { message, output });

const failed = (failure: Failed): OperationResult => Failure<Completed, Failed>(failure);

/**
 * Short human description of what a spec touches; never includes secret data
 */
export function describeSpec(spec: ParsedCommandSpec): string {
  switch (spec.operation) {
    case 'checkTool':
      return spec.command;
    case 'pingEngine':
      return 'docker engine';
    case 'pingCluster':
      return 'cluster';
    case 'buildImage':
    case 'pushImage':
      return formatImageRef(spec.image);
    case 'composeDown':
    case 'composeUp':
      return spec.file;
    case 'ensureNamespace':
      return spec.namespace;
    case 'createSecret':
      return `${spec.namespace}/${spec.name}`;
    case 'applyManifests':
      return `${spec.path} -> ${spec.namespace}`;
    case 'waitForCondition':
      return `${spec.selector} in ${spec.namespace}`;
    case 'queryServiceEndpoint':
      return `${spec.namespace}/${spec.service} (${spec.provider})`;
  }
}

/**
 * `registry.example.com/team` -> `registry.example.com`; Docker Hub paths
 * map to the index server
 */
export function registryServer(registry: string): string {
  const host = registry.split('/')[0] ?? registry;
  const isHost = host.includes('.') || host.includes(':') || host === 'localhost';
  return !isHost || host === 'docker.io' ? 'https://index.docker.io/v1/' : host;
}

function toUrl(address: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(address) ? address : `http://${address}`;
}

function firstLine(text: string): string {
  return text.split('\n').find((line) => line.trim().length > 0)?.trim() ?? '';
}

function processFailure(operation: string, result: CommandResult, timeoutMs: number): OperationResult {
  const diagnostics = result.stderr || result.stdout;
  if (result.timedOut) {
    return failed({
      message: `${operation} timed out after ${timeoutMs}ms`,
      reason: 'CommandTimedOut',
      exitCode: TIMEOUT_EXIT_CODE,
      ...(diagnostics.length > 0 && { diagnostics }),
    });
  }
  return failed({
    message: `${operation} exited with code ${result.exitCode}`,
    reason: 'CommandFailed',
    exitCode: result.exitCode,
    ...(diagnostics.length > 0 && { diagnostics }),
  });
}

export class ExternalCommandGateway implements CommandGateway {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly fetchFn: typeof fetch;
  private kubernetesClient: KubernetesClient | undefined;

  constructor(private readonly deps: GatewayDependencies) {
    this.logger = deps.logger.child({ component: 'gateway' });
    this.clock = deps.clock ?? systemClock;
    this.fetchFn = deps.fetch ?? fetch;
  }

  async run(input: CommandSpec): Promise<StepResult> {
    const started = this.clock.now();
    const parsed = commandSpecSchema.safeParse(input);
    if (!parsed.success) {
      const operation = typeof input.operation === 'string' ? input.operation : 'unknown';
      const message = `Invalid ${operation} parameters: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`;
      this.logger.error({ operation, outcome: 'failed', reason: 'InvalidCommand' }, message);
      return {
        step: operation,
        outcome: 'failed',
        message,
        exitCode: 2,
        level: 'error',
        durationMs: 0,
        reason: 'InvalidCommand',
      };
    }

    const spec = parsed.data;
    const timer = createTimer(this.logger, spec.operation, { target: describeSpec(spec) }, this.clock.now);
    let outcome: OperationResult;
    try {
      outcome = await this.dispatch(spec);
    } catch (error) {
      outcome = this.fromThrown(spec.operation, error);
    }
    const durationMs = this.clock.now() - started;

    if (outcome.ok) {
      timer.end({ outcome: 'succeeded' });
      return {
        step: spec.operation,
        outcome: 'succeeded',
        message: outcome.value.message,
        exitCode: 0,
        level: 'info',
        durationMs,
        ...(outcome.value.output !== undefined && { output: outcome.value.output }),
      };
    }

    const failure = outcome.error;
    timer.error(failure.message, {
      outcome: 'failed',
      reason: failure.reason,
      exitCode: failure.exitCode ?? 1,
      diagnostics: failure.diagnostics,
    });
    return {
      step: spec.operation,
      outcome: 'failed',
      message: `${spec.operation}: ${failure.message}`,
      exitCode: failure.exitCode ?? 1,
      level: 'error',
      durationMs,
      reason: failure.reason,
      ...(failure.diagnostics !== undefined && { diagnostics: failure.diagnostics }),
    };
  }

  async checkReady(target: ReadinessTarget, signal?: AbortSignal): Promise<boolean> {
    if (target.kind === 'pods') {
      const readiness = await withTimeout(
        () => this.kubernetes().getPodReadiness(target.namespace, target.selector),
        DEFAULT_TIMEOUTS.kubernetes,
        'getPodReadiness',
        signal,
      );
      if (!readiness.ok) throw new Error(readiness.error);
      return readiness.value.total > 0 && readiness.value.ready === readiness.value.total;
    }

    const response = await withTimeout(
      () =>
        this.fetchFn(target.url, {
          method: 'GET',
          redirect: 'manual',
          signal:
            signal === undefined
              ? AbortSignal.timeout(DEFAULT_TIMEOUTS.httpProbe)
              : AbortSignal.any([signal, AbortSignal.timeout(DEFAULT_TIMEOUTS.httpProbe)]),
          headers: { 'User-Agent': 'dashboard-deployer-health-check' },
        }),
      DEFAULT_TIMEOUTS.httpProbe,
      'http probe',
      signal,
    );
    return response.status >= 200 && response.status < 400;
  }

  private kubernetes(): KubernetesClient {
    this.kubernetesClient ??= this.deps.kubernetes();
    return this.kubernetesClient;
  }

  private fromThrown(operation: CommandOperation, error: unknown): OperationResult {
    if (error instanceof TimeoutError) {
      return failed({ message: error.message, reason: 'CommandTimedOut', exitCode: TIMEOUT_EXIT_CODE });
    }
    if (error instanceof CancelledError || this.deps.signal?.aborted) {
      return failed({ message: `${operation} cancelled`, reason: 'Cancelled', exitCode: 130 });
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return failed({ message: `command not found: ${error.message}`, reason: 'ToolUnavailable', exitCode: 127 });
    }
    return failed({ message: errorMessage(error), reason: 'ApiError' });
  }

  private api<T>(
    spec: { operation: CommandOperation; timeoutMs?: number | undefined },
    call: (client: KubernetesClient) => Promise<Result<T>>,
  ): Promise<Result<T>> {
    return withTimeout(
      () => call(this.kubernetes()),
      spec.timeoutMs ?? DEFAULT_TIMEOUTS.kubernetes,
      spec.operation,
      this.deps.signal,
    );
  }

  /**
   * Deadline for a streaming engine call; the call's signal aborts once the
   * race settles
   */
  private async streamed<T>(
    operation: CommandOperation,
    timeoutMs: number,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const stop = new AbortController();
    try {
      return await withTimeout(() => call(stop.signal), timeoutMs, operation, this.deps.signal);
    } finally {
      stop.abort();
    }
  }

  private async exec(
    operation: CommandOperation,
    command: readonly string[],
    args: string[],
    timeoutMs: number,
  ): Promise<Result<CommandResult, OperationResult>> {
    const [bin, ...prefix] = command;
    if (bin === undefined) {
      return Failure<CommandResult, OperationResult>(
        failed({ message: 'empty command', reason: 'InvalidCommand', exitCode: 2 }),
      );
    }
    const result = await this.deps.runner.execute(bin, [...prefix, ...args], {
      timeout: timeoutMs,
      ...(this.deps.signal !== undefined && { signal: this.deps.signal }),
    });
    if (result.exitCode !== 0 || result.timedOut) {
      return Failure<CommandResult, OperationResult>(processFailure(operation, result, timeoutMs));
    }
    return Success<CommandResult, OperationResult>(result);
  }

  private dispatch(spec: ParsedCommandSpec): Promise<OperationResult> {
    switch (spec.operation) {
      case 'checkTool':
        return this.checkTool(spec);
      case 'pingEngine':
        return this.pingEngine(spec);
      case 'pingCluster':
        return this.pingCluster(spec);
      case 'buildImage':
        return this.buildImage(spec);
      case 'pushImage':
        return this.pushImage(spec);
      case 'composeDown':
        return this.compose(spec, ['down']);
      case 'composeUp':
        return this.compose(spec, ['up', '-d', ...(spec.build ? ['--build'] : [])]);
      case 'ensureNamespace':
        return this.ensureNamespace(spec);
      case 'createSecret':
        return this.createSecret(spec);
      case 'applyManifests':
        return this.applyManifests(spec);
      case 'waitForCondition':
        return this.waitForCondition(spec);
      case 'queryServiceEndpoint':
        return this.queryServiceEndpoint(spec);
    }
  }

  private async checkTool(spec: CommandSpecOf<'checkTool'>): Promise<OperationResult> {
    const timeoutMs = spec.timeoutMs ?? DEFAULT_TIMEOUTS.command;
    let executed: Result<CommandResult, OperationResult>;
    try {
      executed = await this.exec(spec.operation, [spec.command], spec.args, timeoutMs);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return failed({ message: `${spec.command} is not installed`, reason: 'ToolUnavailable', exitCode: 127 });
      }
      throw error;
    }
    if (!executed.ok) return executed.error;
    const version = firstLine(executed.value.stdout);
    return done(`${spec.command} available${version ? `: ${version}` : ''}`, version || undefined);
  }

  private async pingEngine(spec: CommandSpecOf<'pingEngine'>): Promise<OperationResult> {
    const pinged = await withTimeout(
      () => this.deps.docker.ping(),
      spec.timeoutMs ?? DEFAULT_TIMEOUTS.command,
      spec.operation,
      this.deps.signal,
    );
    return pinged.ok ? done('Docker engine reachable') : failed({ message: pinged.error, reason: 'ApiError' });
  }

  private async pingCluster(spec: CommandSpecOf<'pingCluster'>): Promise<OperationResult> {
    const pinged = await this.api(spec, (client) => client.ping());
    return pinged.ok ? done('Cluster API reachable') : failed({ message: pinged.error, reason: 'ApiError' });
  }

  private async buildImage(spec: CommandSpecOf<'buildImage'>): Promise<OperationResult> {
    const reference = formatImageRef(spec.image);
    const built = await this.streamed(spec.operation, spec.timeoutMs ?? DEFAULT_TIMEOUTS.dockerBuild, (signal) =>
      this.deps.docker.buildImage({
        context: spec.context,
        dockerfile: spec.dockerfile,
        tag: reference,
        signal,
        ...(spec.buildArgs !== undefined && { buildArgs: spec.buildArgs }),
      }),
    );
    if (!built.ok) {
      const { message, logs } = built.error;
      return failed({ message, reason: 'ApiError', ...(logs.length > 0 && { diagnostics: logs.join('\n') }) });
    }
    return done(`Built ${reference}`, built.value.imageId || undefined);
  }

  private async pushImage(spec: CommandSpecOf<'pushImage'>): Promise<OperationResult> {
    const image: ImageRef = spec.image;
    const repository = `${image.registry}/${image.name}`;
    const auth: RegistryAuth | undefined =
      spec.credentials === undefined
        ? undefined
        : { ...spec.credentials, serveraddress: registryServer(image.registry) };
    const pushed = await this.streamed(spec.operation, spec.timeoutMs ?? DEFAULT_TIMEOUTS.dockerPush, (signal) =>
      this.deps.docker.pushImage(repository, image.tag, auth, signal),
    );
    if (!pushed.ok) return failed({ message: pushed.error, reason: 'ApiError' });
    return done(`Pushed ${formatImageRef(image)}`, pushed.value.digest);
  }

  private async compose(
    spec: CommandSpecOf<'composeDown'> | CommandSpecOf<'composeUp'>,
    action: string[],
  ): Promise<OperationResult> {
    const executed = await this.exec(
      spec.operation,
      spec.command,
      ['-f', spec.file, ...action],
      spec.timeoutMs ?? DEFAULT_TIMEOUTS.compose,
    );
    if (!executed.ok) return executed.error;
    return done(
      spec.operation === 'composeUp' ? `Services started from ${spec.file}` : `Services stopped from ${spec.file}`,
    );
  }

  private async ensureNamespace(spec: CommandSpecOf<'ensureNamespace'>): Promise<OperationResult> {
    const ensured = await this.api(spec, (client) => client.ensureNamespace(spec.namespace));
    if (!ensured.ok) return failed({ message: ensured.error, reason: 'ApiError' });
    return done(`Namespace ${spec.namespace} ${ensured.value === 'created' ? 'created' : 'already exists'}`);
  }

  private async createSecret(spec: CommandSpecOf<'createSecret'>): Promise<OperationResult> {
    const written = await this.api(spec, (client) => client.upsertSecret(spec.namespace, spec.name, spec.data));
    if (!written.ok) return failed({ message: written.error, reason: 'ApiError' });
    return done(`Secret ${spec.name} ${written.value}`);
  }

  private async applyManifests(spec: CommandSpecOf<'applyManifests'>): Promise<OperationResult> {
    const applied = await this.api(spec, (client) => client.applyManifests(spec.path, spec.namespace));
    if (!applied.ok) return failed({ message: applied.error, reason: 'ApiError' });
    const resources = applied.value.map((r) => `${r.kind.toLowerCase()}/${r.name} ${r.action}`);
    return done(`Applied ${resources.length} resource(s) from ${spec.path}`, resources.join('\n'));
  }

  private async waitForCondition(spec: CommandSpecOf<'waitForCondition'>): Promise<OperationResult> {
    const target: ReadinessTarget = { kind: 'pods', namespace: spec.namespace, selector: spec.selector };
    const waited = await awaitReady((attempt) => this.checkReady(target, attempt), {
      timeoutMs: spec.timeoutMs,
      pollIntervalMs: spec.pollIntervalMs,
      clock: this.clock,
      ...(this.deps.signal !== undefined && { signal: this.deps.signal }),
    });
    if (waited.ok) {
      return done(`Pods ${spec.selector} ready after ${waited.value.attempts} poll(s)`);
    }
    const { status, elapsedMs, lastError } = waited.error;
    if (status === 'cancelled') {
      return failed({ message: 'wait cancelled', reason: 'Cancelled', exitCode: 130 });
    }
    return failed({
      message: `pods ${spec.selector} not ready after ${elapsedMs}ms`,
      reason: 'TimedOut',
      ...(lastError !== undefined && { diagnostics: lastError }),
    });
  }

  private async queryServiceEndpoint(spec: CommandSpecOf<'queryServiceEndpoint'>): Promise<OperationResult> {
    let address: string | undefined;
    if (spec.provider === 'minikube') {
      const executed = await this.exec(
        spec.operation,
        ['minikube'],
        ['service', spec.service, '--url', '-n', spec.namespace],
        spec.timeoutMs ?? DEFAULT_TIMEOUTS.command,
      );
      if (!executed.ok) return executed.error;
      address = firstLine(executed.value.stdout) || undefined;
    } else {
      const looked = await this.api(spec, (client) => client.getLoadBalancerAddress(spec.namespace, spec.service));
      if (!looked.ok) return failed({ message: looked.error, reason: 'ApiError' });
      address = looked.value;
    }

    if (address === undefined) {
      return failed({
        message: `service ${spec.service} has no reachable address (EndpointUnresolved)`,
        reason: 'EndpointUnresolved',
      });
    }
    const url = toUrl(address);
    return done(`Service available at ${url}`, url);
  }
}
