import { jest } from '@jest/globals';
import pino, { type Logger } from 'pino';
import { Success, type ReadinessTarget, type StepResult } from '../../../src/domain/types';
import type {
  DockerBuildFailure,
  DockerBuildResult,
  DockerClient,
} from '../../../src/infrastructure/docker/client';
import type { KubernetesClient } from '../../../src/infrastructure/kubernetes/client';
import type { CommandResult, CommandRunner } from '../../../src/infrastructure/command-executor';
import type { CommandGateway } from '../../../src/infrastructure/command-gateway';
import type { CommandSpec } from '../../../src/infrastructure/command-spec';
import type { Clock } from '../../../src/shared/async';

/**
 * Logger that discards everything
 */
export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Deterministic clock: sleeping advances time instantly
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 0) {}

  now = (): number => this.time;

  sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) return;
    this.sleeps.push(ms);
    this.time += ms;
  };

  advance(ms: number): void {
    this.time += ms;
  }
}

/**
 * Mock Docker Client
 */
export function createMockDockerClient() {
  return {
    ping: jest.fn<DockerClient['ping']>().mockResolvedValue(Success(undefined)),
    buildImage: jest
      .fn<DockerClient['buildImage']>()
      .mockResolvedValue(
        Success<DockerBuildResult, DockerBuildFailure>({ imageId: 'sha256:test-image', logs: ['Step 1/3'] }),
      ),
    pushImage: jest.fn<DockerClient['pushImage']>().mockResolvedValue(Success({ digest: 'sha256:test-digest' })),
  } satisfies DockerClient;
}

/**
 * Mock Kubernetes Client
 */
export function createMockKubernetesClient() {
  return {
    ping: jest.fn<KubernetesClient['ping']>().mockResolvedValue(Success(undefined)),
    ensureNamespace: jest
      .fn<KubernetesClient['ensureNamespace']>()
      .mockResolvedValue(Success<'created' | 'exists'>('exists')),
    upsertSecret: jest
      .fn<KubernetesClient['upsertSecret']>()
      .mockResolvedValue(Success<'created' | 'replaced'>('created')),
    applyManifests: jest.fn<KubernetesClient['applyManifests']>().mockResolvedValue(
      Success([
        { kind: 'Deployment', name: 'dashboard', action: 'created' as const },
        { kind: 'Service', name: 'dashboard-service', action: 'configured' as const },
      ]),
    ),
    getPodReadiness: jest
      .fn<KubernetesClient['getPodReadiness']>()
      .mockResolvedValue(Success({ total: 2, ready: 2, notReady: [] })),
    getLoadBalancerAddress: jest
      .fn<KubernetesClient['getLoadBalancerAddress']>()
      .mockResolvedValue(Success<string | undefined>('203.0.113.10')),
  } satisfies KubernetesClient;
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { stdout: '', stderr: '', exitCode: 0, timedOut: false, ...overrides };
}

/**
 * Mock process runner; every command succeeds with empty output by default
 */
export function createMockRunner() {
  return {
    execute: jest.fn<CommandRunner['execute']>().mockResolvedValue(commandResult()),
  } satisfies CommandRunner;
}

export function succeeded(step: string, message = `${step} done`): StepResult {
  return { step, outcome: 'succeeded', message, exitCode: 0, level: 'info', durationMs: 0 };
}

export function failed(step: string, message = `${step} broke`): StepResult {
  return { step, outcome: 'failed', message, exitCode: 1, level: 'error', durationMs: 0, reason: 'CommandFailed' };
}

/**
 * Gateway stand-in that records every spec and answers from `respond`
 */
export function createFakeGateway(
  respond: (spec: CommandSpec) => StepResult = (spec) => succeeded(spec.operation),
  ready: (target: ReadinessTarget) => boolean = () => true,
) {
  return {
    run: jest.fn<CommandGateway['run']>(async (spec) => respond(spec)),
    checkReady: jest.fn<CommandGateway['checkReady']>(async (target) => ready(target)),
  } satisfies CommandGateway;
}
