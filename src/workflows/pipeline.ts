/**
 * Step Pipeline
 *
 * A uniform reducer over a declared step list: strictly sequential,
 * fail-fast on the first fatal failure, retries for retryable steps,
 * advisory failures downgraded to warnings. Environment-specific behavior
 * lives inside the steps, never in this driver.
 */

import type { Logger } from 'pino';
import type { DeploymentConfig, StepResult } from '../domain/types';
import type { CommandGateway } from '../infrastructure/command-gateway';
import { errorMessage } from '../errors';
import { DEFAULT_RETRY } from '../config/defaults';
import { systemClock, type Clock } from '../shared/async';

export interface RetryPolicy {
  /** Attempts including the first run */
  maxAttempts: number;
  delayMs: number;
}

export interface StepContext {
  gateway: CommandGateway;
  logger: Logger;
  clock: Clock;
  retry: RetryPolicy;
  signal?: AbortSignal;
}

export interface Step {
  readonly name: string;
  readonly description?: string;
  /** Re-run on failure, up to the retry policy's attempt limit */
  readonly retryable: boolean;
  /** Failure is reported as a warning and the pipeline carries on */
  readonly advisory: boolean;
  /** Nested steps, for plan rendering */
  readonly children?: readonly Step[];
  /** Reason the step does not apply to a config; used by dry runs */
  readonly skipWhen?: (config: DeploymentConfig) => string | undefined;
  action: (config: DeploymentConfig, context: StepContext) => Promise<StepResult>;
}

export type PipelineStatus = 'succeeded' | 'failed' | 'cancelled';

export interface PipelineReport {
  status: PipelineStatus;
  results: StepResult[];
  /** The fatal failure that halted the run */
  failedStep?: StepResult;
  warnings: StepResult[];
  durationMs: number;
}

export function createStepContext(
  gateway: CommandGateway,
  logger: Logger,
  options: { clock?: Clock; retry?: Partial<RetryPolicy>; signal?: AbortSignal } = {},
): StepContext {
  return {
    gateway,
    logger,
    clock: options.clock ?? systemClock,
    retry: { ...DEFAULT_RETRY, ...options.retry },
    ...(options.signal !== undefined && { signal: options.signal }),
  };
}

export function skipped(step: string, message: string): StepResult {
  return { step, outcome: 'skipped', message, exitCode: 0, level: 'info', durationMs: 0 };
}

async function invoke(step: Step, config: DeploymentConfig, context: StepContext): Promise<StepResult> {
  try {
    return await step.action(config, context);
  } catch (error) {
    return {
      step: step.name,
      outcome: 'failed',
      message: `${step.name} threw: ${errorMessage(error)}`,
      exitCode: 1,
      level: 'error',
      durationMs: 0,
      reason: 'StepThrew',
    };
  }
}

/**
 * Run one step, retrying while the policy allows
 */
async function execute(step: Step, config: DeploymentConfig, context: StepContext): Promise<StepResult> {
  const { clock, logger, retry, signal } = context;
  const started = clock.now();
  let attempts = 0;
  let result: StepResult;

  for (;;) {
    attempts++;
    result = await invoke(step, config, context);

    const canRetry =
      result.outcome === 'failed' &&
      step.retryable &&
      attempts < retry.maxAttempts &&
      result.reason !== 'Cancelled' &&
      !signal?.aborted;
    if (!canRetry) break;

    logger.warn(
      { step: step.name, attempt: attempts, maxAttempts: retry.maxAttempts, error: result.message },
      `Retrying ${step.name}`,
    );
    await clock.sleep(retry.delayMs, signal);
    if (signal?.aborted) {
      result = {
        step: step.name,
        outcome: 'failed',
        message: `${step.name} cancelled before retry ${attempts + 1}`,
        exitCode: 130,
        level: 'error',
        durationMs: 0,
        reason: 'Cancelled',
      };
      break;
    }
  }

  const failed = result.outcome === 'failed';
  return {
    ...result,
    step: step.name,
    durationMs: clock.now() - started,
    level: failed ? (step.advisory ? 'warning' : 'error') : result.level,
    ...(attempts > 1 && { attempts }),
  };
}

/**
 * Execute `steps` in order against `config`.
 *
 * After the first fatal failure (or cancellation) every remaining step is
 * reported `skipped` and its action is never invoked.
 */
export async function runPipeline(
  config: DeploymentConfig,
  steps: readonly Step[],
  context: StepContext,
): Promise<PipelineReport> {
  const { clock, logger, signal } = context;
  const started = clock.now();
  const results: StepResult[] = [];
  const warnings: StepResult[] = [];
  let failedStep: StepResult | undefined;
  let cancelled = false;

  for (const step of steps) {
    if (failedStep !== undefined) {
      results.push(skipped(step.name, `Skipped: ${failedStep.step} failed`));
      continue;
    }
    if (cancelled || signal?.aborted) {
      cancelled = true;
      results.push(skipped(step.name, 'Skipped: deployment cancelled'));
      continue;
    }

    logger.info({ step: step.name }, `Running ${step.name}`);
    const result = await execute(step, config, context);
    results.push(result);

    if (result.outcome !== 'failed') {
      logger.info({ step: step.name, outcome: result.outcome, durationMs: result.durationMs }, result.message);
      continue;
    }

    if (result.reason === 'Cancelled') {
      cancelled = true;
      logger.warn({ step: step.name }, result.message);
    } else if (step.advisory) {
      warnings.push(result);
      logger.warn({ step: step.name, reason: result.reason, diagnostics: result.diagnostics }, result.message);
    } else {
      failedStep = result;
      logger.error({ step: step.name, reason: result.reason, diagnostics: result.diagnostics }, result.message);
    }
  }

  const status: PipelineStatus = cancelled ? 'cancelled' : failedStep !== undefined ? 'failed' : 'succeeded';
  return {
    status,
    results,
    warnings,
    durationMs: clock.now() - started,
    ...(failedStep !== undefined && { failedStep }),
  };
}
