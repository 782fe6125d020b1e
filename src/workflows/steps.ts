/**
 * Step factories
 *
 * Building blocks for deployment plans. Conditions are evaluated inside the
 * step action so the pipeline driver stays a plain reducer.
 */

import type { CommandSpec } from '../infrastructure/command-spec';
import {
  describeTarget,
  type DeploymentConfig,
  type ReadinessCheck,
  type StepResult,
} from '../domain/types';
import { awaitReady } from './readiness';
import { runPipeline, skipped, type Step, type StepContext } from './pipeline';

export interface StepOptions {
  description?: string;
  retryable?: boolean;
  advisory?: boolean;
  /**
   * Evaluated against the config before the action runs; a string return
   * value short-circuits the step to `skipped` with that message
   */
  skipWhen?: (config: DeploymentConfig) => string | undefined;
}

/**
 * Wrap an action with the common step fields and the skip condition
 */
export function defineStep(
  name: string,
  action: Step['action'],
  options: StepOptions = {},
  children?: readonly Step[],
): Step {
  const { skipWhen } = options;
  return {
    name,
    retryable: options.retryable ?? false,
    advisory: options.advisory ?? false,
    ...(options.description !== undefined && { description: options.description }),
    ...(children !== undefined && { children }),
    ...(skipWhen !== undefined && { skipWhen }),
    action: async (config, context) => {
      const reason = skipWhen?.(config);
      if (reason !== undefined) return skipped(name, reason);
      return action(config, context);
    },
  };
}

/**
 * One gateway invocation per step
 */
export function gatewayStep(
  name: string,
  spec: (config: DeploymentConfig) => CommandSpec,
  options: StepOptions = {},
): Step {
  return defineStep(name, (config, context) => context.gateway.run(spec(config)), options);
}

/**
 * Poll a readiness target through the gateway's one-shot check
 */
export function readinessStep(
  name: string,
  check: (config: DeploymentConfig) => ReadinessCheck,
  options: StepOptions = {},
): Step {
  return defineStep(
    name,
    async (config, context: StepContext): Promise<StepResult> => {
      const { target, timeoutMs, pollIntervalMs } = check(config);
      const label = describeTarget(target);
      const result = await awaitReady((attempt) => context.gateway.checkReady(target, attempt), {
        timeoutMs,
        pollIntervalMs,
        clock: context.clock,
        ...(context.signal !== undefined && { signal: context.signal }),
      });

      if (result.ok) {
        return {
          step: name,
          outcome: 'succeeded',
          message: `${label} ready after ${result.value.attempts} poll(s)`,
          exitCode: 0,
          level: 'info',
          durationMs: result.value.elapsedMs,
          attempts: result.value.attempts,
        };
      }

      const { status, elapsedMs, attempts, lastError } = result.error;
      return {
        step: name,
        outcome: 'failed',
        message:
          status === 'cancelled'
            ? `Waiting for ${label} cancelled`
            : `${label} not ready after ${elapsedMs}ms (${attempts} poll(s))`,
        exitCode: status === 'cancelled' ? 130 : 1,
        level: 'error',
        durationMs: elapsedMs,
        reason: status === 'cancelled' ? 'Cancelled' : 'TimedOut',
        ...(lastError !== undefined && { diagnostics: lastError }),
      };
    },
    options,
  );
}

/**
 * A step that runs a nested pipeline and reports its results as children.
 * Fails when the nested run fails or is cancelled; reported `skipped` when
 * every child skipped.
 */
export function compositeStep(name: string, steps: readonly Step[], options: StepOptions = {}): Step {
  return defineStep(
    name,
    async (config, context) => {
      const report = await runPipeline(config, steps, {
        ...context,
        logger: context.logger.child({ parent: name }),
      });
      const children = report.results;
      const succeeded = children.filter((r) => r.outcome === 'succeeded').length;
      const skippedCount = children.filter((r) => r.outcome === 'skipped').length;
      const summary = `${succeeded}/${children.length} sub-steps succeeded`;

      if (report.status === 'cancelled') {
        return {
          step: name,
          outcome: 'failed',
          message: `${name} cancelled (${summary})`,
          exitCode: 130,
          level: 'error',
          durationMs: report.durationMs,
          reason: 'Cancelled',
          children,
        };
      }

      if (report.failedStep !== undefined) {
        const failed = report.failedStep;
        return {
          step: name,
          outcome: 'failed',
          message: `${failed.step} failed: ${failed.message}`,
          exitCode: failed.exitCode,
          level: 'error',
          durationMs: report.durationMs,
          reason: 'ChildFailed',
          ...(failed.diagnostics !== undefined && { diagnostics: failed.diagnostics }),
          children,
        };
      }

      const warnings = report.warnings.length;
      return {
        step: name,
        outcome: skippedCount === children.length ? 'skipped' : 'succeeded',
        message: warnings > 0 ? `${summary}, ${warnings} warning(s)` : summary,
        exitCode: 0,
        level: warnings > 0 ? 'warning' : 'info',
        durationMs: report.durationMs,
        children,
      };
    },
    options,
    steps,
  );
}
