import { describe, it, expect, jest } from '@jest/globals';
import { resolveDeploymentConfig } from '../../../src/config/resolver';
import type { StepResult } from '../../../src/domain/types';
import type { Clock } from '../../../src/shared/async';
import { createStepContext, runPipeline, type Step, type StepContext } from '../../../src/workflows/pipeline';
import {
  FakeClock,
  createFakeGateway,
  createTestLogger,
  failed,
  succeeded,
} from '../../__support__/utilities/mock-infrastructure';

const config = resolveDeploymentConfig('development', undefined, undefined, {});

function step(
  name: string,
  action: (context: StepContext) => Promise<StepResult>,
  flags: { retryable?: boolean; advisory?: boolean } = {},
) {
  const run = jest.fn<Step['action']>((_config, context) => action(context));
  const definition: Step = {
    name,
    retryable: flags.retryable ?? false,
    advisory: flags.advisory ?? false,
    action: run,
  };
  return { step: definition, run };
}

function context(clock: Clock = new FakeClock(), signal?: AbortSignal): StepContext {
  return createStepContext(createFakeGateway(), createTestLogger(), {
    clock,
    ...(signal !== undefined && { signal }),
  });
}

describe('runPipeline', () => {
  it('should run every step in order when all succeed', async () => {
    const order: string[] = [];
    const a = step('a', async () => {
      order.push('a');
      return succeeded('a');
    });
    const b = step('b', async () => {
      order.push('b');
      return succeeded('b');
    });

    const report = await runPipeline(config, [a.step, b.step], context());

    expect(report.status).toBe('succeeded');
    expect(order).toEqual(['a', 'b']);
    expect(report.results.map((r) => r.outcome)).toEqual(['succeeded', 'succeeded']);
    expect(report.failedStep).toBeUndefined();
  });

  it('should skip every step after a fatal failure without invoking it', async () => {
    const a = step('a', async () => succeeded('a'));
    const b = step('b', async () => failed('b', 'exploded'));
    const c = step('c', async () => succeeded('c'));

    const report = await runPipeline(config, [a.step, b.step, c.step], context());

    expect(report.status).toBe('failed');
    expect(report.results.map((r) => r.outcome)).toEqual(['succeeded', 'failed', 'skipped']);
    expect(report.results[2]?.message).toBe('Skipped: b failed');
    expect(report.failedStep?.step).toBe('b');
    expect(report.failedStep?.level).toBe('error');
    expect(c.run).not.toHaveBeenCalled();
  });

  it('should report advisory failures as warnings and continue', async () => {
    const a = step('a', async () => failed('a', 'still starting'), { advisory: true });
    const b = step('b', async () => succeeded('b'));

    const report = await runPipeline(config, [a.step, b.step], context());

    expect(report.status).toBe('succeeded');
    expect(report.results[0]).toMatchObject({ step: 'a', outcome: 'failed', level: 'warning' });
    expect(report.warnings.map((w) => w.step)).toEqual(['a']);
    expect(b.run).toHaveBeenCalledTimes(1);
  });

  it('should retry a retryable step until it succeeds', async () => {
    const clock = new FakeClock();
    let calls = 0;
    const flaky = step(
      'flaky',
      async () => {
        calls++;
        return calls < 3 ? failed('flaky') : succeeded('flaky');
      },
      { retryable: true },
    );

    const report = await runPipeline(config, [flaky.step], context(clock));

    expect(report.status).toBe('succeeded');
    expect(report.results[0]).toMatchObject({ outcome: 'succeeded', attempts: 3 });
    expect(clock.sleeps).toEqual([2000, 2000]);
  });

  it('should halt once a retryable step exhausts its attempts', async () => {
    const clock = new FakeClock();
    const broken = step('broken', async () => failed('broken'), { retryable: true });
    const next = step('next', async () => succeeded('next'));

    const report = await runPipeline(config, [broken.step, next.step], context(clock));

    expect(broken.run).toHaveBeenCalledTimes(3);
    expect(next.run).not.toHaveBeenCalled();
    expect(report.status).toBe('failed');
    expect(report.results[0]).toMatchObject({ outcome: 'failed', attempts: 3, level: 'error' });
    expect(report.durationMs).toBe(4000);
  });

  it('should honour a custom retry policy', async () => {
    const clock = new FakeClock();
    const broken = step('broken', async () => failed('broken'), { retryable: true });
    const ctx = createStepContext(createFakeGateway(), createTestLogger(), {
      clock,
      retry: { maxAttempts: 2, delayMs: 10 },
    });

    await runPipeline(config, [broken.step], ctx);

    expect(broken.run).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([10]);
  });

  it('should not retry a step that is not retryable', async () => {
    const once = step('once', async () => failed('once'));

    await runPipeline(config, [once.step], context());

    expect(once.run).toHaveBeenCalledTimes(1);
  });

  it('should not retry when cancelled during the retry delay', async () => {
    const controller = new AbortController();
    const time = new FakeClock();
    const clock = {
      now: time.now,
      sleep: async (): Promise<void> => {
        controller.abort();
      },
    };
    const push = step('push', async () => failed('push', 'connection reset'), { retryable: true });
    const after = step('after', async () => succeeded('after'));

    const report = await runPipeline(config, [push.step, after.step], context(clock, controller.signal));

    expect(push.run).toHaveBeenCalledTimes(1);
    expect(after.run).not.toHaveBeenCalled();
    expect(report.status).toBe('cancelled');
    expect(report.failedStep).toBeUndefined();
    expect(report.results[0]).toMatchObject({
      step: 'push',
      outcome: 'failed',
      reason: 'Cancelled',
      exitCode: 130,
      message: 'push cancelled before retry 2',
    });
    expect(report.results[1]).toMatchObject({ outcome: 'skipped', message: 'Skipped: deployment cancelled' });
  });

  it('should capture a thrown error as a failed result', async () => {
    const throws = step('throws', async () => {
      throw new Error('unexpected state');
    });
    const after = step('after', async () => succeeded('after'));

    const report = await runPipeline(config, [throws.step, after.step], context());

    expect(report.results[0]).toMatchObject({
      step: 'throws',
      outcome: 'failed',
      reason: 'StepThrew',
      message: 'throws threw: unexpected state',
      exitCode: 1,
    });
    expect(report.results[1]?.outcome).toBe('skipped');
  });

  it('should skip remaining steps once cancelled', async () => {
    const controller = new AbortController();
    const first = step('first', async () => {
      controller.abort();
      return succeeded('first');
    });
    const second = step('second', async () => succeeded('second'));

    const report = await runPipeline(config, [first.step, second.step], context(new FakeClock(), controller.signal));

    expect(report.status).toBe('cancelled');
    expect(report.results.map((r) => r.outcome)).toEqual(['succeeded', 'skipped']);
    expect(report.results[1]?.message).toBe('Skipped: deployment cancelled');
    expect(second.run).not.toHaveBeenCalled();
  });

  it('should treat a cancelled step result as cancellation rather than failure', async () => {
    const waiting = step('waiting', async () => ({ ...failed('waiting'), reason: 'Cancelled', exitCode: 130 }));

    const report = await runPipeline(config, [waiting.step], context());

    expect(report.status).toBe('cancelled');
    expect(report.failedStep).toBeUndefined();
  });

  it('should name results after the step and measure their duration', async () => {
    const clock = new FakeClock();
    const slow = step('slow', async () => {
      clock.advance(250);
      return succeeded('buildImage');
    });

    const report = await runPipeline(config, [slow.step], context(clock));

    expect(report.results[0]).toMatchObject({ step: 'slow', durationMs: 250 });
  });

  it('should leave the config untouched', async () => {
    const inspect = step('inspect', async () => succeeded('inspect'));

    await runPipeline(config, [inspect.step], context());

    expect(inspect.run).toHaveBeenCalledWith(config, expect.anything());
    expect(Object.isFrozen(config)).toBe(true);
  });
});
