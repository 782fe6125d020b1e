import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { sleep, withTimeout } from '../../../src/shared/async';
import { CancelledError, TimeoutError } from '../../../src/errors';

describe('async utilities', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  describe('withTimeout', () => {
    it('should resolve with the operation result', async () => {
      await expect(withTimeout(async () => 'done', 1000, 'quick')).resolves.toBe('done');
    });

    it('should reject with a TimeoutError once the deadline passes', async () => {
      const error = await withTimeout(() => new Promise<string>(() => undefined), 10, 'hang').catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ message: 'hang timed out after 10ms', timeoutMs: 10, operation: 'hang' });
    });

    it('should pass through the operation error', async () => {
      await expect(
        withTimeout(async () => {
          throw new Error('boom');
        }, 1000),
      ).rejects.toThrow('boom');
    });

    it('should clear its timer when the operation settles', async () => {
      jest.useFakeTimers();

      await withTimeout(async () => 'done', 60000);

      expect(jest.getTimerCount()).toBe(0);
    });

    it('should reject with a CancelledError when the signal aborts first', async () => {
      const controller = new AbortController();
      const pending = withTimeout(() => new Promise<string>(() => undefined), 60000, 'push', controller.signal);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('should not start the operation when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = jest.fn(async () => 'done');

      await expect(withTimeout(operation, 1000, 'push', controller.signal)).rejects.toThrow('push cancelled');
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('sleep', () => {
    it('should resolve after the delay', async () => {
      jest.useFakeTimers();
      let resolved = false;
      const pending = sleep(1000).then(() => {
        resolved = true;
      });

      await jest.advanceTimersByTimeAsync(999);
      expect(resolved).toBe(false);
      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(resolved).toBe(true);
    });

    it('should resolve early when aborted', async () => {
      jest.useFakeTimers();
      const controller = new AbortController();
      const pending = sleep(60000, controller.signal);

      controller.abort();
      await pending;

      expect(jest.getTimerCount()).toBe(0);
    });

    it('should resolve immediately when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(sleep(60000, controller.signal)).resolves.toBeUndefined();
    });
  });
});
