import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pollUntil, retry } from '../retry.js';

describe('retry utilities', () => {
  let clock: number;
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
    clock += ms;
  };
  const now = () => clock;

  beforeEach(() => {
    clock = 0;
    sleeps = [];
  });

  describe('pollUntil', () => {
    it('should stop at the first positive check', async () => {
      const check = vi
        .fn<[], Promise<boolean>>()
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(true);

      const result = await pollUntil(check, {
        maxAttempts: 5,
        intervalMs: 100,
        sleep,
        now,
      });

      expect(result).toEqual({ ok: true, attempts: 3, elapsedMs: 200 });
      expect(sleeps).toEqual([100, 100]);
    });

    it('should count a throwing check as not ready', async () => {
      const error = new Error('connection refused');
      const result = await pollUntil(
        async () => {
          throw error;
        },
        { maxAttempts: 2, intervalMs: 100, sleep, now }
      );

      expect(result).toEqual({
        ok: false,
        attempts: 2,
        elapsedMs: 100,
        lastError: error,
      });
    });

    it('should stop once the timeout has elapsed', async () => {
      const onRetry = vi.fn();
      const result = await pollUntil(async () => false, {
        timeoutMs: 1000,
        intervalMs: 300,
        sleep,
        now,
        onRetry,
      });

      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(5);
      expect(result.elapsedMs).toBe(1200);
      expect(onRetry).toHaveBeenCalledTimes(4);
    });

    it('should refuse to poll without a bound', async () => {
      await expect(
        pollUntil(async () => true, { intervalMs: 100, sleep, now })
      ).rejects.toThrow('pollUntil requires maxAttempts or timeoutMs');
    });
  });

  describe('retry', () => {
    it('should return the first successful result', async () => {
      const failure = new Error('pull access denied');
      const action = vi
        .fn<[], Promise<string>>()
        .mockRejectedValueOnce(failure)
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce('pulled');
      const onRetry = vi.fn();

      const result = await retry(action, {
        attempts: 3,
        intervalMs: 50,
        sleep,
        onRetry,
      });

      expect(result).toBe('pulled');
      expect(sleeps).toEqual([50, 50]);
      expect(onRetry.mock.calls).toEqual([
        [1, failure],
        [2, failure],
      ]);
    });

    it('should rethrow the last error without sleeping after it', async () => {
      const action = vi
        .fn<[], Promise<void>>()
        .mockRejectedValueOnce(new Error('first'))
        .mockRejectedValueOnce(new Error('second'));

      await expect(
        retry(action, { attempts: 2, intervalMs: 50, sleep })
      ).rejects.toThrow('second');
      expect(sleeps).toEqual([50]);
    });
  });
});
