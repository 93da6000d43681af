/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect } from 'vitest';
import { startTimer, measureAsync } from '../src/perf-timer.js';

describe('startTimer', () => {
  it('should report a non-negative elapsed time while running', () => {
    const timer = startTimer();

    expect(timer.isRunning()).toBe(true);
    expect(timer.elapsed()).toBeGreaterThanOrEqual(0);
  });

  it('should freeze the duration once stopped', async () => {
    const timer = startTimer();
    const first = timer.stop();

    await new Promise((resolve) => setTimeout(resolve, 5));

    expect(timer.isRunning()).toBe(false);
    expect(timer.stop()).toBe(first);
    expect(timer.elapsed()).toBe(first);
  });
});

describe('measureAsync', () => {
  it('should return the result alongside the duration', async () => {
    const { result, duration_ms } = await measureAsync(async () => 'done');

    expect(result).toBe('done');
    expect(duration_ms).toBeGreaterThanOrEqual(0);
  });

  it('should propagate rejections', async () => {
    await expect(
      measureAsync(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
  });
});
