/**
 * Progress reporter tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ProgressReporter } from './progress.js';

describe('ProgressReporter', () => {
  it('should report every N items', () => {
    const callback = vi.fn();
    const reporter = new ProgressReporter(callback, 2, 60_000, () => 0);

    for (let i = 0; i < 5; i++) reporter.tick();

    expect(callback.mock.calls).toEqual([[2], [4]]);
    expect(reporter.total).toBe(5);
  });

  it('should report when the interval elapses first', () => {
    const callback = vi.fn();
    let now = 0;
    const reporter = new ProgressReporter(callback, 100, 1000, () => now);

    reporter.tick();
    now = 1500;
    reporter.tick();
    reporter.tick();

    expect(callback.mock.calls).toEqual([[2]]);
  });

  it('should report the final count on finish', () => {
    const callback = vi.fn();
    const reporter = new ProgressReporter(callback, 100, 60_000, () => 0);

    reporter.tick();
    reporter.finish();

    expect(callback).toHaveBeenLastCalledWith(1);
  });

  it('should count without a callback', () => {
    const reporter = new ProgressReporter(undefined);

    reporter.tick();
    reporter.finish();

    expect(reporter.total).toBe(1);
  });
});
