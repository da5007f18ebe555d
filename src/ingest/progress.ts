/**
 * Progress reporting for long scans
 * Fires on a count threshold or a time threshold, whichever is reached first.
 */

export type ProgressCallback = (count: number) => void;

export const DEFAULT_PROGRESS_EVERY = 100;
export const DEFAULT_PROGRESS_INTERVAL_MS = 2000;

export class ProgressReporter {
  private count = 0;
  private lastReportedCount = 0;
  private lastReportedAt: number;

  constructor(
    private readonly callback: ProgressCallback | undefined,
    private readonly every = DEFAULT_PROGRESS_EVERY,
    private readonly intervalMs = DEFAULT_PROGRESS_INTERVAL_MS,
    private readonly now: () => number = Date.now
  ) {
    this.lastReportedAt = now();
  }

  get total(): number {
    return this.count;
  }

  /**
   * Count one processed item
   */
  tick(): void {
    this.count++;
    if (!this.callback) return;

    const dueByCount = this.count - this.lastReportedCount >= this.every;
    const dueByTime = this.now() - this.lastReportedAt >= this.intervalMs;
    if (dueByCount || dueByTime) {
      this.report();
    }
  }

  /**
   * Final report once a scan has run to completion
   */
  finish(): void {
    if (this.callback) this.report();
  }

  private report(): void {
    this.lastReportedCount = this.count;
    this.lastReportedAt = this.now();
    this.callback?.(this.count);
  }
}
