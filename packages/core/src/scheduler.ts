export type CancelInterval = () => void;

export interface IntervalTimers {
  schedule(callback: () => void, ms: number): CancelInterval;
}

export interface PollIntervals {
  activeIntervalMs: number;
  idleIntervalMs: number;
}

const MIN_INTERVAL_MS = 50;

const DEFAULT_TIMERS: IntervalTimers = {
  schedule: (callback, ms) => {
    const handle = setInterval(callback, ms);
    return () => clearInterval(handle);
  },
};

/**
 * Owns the periodic poll trigger. The trigger is only torn down and
 * recreated when the requested period actually changes.
 */
export class AdaptiveScheduler {
  private readonly intervals: PollIntervals;
  private readonly timers: IntervalTimers;
  private cancel: CancelInterval | null = null;
  private task: (() => void) | null = null;
  private intervalMs: number | null = null;
  private reschedules = 0;

  constructor(intervals: PollIntervals, timers: IntervalTimers = DEFAULT_TIMERS) {
    this.intervals = intervals;
    this.timers = timers;
  }

  get currentIntervalMs(): number | null {
    return this.intervalMs;
  }

  get rescheduleCount(): number {
    return this.reschedules;
  }

  get isRunning(): boolean {
    return this.cancel !== null;
  }

  desiredInterval(anyActive: boolean): number {
    return anyActive ? this.intervals.activeIntervalMs : this.intervals.idleIntervalMs;
  }

  start(intervalMs: number, task: () => void): void {
    this.stop();
    this.task = task;
    this.arm(intervalMs);
  }

  applyIfChanged(intervalMs: number): boolean {
    if (!this.task || intervalMs === this.intervalMs) return false;
    this.clear();
    this.arm(intervalMs);
    this.reschedules += 1;
    return true;
  }

  stop(): void {
    this.clear();
    this.task = null;
    this.intervalMs = null;
  }

  private arm(intervalMs: number): void {
    const task = this.task;
    if (!task) return;
    this.intervalMs = intervalMs;
    this.cancel = this.timers.schedule(task, Math.max(MIN_INTERVAL_MS, intervalMs));
  }

  private clear(): void {
    if (this.cancel === null) return;
    this.cancel();
    this.cancel = null;
  }
}
