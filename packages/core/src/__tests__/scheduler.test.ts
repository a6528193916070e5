import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AdaptiveScheduler, type IntervalTimers } from "../scheduler.js";

const INTERVALS = { activeIntervalMs: 1_000, idleIntervalMs: 5_000 };

function spyTimers() {
  const cancel = vi.fn();
  const schedule = vi.fn((callback: () => void, ms: number) => {
    const handle = setInterval(callback, ms);
    return () => {
      cancel();
      clearInterval(handle);
    };
  });
  const timers: IntervalTimers = { schedule };
  return { timers, schedule, cancel };
}

describe("AdaptiveScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("picks the short interval while anything is active", () => {
    const scheduler = new AdaptiveScheduler(INTERVALS);
    expect(scheduler.desiredInterval(true)).toBe(1_000);
    expect(scheduler.desiredInterval(false)).toBe(5_000);
  });

  it("runs the task on the armed cadence", () => {
    const task = vi.fn();
    const scheduler = new AdaptiveScheduler(INTERVALS, spyTimers().timers);

    scheduler.start(1_000, task);
    expect(scheduler.isRunning).toBe(true);
    expect(scheduler.currentIntervalMs).toBe(1_000);

    vi.advanceTimersByTime(3_000);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it("does not recreate the timer for an unchanged interval", () => {
    const spies = spyTimers();
    const scheduler = new AdaptiveScheduler(INTERVALS, spies.timers);
    scheduler.start(1_000, vi.fn());

    expect(scheduler.applyIfChanged(1_000)).toBe(false);
    expect(scheduler.applyIfChanged(1_000)).toBe(false);

    expect(scheduler.rescheduleCount).toBe(0);
    expect(spies.schedule).toHaveBeenCalledTimes(1);
    expect(spies.cancel).not.toHaveBeenCalled();
  });

  it("recreates the timer when the interval changes", () => {
    const task = vi.fn();
    const spies = spyTimers();
    const scheduler = new AdaptiveScheduler(INTERVALS, spies.timers);
    scheduler.start(1_000, task);

    expect(scheduler.applyIfChanged(5_000)).toBe(true);
    expect(scheduler.rescheduleCount).toBe(1);
    expect(scheduler.currentIntervalMs).toBe(5_000);
    expect(spies.cancel).toHaveBeenCalledTimes(1);
    expect(spies.schedule).toHaveBeenLastCalledWith(task, 5_000);

    vi.advanceTimersByTime(4_999);
    expect(task).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("ignores interval changes before it has been started", () => {
    const spies = spyTimers();
    const scheduler = new AdaptiveScheduler(INTERVALS, spies.timers);

    expect(scheduler.applyIfChanged(5_000)).toBe(false);
    expect(scheduler.isRunning).toBe(false);
    expect(spies.schedule).not.toHaveBeenCalled();
  });

  it("stops the periodic trigger", () => {
    const task = vi.fn();
    const scheduler = new AdaptiveScheduler(INTERVALS, spyTimers().timers);
    scheduler.start(1_000, task);
    scheduler.stop();

    vi.advanceTimersByTime(10_000);
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.isRunning).toBe(false);
    expect(scheduler.currentIntervalMs).toBeNull();
    expect(scheduler.applyIfChanged(5_000)).toBe(false);
  });
});
