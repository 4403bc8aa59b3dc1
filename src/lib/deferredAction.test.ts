import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { scheduleGuardedAction } from "./deferredAction";

describe("scheduleGuardedAction", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the action once the delay elapses", () => {
    const run = vi.fn();
    scheduleGuardedAction({ delayMs: 100, isActive: () => true, run });

    vi.advanceTimersByTime(99);
    expect(run).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("drops the action when the guard reports inactive", () => {
    const run = vi.fn();
    let active = true;
    scheduleGuardedAction({ delayMs: 100, isActive: () => active, run });

    active = false;
    vi.advanceTimersByTime(100);
    expect(run).not.toHaveBeenCalled();
  });

  it("never runs a cancelled action", () => {
    const run = vi.fn();
    const cancel = scheduleGuardedAction({ delayMs: 100, isActive: () => true, run });

    cancel();
    vi.advanceTimersByTime(500);
    expect(run).not.toHaveBeenCalled();
  });

  it("ignores cancellation after the action has run", () => {
    const run = vi.fn();
    const cancel = scheduleGuardedAction({ delayMs: 10, isActive: () => true, run });

    vi.advanceTimersByTime(10);
    cancel();
    expect(run).toHaveBeenCalledTimes(1);
  });
});
