import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MultiTimerGuard, TimerGuard } from '../../../src/utils/timer-guard.js';

describe('TimerGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once and becomes inactive', () => {
    const guard = new TimerGuard('hedge-1');
    const callback = vi.fn();

    guard.set(callback, 100);
    expect(guard.isActive()).toBe(true);

    vi.advanceTimersByTime(100);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(guard.isActive()).toBe(false);
    expect(guard.getName()).toBe('hedge-1');
  });

  it('replaces a pending timer when set again', () => {
    const guard = new TimerGuard();
    const first = vi.fn();
    const second = vi.fn();

    guard.set(first, 100);
    guard.set(second, 200);
    vi.advanceTimersByTime(200);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('does nothing once cleared', () => {
    const guard = new TimerGuard();
    const callback = vi.fn();

    guard.set(callback, 100);
    guard.clear();
    guard.clear();
    vi.advanceTimersByTime(500);

    expect(callback).not.toHaveBeenCalled();
  });
});

describe('MultiTimerGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('clears every pending timer at once', () => {
    const timers = new MultiTimerGuard();
    const callback = vi.fn();

    timers.set('hedge-1', callback, 100);
    timers.set('hedge-2', callback, 200);
    expect(timers.getActiveCount()).toBe(2);
    expect(timers.getTimerNames()).toEqual(['hedge-1', 'hedge-2']);

    timers.clearAll();
    vi.advanceTimersByTime(500);

    expect(callback).not.toHaveBeenCalled();
    expect(timers.getActiveCount()).toBe(0);
    expect(timers.getTimerNames()).toEqual([]);
  });

  it('counts only timers that have not fired', () => {
    const timers = new MultiTimerGuard();

    timers.set('hedge-1', () => undefined, 100);
    timers.set('hedge-2', () => undefined, 200);
    vi.advanceTimersByTime(150);

    expect(timers.getActiveCount()).toBe(1);
  });
});
