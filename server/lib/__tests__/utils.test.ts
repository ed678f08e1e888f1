import { describe, it, expect } from 'vitest';
import { addDays, daysBetween, parseIsoDate } from '../utils/date';
import { createLimiter, upstreamSignal } from '../utils/concurrency';

describe('date utils', () => {
  it('adds days across month and year boundaries', () => {
    expect(addDays('2025-02-27', 2)).toBe('2025-03-01');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2025-03-30', 0)).toBe('2025-03-30');
  });

  it('counts signed days between dates', () => {
    expect(daysBetween('2025-03-01', '2025-03-08')).toBe(7);
    expect(daysBetween('2025-03-08', '2025-03-01')).toBe(-7);
    expect(daysBetween('2025-03-01', 'soon')).toBeNaN();
  });

  it('rejects impossible calendar dates', () => {
    expect(parseIsoDate('2025-02-30')).toBeNull();
    expect(parseIsoDate('2025-2-3')).toBeNull();
    expect(() => addDays('2025-13-01', 1)).toThrow('Invalid date: 2025-13-01');
  });
});

describe('createLimiter', () => {
  it('never runs more tasks at once than its bound', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const task = (value: number) => limit(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return value;
    });

    const results = await Promise.all([1, 2, 3, 4, 5].map(task));

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it('propagates a task failure without blocking the queue', async () => {
    const limit = createLimiter(1);
    const failing = limit(async () => {
      throw new Error('boom');
    });
    const following = limit(async () => 'next');

    await expect(failing).rejects.toThrow('boom');
    await expect(following).resolves.toBe('next');
  });

  it('rejects a non-positive bound', () => {
    expect(() => createLimiter(0)).toThrow('Concurrency must be a positive integer, got 0');
  });
});

describe('upstreamSignal', () => {
  it('aborts with a timeout once the deadline passes', async () => {
    const signal = upstreamSignal(20);
    expect(signal.aborted).toBe(false);

    await new Promise(resolve => signal.addEventListener('abort', resolve, { once: true }));

    expect(signal.aborted).toBe(true);
    expect(signal.reason instanceof Error && signal.reason.name).toBe('TimeoutError');
  });

  it('aborts as soon as the caller signal does', () => {
    const controller = new AbortController();
    const signal = upstreamSignal(60_000, controller.signal);
    const reason = new Error('client went away');

    controller.abort(reason);

    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBe(reason);
  });

  it('starts aborted when the caller signal already is', () => {
    const controller = new AbortController();
    controller.abort();

    expect(upstreamSignal(60_000, controller.signal).aborted).toBe(true);
  });
});
