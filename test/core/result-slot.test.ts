import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResultSlot, awaitOutcome, waitForSettle } from '../../src/core/result-slot.js';
import { TimeoutError } from '../../src/core/errors.js';

describe('ResultSlot', () => {
  it('should start pending', () => {
    const slot = new ResultSlot<number>();
    expect(slot.state).toBe('pending');
    expect(slot.isSettled).toBe(false);
    expect(() => slot.unwrap()).toThrow('ResultSlot.unwrap() called while pending');
  });

  it('should keep the first outcome', () => {
    const slot = new ResultSlot<number>();
    expect(slot.succeed(1)).toBe(true);
    expect(slot.fail(new Error('later'))).toBe(false);
    expect(slot.succeed(2)).toBe(false);
    expect(slot.state).toBe('succeeded');
    expect(slot.unwrap()).toBe(1);
  });

  it('should rethrow a failure', () => {
    const slot = new ResultSlot<number>();
    const error = new Error('boom');
    slot.fail(error);
    expect(slot.state).toBe('failed');
    expect(() => slot.unwrap()).toThrow(error);
  });

  it('should wake every waiter once settled', async () => {
    const slot = new ResultSlot<string>();
    const woke: number[] = [];
    const a = slot.settled().then(() => woke.push(1));
    const b = slot.settled().then(() => woke.push(2));
    slot.fail(new Error('x'));
    await Promise.all([a, b]);
    expect(woke).toEqual([1, 2]);
  });
});

describe('waitForSettle', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve false when the timer wins', async () => {
    const slot = new ResultSlot<number>();
    const result = waitForSettle(slot, 100);
    await vi.advanceTimersByTimeAsync(100);
    expect(await result).toBe(false);
  });

  it('should resolve true early and clear its timer', async () => {
    const slot = new ResultSlot<number>();
    const result = waitForSettle(slot, 100);
    await vi.advanceTimersByTimeAsync(40);
    slot.succeed(7);
    expect(await result).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should resolve true at once for a settled slot', async () => {
    const slot = new ResultSlot<number>();
    slot.succeed(1);
    expect(await waitForSettle(slot, 100)).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe('awaitOutcome', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fail a slot that stays pending past the grace period', async () => {
    const slot = new ResultSlot<number>();
    const fallback = new TimeoutError({ address: '192.168.1.50', timeout: 3000, attempts: 6 });
    const caught = awaitOutcome(slot, 1000, () => fallback).catch((e: unknown) => e);

    await vi.advanceTimersByTimeAsync(999);
    expect(slot.isSettled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(await caught).toBe(fallback);
    expect(slot.state).toBe('failed');
  });

  it('should return a value that lands within the grace period', async () => {
    const slot = new ResultSlot<string>();
    const fallback = vi.fn(() => new Error('unused'));
    const result = awaitOutcome(slot, 1000, fallback);

    await vi.advanceTimersByTimeAsync(300);
    slot.succeed('reply');

    expect(await result).toBe('reply');
    expect(fallback).not.toHaveBeenCalled();
  });

  it('should return an already settled outcome immediately', async () => {
    const slot = new ResultSlot<string>();
    const error = new Error('socket');
    slot.fail(error);

    await expect(awaitOutcome(slot, 1000, () => new Error('unused'))).rejects.toBe(error);
  });
});
