/**
 * Single-assignment result cell
 *
 * Every timer and listener of one call races to settle the same slot. The
 * first `succeed`/`fail` wins; later ones return false and change nothing.
 */

import { MAX_TIMER_DELAY_MS } from '../constants.js';

export type SlotState = 'pending' | 'succeeded' | 'failed';

export type SlotOutcome<T> =
  | { state: 'succeeded'; value: T }
  | { state: 'failed'; error: Error };

export class ResultSlot<T> {
  private outcome: SlotOutcome<T> | null = null;
  private waiters: Array<() => void> = [];

  get state(): SlotState {
    return this.outcome ? this.outcome.state : 'pending';
  }

  get isSettled(): boolean {
    return this.outcome !== null;
  }

  succeed(value: T): boolean {
    return this.settle({ state: 'succeeded', value });
  }

  fail(error: Error): boolean {
    return this.settle({ state: 'failed', error });
  }

  /**
   * Resolves once the slot is settled. Never rejects.
   */
  settled(): Promise<void> {
    if (this.outcome) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Settled value, or throw the settled error
   */
  unwrap(): T {
    if (!this.outcome) {
      throw new Error('ResultSlot.unwrap() called while pending');
    }
    if (this.outcome.state === 'failed') {
      throw this.outcome.error;
    }
    return this.outcome.value;
  }

  private settle(outcome: SlotOutcome<T>): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
    return true;
  }
}

/**
 * Wait up to `ms` for the slot to settle. Resolves true when it did.
 * The timer is cleared either way.
 */
export function waitForSettle<T>(slot: ResultSlot<T>, ms: number): Promise<boolean> {
  if (slot.isSettled) return Promise.resolve(true);
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(slot.isSettled), Math.min(ms, MAX_TIMER_DELAY_MS));
    void slot.settled().then(() => {
      clearTimeout(timer);
      resolve(true);
    });
  });
}

/**
 * Final read of a slot after the work driving it is done.
 * A slot still pending after `graceMs` is failed with `fallback()`, so the
 * caller always gets exactly one outcome.
 */
export async function awaitOutcome<T>(
  slot: ResultSlot<T>,
  graceMs: number,
  fallback: () => Error
): Promise<T> {
  const settled = await waitForSettle(slot, graceMs);
  if (!settled) {
    slot.fail(fallback());
  }
  return slot.unwrap();
}
