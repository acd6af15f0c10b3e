// ============================================================
// Clock - time source and timers for pacing, backoff, timeouts
// ============================================================
// Everything that waits goes through a Clock so tests can run
// retry and TWAP pacing without real sleeps.
// ============================================================

import { GatewayError } from '../errors.js';

export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
  /** Reject with a Timeout GatewayError if the task has not settled within ms. */
  withTimeout<T>(task: Promise<T>, ms: number, label: string): Promise<T>;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  withTimeout<T>(task: Promise<T>, ms: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new GatewayError('Timeout', `${label} timed out after ${ms}ms`)), ms);
    });
    return Promise.race([task, timeout]).finally(() => clearTimeout(timer));
  }
}

export const systemClock = new SystemClock();

/** Midnight-anchored UTC day, e.g. 2026-03-01. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
