import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { GatewayError } from '../../src/errors.js';
import { SystemClock, utcDay } from '../../src/execution/clock.js';

describe('System clock', () => {
  const clock = new SystemClock();

  it('passes through a task that settles in time', async () => {
    assert.equal(await clock.withTimeout(Promise.resolve('filled'), 1_000, 'fast call'), 'filled');
  });

  it('rejects a task that never settles with a Timeout error', async () => {
    await assert.rejects(
      clock.withTimeout(new Promise<string>(() => {}), 10, 'slow call'),
      (err: unknown) =>
        err instanceof GatewayError && err.kind === 'Timeout' && err.message === 'slow call timed out after 10ms',
    );
  });

  it('keeps the task\'s own error', async () => {
    await assert.rejects(clock.withTimeout(Promise.reject(new Error('boom')), 1_000, 'bad call'), /boom/);
  });

  it('names the UTC day', () => {
    assert.equal(utcDay(new Date('2026-03-01T23:59:59.999Z')), '2026-03-01');
  });
});
