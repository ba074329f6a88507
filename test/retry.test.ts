import { describe, it, expect } from 'vitest';
import { DEFAULT_RETRY_POLICY, attemptTimeout, backoffDelay, sleep } from '../src/inference/retry.js';
import { Deadline, withTimeout } from '../src/inference/deadline.js';
import { DeadlineExceededError, GateTimeoutError, TransientNetworkError } from '../src/errors.js';

describe('backoffDelay', () => {
  it('doubles the ceiling per attempt up to the maximum', () => {
    const half = () => 0.5;

    expect(backoffDelay(0, DEFAULT_RETRY_POLICY, half)).toBe(250);
    expect(backoffDelay(2, DEFAULT_RETRY_POLICY, half)).toBe(1_000);
    expect(backoffDelay(5, DEFAULT_RETRY_POLICY, half)).toBe(2_000);
    expect(backoffDelay(3, DEFAULT_RETRY_POLICY, () => 0)).toBe(0);
  });
});

describe('attemptTimeout', () => {
  it('repeats the last timeout for later attempts', () => {
    expect(attemptTimeout(DEFAULT_RETRY_POLICY, 0)).toBe(2_000);
    expect(attemptTimeout(DEFAULT_RETRY_POLICY, 1)).toBe(4_000);
    expect(attemptTimeout(DEFAULT_RETRY_POLICY, 7)).toBe(6_000);
    expect(attemptTimeout({ ...DEFAULT_RETRY_POLICY, attemptTimeoutsMs: [] }, 0)).toBe(2_000);
  });
});

describe('sleep', () => {
  it('stops early when the signal aborts', async () => {
    const controller = new AbortController();

    const pending = sleep(10_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Request aborted by caller');
  });

  it('rejects at once with the abort reason the gateway raised', async () => {
    const controller = new AbortController();
    controller.abort(new GateTimeoutError(5));

    await expect(sleep(10, controller.signal)).rejects.toBeInstanceOf(GateTimeoutError);
  });
});

describe('withTimeout', () => {
  it('fails an attempt that runs too long', async () => {
    const parent = new AbortController();

    const attempt = withTimeout(10, parent.signal, () => new Promise<string>(() => undefined));

    await expect(attempt).rejects.toBeInstanceOf(TransientNetworkError);
    await expect(withTimeout(10, parent.signal, () => new Promise<string>(() => undefined))).rejects.toThrow(
      'Attempt timed out after 10ms'
    );
  });

  it('returns the value of a quick attempt', async () => {
    const parent = new AbortController();

    await expect(withTimeout(1_000, parent.signal, async () => 'done')).resolves.toBe('done');
  });
});

describe('Deadline', () => {
  it('clamps step timeouts to the remaining budget', () => {
    const deadline = new Deadline(1_000);

    expect(deadline.bound(5_000)).toBeLessThanOrEqual(1_000);
    expect(deadline.bound(5_000)).toBeGreaterThan(900);
    expect(deadline.bound(100)).toBe(100);
    expect(deadline.expired()).toBe(false);
    deadline.dispose();
  });

  it('is spent as soon as its parent has aborted', () => {
    const parent = new AbortController();
    parent.abort(new DeadlineExceededError());

    const deadline = new Deadline(1_000, parent.signal);

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.remaining()).toBe(0);
    deadline.dispose();
  });
});
