import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { abortableSleep } from './abortable-sleep.util';
import { OperationTimeoutError, withTimeout } from './with-timeout.util';

describe('withTimeout', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('resolves with the operation result before the deadline', async (): Promise<void> => {
    const result: Promise<string> = withTimeout(Promise.resolve('done'), 1000, 'fetch ton');

    await expect(result).resolves.toBe('done');
  });

  it('rejects with OperationTimeoutError after the deadline', async (): Promise<void> => {
    const never: Promise<string> = new Promise<string>((): void => undefined);
    const result: Promise<string> = withTimeout(never, 1000, 'fetch ton');
    const assertion: Promise<void> = expect(result).rejects.toBeInstanceOf(OperationTimeoutError);

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });

  it('aborts the given controller when the deadline passes', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    const never: Promise<string> = new Promise<string>((): void => undefined);
    const result: Promise<string> = withTimeout(never, 1000, 'fetch ton', controller);
    const assertion: Promise<void> = expect(result).rejects.toThrow(
      'fetch ton timed out after 1000ms',
    );

    await vi.advanceTimersByTimeAsync(999);
    expect(controller.signal.aborted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await assertion;
    expect(controller.signal.reason).toBeInstanceOf(OperationTimeoutError);
  });

  it('propagates the operation error unchanged', async (): Promise<void> => {
    const result: Promise<string> = withTimeout(
      Promise.reject(new Error('boom')),
      1000,
      'fetch ton',
    );

    await expect(result).rejects.toThrow('boom');
  });
});

describe('abortableSleep', (): void => {
  beforeEach((): void => {
    vi.useFakeTimers();
  });

  afterEach((): void => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async (): Promise<void> => {
    let resolved: boolean = false;
    const sleeping: Promise<void> = abortableSleep(500).then((): void => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(resolved).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(resolved).toBe(true);
  });

  it('resolves early when the signal aborts', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    let resolved: boolean = false;
    const sleeping: Promise<void> = abortableSleep(60_000, controller.signal).then((): void => {
      resolved = true;
    });

    controller.abort();
    await sleeping;

    expect(resolved).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('returns immediately for an already aborted signal', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    controller.abort();

    await abortableSleep(60_000, controller.signal);

    expect(vi.getTimerCount()).toBe(0);
  });
});
