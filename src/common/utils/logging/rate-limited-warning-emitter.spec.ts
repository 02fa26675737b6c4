import { describe, expect, it } from 'vitest';

import { RateLimitedWarningEmitter } from './rate-limited-warning-emitter';

describe('RateLimitedWarningEmitter', (): void => {
  it('suppresses repeats of the same key inside the cooldown', (): void => {
    let nowMs: number = 1_000;
    const emitter: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
      60_000,
      (): number => nowMs,
    );

    expect(emitter.shouldEmit('network:ton')).toBe(true);
    nowMs += 59_999;
    expect(emitter.shouldEmit('network:ton')).toBe(false);
    expect(emitter.shouldEmit('network:venom')).toBe(true);
    nowMs += 1;
    expect(emitter.shouldEmit('network:ton')).toBe(true);
  });

  it('lets a key warn again right after a reset', (): void => {
    const emitter: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
      60_000,
      (): number => 5_000,
    );

    expect(emitter.reset('network:ton')).toBe(false);
    expect(emitter.shouldEmit('network:ton')).toBe(true);
    expect(emitter.reset('network:ton')).toBe(true);
    expect(emitter.shouldEmit('network:ton')).toBe(true);
  });
});
