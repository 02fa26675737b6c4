export type MonotonicClock = () => number;

/**
 * Lets a warning through at most once per cooldown window for each key. A key that is
 * reset (the condition cleared) may warn again immediately.
 */
export class RateLimitedWarningEmitter {
  private readonly lastEmittedAtMs: Map<string, number> = new Map<string, number>();

  public constructor(
    private readonly cooldownMs: number,
    private readonly now: MonotonicClock = Date.now,
  ) {}

  public shouldEmit(key: string): boolean {
    const nowMs: number = this.now();
    const lastMs: number | undefined = this.lastEmittedAtMs.get(key);

    if (lastMs !== undefined && nowMs - lastMs < this.cooldownMs) {
      return false;
    }

    this.lastEmittedAtMs.set(key, nowMs);
    return true;
  }

  /** Returns true when the key had warned since its last reset. */
  public reset(key: string): boolean {
    return this.lastEmittedAtMs.delete(key);
  }
}
