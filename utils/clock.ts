// Filename: utils/clock.ts

/**
 * Source of the current time in epoch milliseconds. Cache expiry and rate
 * limit windows read time only through this, so tests can drive it by hand.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  public now(): number {
    return this.current;
  }

  public advance(ms: number): void {
    this.current += ms;
  }

  public set(ms: number): void {
    this.current = ms;
  }
}
