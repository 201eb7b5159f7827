/**
 * Wall-clock abstraction, injectable so tests can move time without sleeping
 */
export interface Clock {
  /** Current time in epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Manually driven clock for tests
 */
export class MockClock implements Clock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
