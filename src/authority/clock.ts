import type { TokenTimestamp } from './types.js'

/**
 * Source of "now" for expiry checks.
 */
export interface Clock {
  now(): TokenTimestamp
}

export const systemClock: Clock = {
  now: () => Date.now(),
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current: TokenTimestamp = 0) {}

  now(): TokenTimestamp {
    return this.current
  }

  set(time: TokenTimestamp): void {
    this.current = time
  }

  advance(ms: number): void {
    this.current += ms
  }
}
