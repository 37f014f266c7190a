import type { Milliseconds } from "../../ports/time"

/** Time source for expiry and entry timestamps. */
export interface Clock {
  now(): Date
  nowMs(): Milliseconds
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
