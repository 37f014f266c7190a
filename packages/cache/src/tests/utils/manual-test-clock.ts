import type { Clock } from "../../core/time/clock"
import type { Milliseconds } from "../../ports/time"

export class ManualTestClock implements Clock {
  private currentMs: Milliseconds

  constructor(start: Date = new Date("2025-01-01T00:00:00.000Z")) {
    this.currentMs = start.getTime()
  }

  now(): Date {
    return new Date(this.currentMs)
  }

  nowMs(): Milliseconds {
    return this.currentMs
  }

  advance(ms: Milliseconds): void {
    this.currentMs += ms
  }
}
