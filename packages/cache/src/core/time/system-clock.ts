import type { Clock } from "../../ports/clock"
import type { Milliseconds } from "../../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
