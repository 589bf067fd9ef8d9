import { performance } from 'node:perf_hooks'

/** Monotonic start mark returned by {@link Timer.start}. */
export class TimerHandle {
  private constructor(readonly startedAt: number) {}

  static now(): TimerHandle {
    return new TimerHandle(performance.now())
  }
}

export const Timer = {
  start(): TimerHandle {
    return TimerHandle.now()
  },

  /** Fractional milliseconds elapsed since the handle was taken. */
  durationMs(handle: TimerHandle): number {
    return performance.now() - handle.startedAt
  },
}
