import { z } from 'zod'
import { InvalidCustomEventError } from '@core/errors/invalid-custom-event.error'
import { TimerHandle, Timer } from './timer'
import type { EventPayload } from './canonical-event'

export const CustomEventOptionsSchema = z.object({
  name: z.string().trim().min(1),
  data: z.record(z.unknown()).optional(),
  time_ms: z.number().nonnegative().optional(),
  timer: z
    .custom<TimerHandle>((value) => value instanceof TimerHandle, {
      message: 'Expected a handle from Timer.start()',
    })
    .optional(),
})

export type CustomEventOptions = z.input<typeof CustomEventOptionsSchema>

/**
 * Event for things that happen in the business domain and have no type of
 * their own: a payment received, a draft saved, a password changed.
 *
 * Field names are the ones written to the log line, so a custom event
 * normalizes to `{ custom_event: { name, data, time_ms } }`.
 */
export class CustomEvent {
  readonly name: string
  readonly data: EventPayload | undefined
  /** Execution time in fractional milliseconds */
  readonly time_ms: number | undefined

  private constructor(name: string, data?: EventPayload, timeMs?: number) {
    this.name = name
    this.data = data
    this.time_ms = timeMs
  }

  /**
   * Builds a custom event. Passing a `timer` from `Timer.start()` sets
   * `time_ms` to the time elapsed since the timer started; the timer itself
   * is not kept.
   *
   * @throws InvalidCustomEventError when the options do not validate
   */
  static create(options: CustomEventOptions): CustomEvent {
    const result = CustomEventOptionsSchema.safeParse(options)
    if (!result.success) {
      throw new InvalidCustomEventError(
        result.error.issues.map(
          (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`,
        ),
      )
    }

    const { name, data, timer } = result.data
    const timeMs = timer ? Timer.durationMs(timer) : result.data.time_ms

    return new CustomEvent(name, data, timeMs)
  }
}
