import type { CanonicalEvent, EventPayload } from '@core/events/canonical-event'
import type { Eventable } from '@core/events/eventable'
import { UnsupportedShapeError } from '@core/errors/unsupported-shape.error'
import { isTokenizable, toCategoryKey } from '@core/events/identifier-tokenizer'

export abstract class DomainEvent<T extends EventPayload> implements Eventable {
  readonly data: T
  readonly dateTimeOccurred: Date

  protected constructor(data: T) {
    this.data = data
    this.dateTimeOccurred = new Date()
  }

  get eventName(): string {
    return this.constructor.name
  }

  toEvent(): CanonicalEvent {
    if (!isTokenizable(this.eventName)) {
      throw new UnsupportedShapeError('unnamed object')
    }

    return {
      [toCategoryKey(this.eventName)]: {
        ...this.data,
        occurred_at: this.dateTimeOccurred.toISOString(),
      },
    }
  }
}
