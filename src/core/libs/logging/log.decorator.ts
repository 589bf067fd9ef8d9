import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { CustomEvent } from '@core/events/custom-event'
import { Timer } from '@core/events/timer'

export interface LoggerContainer {
  logger: AbstractLoggerService
}

/**
 * Times an async method and logs its outcome. Success is logged as a custom
 * event carrying `time_ms`; a failure is logged with the thrown value as the
 * event and rethrown.
 *
 * @param eventName - custom event name, defaults to the method name
 */
export function LogEvent(eventName?: string): MethodDecorator {
  return (
    _target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ) => {
    const originalMethod: unknown = descriptor.value
    if (typeof originalMethod !== 'function') return descriptor

    const methodName = String(propertyKey)
    const name = eventName ?? methodName

    descriptor.value = async function (
      this: LoggerContainer,
      ...args: unknown[]
    ) {
      const logger = this.logger
      const timer = Timer.start()

      try {
        const result: unknown = await originalMethod.apply(this, args)

        logger?.log(`${methodName} completed`, {
          event: CustomEvent.create({
            name,
            data: { method: methodName, status: 'success' },
            timer,
          }),
        })

        return result
      } catch (error) {
        logger?.error(`${methodName} failed`, {
          event: error,
          method: methodName,
          time_ms: Timer.durationMs(timer),
          status: 'failure',
        })
        throw error
      }
    }

    return descriptor
  }
}
