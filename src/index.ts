export * from '@core/events'
export { DomainEvent } from '@core/domain/events/domain-event'
export { BaseError } from '@core/errors/base.error'
export { UnsupportedShapeError } from '@core/errors/unsupported-shape.error'
export { MalformedIdentifierError } from '@core/errors/malformed-identifier.error'
export { InvalidCustomEventError } from '@core/errors/invalid-custom-event.error'
export { loadConfig, type AppConfig } from '@core/config'
export {
  AbstractLoggerService,
  type BaseLogMeta,
  type Config,
  type LogExtra,
  type LogLevel,
} from '@core/libs/logging/abstract-logger'
export {
  PinoLoggerService,
  correlationMixin,
  type CorrelationFields,
} from '@core/libs/logging/pino-logger'
export { SensitiveDataMasker } from '@core/libs/logging/sensitive-masker'
export { LogEvent, type LoggerContainer } from '@core/libs/logging/log.decorator'
export { CorrelationStore, type CorrelationContext } from '@core/libs/context'
export { logger } from '@modules/logging'
