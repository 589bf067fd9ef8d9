import { loadConfig } from '@core/config'
import { AbstractLoggerService } from '@core/libs/logging/abstract-logger'
import { PinoLoggerService } from '@core/libs/logging/pino-logger'
import { SensitiveDataMasker } from '@core/libs/logging/sensitive-masker'
import { context } from '@opentelemetry/api'

const config = loadConfig()

SensitiveDataMasker.addSensitiveKeys(config.sensitiveKeys)

export const logger: AbstractLoggerService = new PinoLoggerService(
  { suppressConsole: config.logLevel === 'silent', serviceName: config.service },
  context.active(),
)
