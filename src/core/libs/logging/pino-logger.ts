import {
  AbstractLoggerService,
  type BaseLogMeta,
  type Config,
  type LogLevel,
} from '@core/libs/logging/abstract-logger'
import { SensitiveDataMasker } from '@core/libs/logging/sensitive-masker'
import { CorrelationStore } from '@core/libs/context'
import { loadConfig, type AppConfig } from '@core/config'

import { type Context, trace as otelTrace } from '@opentelemetry/api'
import pino, { type Logger as PinoBaseLogger } from 'pino'

export type CorrelationFields = {
  trace_id?: string
  span_id?: string
  correlation_id?: string
}

/**
 * Trace correlation for every line: ids from the CorrelationStore win,
 * the active OpenTelemetry span fills in what is missing.
 */
export function correlationMixin(otelContext: Context): CorrelationFields {
  const correlationCtx = CorrelationStore.getStore()
  const spanContext = otelTrace.getSpan(otelContext)?.spanContext()

  return {
    trace_id: correlationCtx?.traceId ?? spanContext?.traceId,
    span_id: correlationCtx?.spanId ?? spanContext?.spanId,
    correlation_id: correlationCtx?.correlationId,
  }
}

export class PinoLoggerService extends AbstractLoggerService<pino.Level> {
  private readonly logger: PinoBaseLogger

  constructor(
    config: Config,
    private readonly otelContext: Context,
    loggerInstance?: PinoBaseLogger,
    context?: string,
  ) {
    super(config, context)

    this.logger = loggerInstance ?? this.createLogger(loadConfig())
  }

  withContext(context: string): PinoLoggerService {
    return new PinoLoggerService(
      this.config,
      this.otelContext,
      this.logger,
      context,
    )
  }

  protected _handle(
    level: LogLevel,
    message: string,
    meta: BaseLogMeta,
    context?: string,
    trace?: string,
  ): void {
    const handleLevel = this.getLogLevel()[level]

    const base: BaseLogMeta = {
      context: context ?? this._context,
      ...SensitiveDataMasker.mask(meta),
    }
    if (trace) base.trace = trace

    this.logger[handleLevel](base, message)
  }

  getLogLevel(): Record<LogLevel, pino.Level> {
    return {
      error: 'error',
      warn: 'warn',
      info: 'info',
      debug: 'debug',
      trace: 'trace',
    }
  }

  log(message: string, ...params: unknown[]) {
    const { extra, context, trace } = this.parseParams(params)
    this.handleLog('info', message, extra, context, trace)
  }

  error(message: string, ...params: unknown[]) {
    const { extra, context, trace } = this.parseParams(params)
    this.handleLog('error', message, extra, context, trace)
  }

  warn(message: string, ...params: unknown[]) {
    const { extra, context } = this.parseParams(params)
    this.handleLog('warn', message, extra, context)
  }

  debug(message: string, ...params: unknown[]) {
    const { extra, context } = this.parseParams(params)
    this.handleLog('debug', message, extra, context)
  }

  verbose(message: string, ...params: unknown[]) {
    const { extra, context } = this.parseParams(params)
    this.handleLog('trace', message, extra, context)
  }

  private createLogger(appConfig: AppConfig): PinoBaseLogger {
    return pino({
      level: appConfig.logLevel,
      serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
      },
      base: {
        service: this.config.serviceName ?? appConfig.service,
        env: appConfig.env,
        version: appConfig.version,
      },
      mixin: () => correlationMixin(this.otelContext),
      formatters: {
        log: (obj: Record<string, unknown>) => obj,
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: this.resolveTransport(appConfig),
    })
  }

  private resolveTransport(appConfig: AppConfig) {
    if (appConfig.nodeEnv === 'development') {
      return {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    }

    return undefined
  }
}
