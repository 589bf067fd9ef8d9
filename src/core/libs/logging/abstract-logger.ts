import { UnsupportedShapeError } from '@core/errors/unsupported-shape.error'
import type { CanonicalEvent } from '@core/events/canonical-event'
import { errorToEvent, toEvent } from '@core/events/to-event'

export type LogExtra = {
  /** Any value the event normalizer accepts; written as its canonical event */
  event?: unknown
  [key: string]: unknown
}

export type Config = {
  suppressConsole?: boolean
  serviceName?: string
}

export type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'trace'

export type BaseLogMeta = {
  context?: string
  [key: string]: unknown
}

export abstract class AbstractLoggerService<TLogLevel = string> {
  protected constructor(
    protected readonly config: Config,
    protected readonly _context?: string,
  ) {}

  get context(): string | undefined {
    return this._context
  }

  abstract withContext(context: string): AbstractLoggerService<TLogLevel>

  abstract log(message: string, ...optionalParams: unknown[]): void
  abstract error(message: string, ...optionalParams: unknown[]): void
  abstract warn(message: string, ...optionalParams: unknown[]): void
  abstract debug(message: string, ...optionalParams: unknown[]): void
  abstract verbose(message: string, ...optionalParams: unknown[]): void

  protected abstract _handle(
    level: LogLevel,
    message: string,
    meta: BaseLogMeta,
    context?: string,
    trace?: string,
  ): void

  /**
   * Picks the metadata object, the context and a stack trace out of the
   * variadic params. An `Error` passed on its own becomes the line's event.
   */
  protected parseParams(params: unknown[]) {
    const found: LogExtra = params.find(isLogExtra) ?? {}
    const thrown = params.find((p): p is Error => p instanceof Error)
    const extra: LogExtra =
      thrown && found.event === undefined ? { ...found, event: thrown } : found
    const context = this._context ?? params.find(isString)
    const trace = params.find(
      (p): p is string => typeof p === 'string' && p !== context,
    )

    return { extra, context, trace }
  }

  /**
   * Converts `extra.event` into its canonical form. A value of unsupported
   * shape is replaced by the event of the resulting error so the line is
   * still written; any other failure propagates.
   */
  protected normalizeEvent(value: unknown): CanonicalEvent {
    try {
      return toEvent(value)
    } catch (error) {
      if (UnsupportedShapeError.isUnsupportedShape(error)) {
        return errorToEvent(error)
      }
      throw error
    }
  }

  protected handleLog(
    level: LogLevel,
    message: string,
    extra: LogExtra,
    context?: string,
    trace?: string,
  ): void {
    if (this.config?.suppressConsole) return

    const { event, ...rest } = extra
    const meta: BaseLogMeta =
      event === undefined ? rest : { ...rest, event: this.normalizeEvent(event) }

    this._handle(level, message, meta, context, trace)
  }
}

function isLogExtra(param: unknown): param is LogExtra {
  return (
    typeof param === 'object' &&
    param !== null &&
    !Array.isArray(param) &&
    !(param instanceof Error)
  )
}

function isString(param: unknown): param is string {
  return typeof param === 'string'
}
