import { vi } from 'vitest'
import {
  AbstractLoggerService,
  type BaseLogMeta,
  type Config,
  type LogLevel,
} from '@core/libs/logging/abstract-logger'

/**
 * Test stub for AbstractLoggerService.
 * Provides mock functions for all abstract methods,
 * avoiding the need for `as unknown as` casts in tests.
 */
export class LoggerStub extends AbstractLoggerService {
  readonly log = vi.fn<(message: string, ...params: unknown[]) => void>()
  readonly error = vi.fn<(message: string, ...params: unknown[]) => void>()
  readonly warn = vi.fn<(message: string, ...params: unknown[]) => void>()
  readonly debug = vi.fn<(message: string, ...params: unknown[]) => void>()
  readonly verbose = vi.fn<(message: string, ...params: unknown[]) => void>()

  constructor(config: Config = {}, context?: string) {
    super(config, context)
  }

  withContext(context: string): LoggerStub {
    return new LoggerStub(this.config, context)
  }

  protected _handle(
    _level: LogLevel,
    _message: string,
    _meta: BaseLogMeta,
    _context?: string,
    _trace?: string,
  ): void {
    // no-op for stub
  }

  reset(): void {
    this.log.mockClear()
    this.error.mockClear()
    this.warn.mockClear()
    this.debug.mockClear()
    this.verbose.mockClear()
  }
}
