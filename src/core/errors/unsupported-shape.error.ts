import { BaseError } from '@core/errors/base.error'

/**
 * Raised when a value handed to the event normalizer matches none of the
 * recognized shapes (bare scalars, arrays, functions, instances of unnamed classes).
 */
export class UnsupportedShapeError extends BaseError {
  readonly code = 'UNSUPPORTED_SHAPE'

  constructor(public readonly shape: string) {
    super(`Cannot convert value of shape '${shape}' into a log event`)
  }

  static isUnsupportedShape(error: unknown): error is UnsupportedShapeError {
    return error instanceof UnsupportedShapeError
  }
}
