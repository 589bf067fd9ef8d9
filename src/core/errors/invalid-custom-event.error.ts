import { BaseError } from '@core/errors/base.error'

export class InvalidCustomEventError extends BaseError {
  readonly code = 'INVALID_CUSTOM_EVENT'

  constructor(public readonly issues: string[]) {
    super(`Invalid custom event options: ${issues.join('; ')}`)
  }
}
