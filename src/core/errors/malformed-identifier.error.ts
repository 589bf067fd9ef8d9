import { BaseError } from '@core/errors/base.error'

export class MalformedIdentifierError extends BaseError {
  readonly code = 'MALFORMED_IDENTIFIER'

  constructor(public readonly identifier: string) {
    super(`Identifier '${identifier}' has no word characters to tokenize`)
  }
}
