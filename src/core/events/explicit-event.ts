import { MalformedIdentifierError } from '@core/errors/malformed-identifier.error'
import { isPlainObject } from './canonical-event'

/** An event whose category is given by the caller rather than derived from a type name. */
export class ExplicitEvent<TData = unknown> {
  constructor(
    readonly category: string,
    readonly data: TData,
  ) {
    if (category.trim().length === 0) {
      throw new MalformedIdentifierError(category)
    }
  }
}

export function explicitEvent<TData>(
  category: string,
  data: TData,
): ExplicitEvent<TData> {
  return new ExplicitEvent(category, data)
}

/** Hand-built `{ category, data }` mapping; any other keys are ignored. */
export type ExplicitEventShape = {
  category: string
  data: unknown
}

export function isExplicitEventShape(
  value: unknown,
): value is ExplicitEventShape {
  if (!isPlainObject(value)) return false
  const category = value.category
  return typeof category === 'string' && category.length > 0 && 'data' in value
}
