import { UnsupportedShapeError } from '@core/errors/unsupported-shape.error'
import {
  isPlainObject,
  type CanonicalEvent,
  type ErrorEvent,
  type EventPayload,
} from './canonical-event'
import { isEventable } from './eventable'
import { ExplicitEvent, isExplicitEventShape } from './explicit-event'
import {
  isTokenizable,
  shortTypeName,
  toCategoryKey,
} from './identifier-tokenizer'

/**
 * Converts a value attached to a log call into its canonical event.
 *
 * Shapes are tried in order, first match wins:
 * 1. values implementing {@link Eventable}
 * 2. {@link ExplicitEvent} or a plain `{ category, data }` mapping -> `{ [category]: data }`
 * 3. any other plain mapping, returned as is
 * 4. `Error` -> `{ error: { name, message } }`
 * 5. instances of a named class -> `{ [category_key]: ownFields }`
 *
 * @throws UnsupportedShapeError for scalars, arrays, functions and instances
 * of classes whose name has no letters or digits
 */
export function toEvent(value: unknown): CanonicalEvent {
  if (isEventable(value)) {
    return value.toEvent()
  }

  if (value instanceof ExplicitEvent || isExplicitEventShape(value)) {
    return { [value.category]: value.data }
  }

  if (isPlainObject(value)) {
    return value
  }

  if (value instanceof Error) {
    return errorToEvent(value)
  }

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const typeName = constructorName(value)
    if (isTokenizable(typeName)) {
      return { [toCategoryKey(typeName)]: recordFields(value) }
    }
  }

  throw new UnsupportedShapeError(describeShape(value))
}

/**
 * An `error.name` set on the instance wins over the class name; one inherited
 * from `Error.prototype` does not.
 */
export function errorToEvent(error: Error): ErrorEvent {
  const ownName = Object.hasOwn(error, 'name') ? shortTypeName(error.name) : ''
  const name =
    ownName ||
    shortTypeName(constructorName(error)) ||
    shortTypeName(error.name) ||
    'Error'

  return {
    error: {
      name,
      message: error.message,
    },
  }
}

function constructorName(value: object): string {
  return typeof value.constructor === 'function' ? value.constructor.name : ''
}

function recordFields(value: object): EventPayload {
  return Object.fromEntries(Object.entries(value))
}

function describeShape(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (typeof value === 'object') return 'unnamed object'
  return typeof value
}
