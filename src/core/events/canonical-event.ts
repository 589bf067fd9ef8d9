/** Field data attached to a category key. */
export type EventPayload = Record<string, unknown>

/**
 * Canonical "what happened" mapping: a single category key pointing at its
 * payload, e.g. `{ order_placed: { order_id: 'abcd' } }`.
 */
export type CanonicalEvent = Record<string, unknown>

export type ErrorPayload = {
  name: string
  message: string
}

export type ErrorEvent = {
  error: ErrorPayload
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
