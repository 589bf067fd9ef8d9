import type { CanonicalEvent } from './canonical-event'

/**
 * Capability for types that build their own canonical event instead of going
 * through the generic record conversion.
 *
 * @example
 * class CartAbandoned implements Eventable {
 *   constructor(readonly cartId: string) {}
 *   toEvent() {
 *     return { cart_abandoned: { cart_id: this.cartId } }
 *   }
 * }
 */
export interface Eventable {
  toEvent(): CanonicalEvent
}

export function isEventable(value: unknown): value is Eventable {
  return (
    typeof value === 'object' &&
    value !== null &&
    'toEvent' in value &&
    typeof value.toEvent === 'function'
  )
}
