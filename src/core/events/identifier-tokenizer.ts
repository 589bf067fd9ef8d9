import { MalformedIdentifierError } from '@core/errors/malformed-identifier.error'

/** Ordered, non-empty word fragments of an identifier. */
export type WordSequence = readonly [string, ...string[]]

/**
 * Alternatives are tried in order at each position:
 * 1. the whole identifier is an uppercase run (`ABC`)
 * 2. an acronym run ending where a capitalized word, a separator or the end begins (`HTTP` in `HTTPServer`)
 * 3. one capital followed by lowercase letters and digits (`Server`, `Base64`)
 */
const WORD_PATTERN =
  /^\p{Lu}+$|\p{Lu}{2,}\p{N}*(?=\p{Lu}\p{Ll}|[^\p{L}\p{N}]|$)|\p{Lu}[\p{Ll}\p{N}]*/gu

const SEPARATOR_PATTERN = /[^\p{L}\p{N}]+/u

const NAMESPACE_SEPARATOR = /[.:/]/

const WORD_CHARACTER = /[\p{L}\p{N}]/u

/**
 * Splits a PascalCase identifier into its words.
 *
 * Text the pattern does not cover (a leading lowercase run, digits after a
 * lowercase word) is kept as a fragment of its own; separators such as `_`,
 * `-` or whitespace are dropped.
 *
 * @example
 * tokenize('OrderPlaced') // ['Order', 'Placed']
 * tokenize('HTTPServer')  // ['HTTP', 'Server']
 * tokenize('Base64Encoder') // ['Base64', 'Encoder']
 *
 * @throws MalformedIdentifierError when the identifier holds no letters or digits
 */
export function tokenize(identifier: string): WordSequence {
  const fragments: string[] = []
  let cursor = 0

  for (const match of identifier.matchAll(WORD_PATTERN)) {
    const start = match.index ?? cursor
    pushGap(fragments, identifier.slice(cursor, start))
    fragments.push(match[0])
    cursor = start + match[0].length
  }
  pushGap(fragments, identifier.slice(cursor))

  const [first, ...rest] = fragments
  if (first === undefined) {
    throw new MalformedIdentifierError(identifier)
  }
  return [first, ...rest]
}

function pushGap(fragments: string[], gap: string): void {
  for (const piece of gap.split(SEPARATOR_PATTERN)) {
    if (piece.length > 0) fragments.push(piece)
  }
}

/**
 * Final component of a namespaced type name.
 *
 * @example
 * shortTypeName('Billing.OrderPlaced') // 'OrderPlaced'
 */
export function shortTypeName(name: string): string {
  const segments = name.split(NAMESPACE_SEPARATOR).filter((s) => s.length > 0)
  return segments[segments.length - 1] ?? ''
}

/** Whether the short form of a type name has anything {@link tokenize} can split. */
export function isTokenizable(typeName: string): boolean {
  return WORD_CHARACTER.test(shortTypeName(typeName))
}

/** `OrderPlaced` -> `order_placed` */
export function toCategoryKey(typeName: string): string {
  return tokenize(shortTypeName(typeName))
    .map((fragment) => fragment.toLowerCase())
    .join('_')
}
