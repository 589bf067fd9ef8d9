import { isPlainObject } from '@core/events/canonical-event'

/**
 * Utility for masking sensitive data in log output, event payloads included.
 * Prevents accidental exposure of secrets, tokens, and credentials.
 */
export class SensitiveDataMasker {
  private static readonly SENSITIVE_KEYS = new Set([
    'password',
    'token',
    'secret',
    'authorization',
    'apikey',
    'api_key',
    'accesstoken',
    'access_token',
    'refreshtoken',
    'refresh_token',
    'credential',
    'private_key',
    'privatekey',
  ])

  private static readonly MASK_SUFFIX = '***'

  /**
   * Masks sensitive values in a data object.
   * Recurses into nested plain objects and arrays; class instances are left as they are.
   *
   * @returns A new object with sensitive values masked
   */
  static mask(data: Record<string, unknown>): Record<string, unknown> {
    const masked: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {
      masked[key] = SensitiveDataMasker.isSensitiveKey(key.toLowerCase())
        ? SensitiveDataMasker.maskValue(value)
        : SensitiveDataMasker.maskNested(value)
    }

    return masked
  }

  /**
   * Masks a single value, showing only the first 4 characters.
   */
  static maskValue(value: unknown): string {
    if (value === null || value === undefined) {
      return SensitiveDataMasker.MASK_SUFFIX
    }

    const strValue = String(value)
    if (strValue.length <= 4) {
      return SensitiveDataMasker.MASK_SUFFIX
    }

    return `${strValue.substring(0, 4)}${SensitiveDataMasker.MASK_SUFFIX}`
  }

  /**
   * Adds custom sensitive keys to the list.
   * Useful for domain-specific sensitive data.
   */
  static addSensitiveKeys(keys: string[]): void {
    for (const key of keys) {
      SensitiveDataMasker.SENSITIVE_KEYS.add(key.toLowerCase())
    }
  }

  /** @param key - lowercased key */
  private static isSensitiveKey(key: string): boolean {
    return SensitiveDataMasker.SENSITIVE_KEYS.has(key)
  }

  private static maskNested(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => SensitiveDataMasker.maskNested(item))
    }
    if (isPlainObject(value)) {
      return SensitiveDataMasker.mask(value)
    }
    return value
  }
}
