import { describe, it, expect } from 'vitest'
import { SensitiveDataMasker } from '../sensitive-masker'

class Money {
  constructor(
    readonly amount: number,
    readonly secret: string,
  ) {}
}

describe('SensitiveDataMasker', () => {
  it('should mask sensitive values in simple object', () => {
    const masked = SensitiveDataMasker.mask({
      username: 'johndoe',
      password: 'secretpassword',
      token: 'abcd123456',
    })

    expect(masked).toEqual({
      username: 'johndoe',
      password: 'secr***',
      token: 'abcd***',
    })
  })

  it('should not modify the input', () => {
    const data = { password: 'secretpassword' }
    SensitiveDataMasker.mask(data)
    expect(data.password).toBe('secretpassword')
  })

  it('should mask inside a canonical event payload', () => {
    const masked = SensitiveDataMasker.mask({
      user_signed_up: { email: 'a@example.com', api_key: 'test-key-123' },
    })

    expect(masked).toEqual({
      user_signed_up: { email: 'a@example.com', api_key: 'test***' },
    })
  })

  it('should mask values in arrays', () => {
    const masked = SensitiveDataMasker.mask({
      items: [{ secret: 'item1-secret' }, { secret: 'item2-secret' }, 'plain', 42],
    })

    expect(masked.items).toEqual([
      { secret: 'item***' },
      { secret: 'item***' },
      'plain',
      42,
    ])
  })

  it('should leave class instances untouched', () => {
    const money = new Money(10, 'hidden')
    const masked = SensitiveDataMasker.mask({ price: money })
    expect(masked.price).toBe(money)
  })

  it('should handle null and undefined safely', () => {
    const masked = SensitiveDataMasker.mask({ field: null, other: undefined })
    expect(masked.field).toBeNull()
    expect(masked.other).toBeUndefined()
  })

  it('should case-insensitive match keys', () => {
    const masked = SensitiveDataMasker.mask({ PassWord: 'CaseSensitiveSecret' })
    expect(masked.PassWord).toBe('Case***')
  })

  describe('maskValue()', () => {
    it('should return mask suffix for null and undefined', () => {
      expect(SensitiveDataMasker.maskValue(null)).toBe('***')
      expect(SensitiveDataMasker.maskValue(undefined)).toBe('***')
    })

    it('should return mask suffix for short values (≤4 chars)', () => {
      expect(SensitiveDataMasker.maskValue('ab')).toBe('***')
      expect(SensitiveDataMasker.maskValue('abcd')).toBe('***')
    })

    it('should keep the first 4 chars of longer values', () => {
      expect(SensitiveDataMasker.maskValue('abcde')).toBe('abcd***')
      expect(SensitiveDataMasker.maskValue(123456)).toBe('1234***')
    })
  })

  describe('addSensitiveKeys()', () => {
    it('should mask values for newly added keys, case-insensitively', () => {
      SensitiveDataMasker.addSensitiveKeys(['SSN', 'credit_card'])

      const masked = SensitiveDataMasker.mask({
        ssn: '123-45-6789',
        credit_card: '4111111111111111',
        name: 'John',
      })

      expect(masked).toEqual({
        ssn: '123-***',
        credit_card: '4111***',
        name: 'John',
      })
    })
  })
})
