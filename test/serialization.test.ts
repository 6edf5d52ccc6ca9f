// serialization.test.ts
import { describe, it, expect } from 'vitest'
import {
  decodeReply,
  encodeFailure,
  encodeValue,
  rebuildFault,
  reviveFunction,
  shipFunction,
} from '../src/serialization'

describe('Serialization', () => {
  describe('Functions', () => {
    it('should revive arrow functions', () => {
      const double = reviveFunction({ source: '(n) => n * 2', name: 'double' })

      expect(Reflect.apply(double, undefined, [21])).toBe(42)
    })

    it('should revive method shorthand under its own name', () => {
      const revived = reviveFunction({ source: 'label(prefix) { return prefix + this.id }', name: 'label' })

      expect(revived.name).toBe('label')
      expect(Reflect.apply(revived, { id: 7 }, ['item-'])).toBe('item-7')
    })

    it('should revive generator methods', () => {
      const revived = reviveFunction({ source: '*count(limit) { for (let i = 0; i < limit; i++) yield i }', name: 'count' })
      const values: unknown[] = []
      for (const value of Reflect.apply(revived, undefined, [3])) {
        values.push(value)
      }

      expect(values).toEqual([0, 1, 2])
    })

    it('should expose scope entries as free variables', () => {
      const shifted = reviveFunction({ source: '(n) => n + offset', name: '' }, { offset: 10 })

      expect(Reflect.apply(shifted, undefined, [3])).toBe(13)
    })

    it('should refuse native and bound functions', () => {
      const bound = function total(this: { base: number }, n: number) {
        return this.base + n
      }.bind({ base: 1 })

      expect(() => shipFunction(Math.max)).toThrow(TypeError)
      expect(() => shipFunction(bound)).toThrow(TypeError)
    })
  })

  describe('Replies', () => {
    it('should carry values the structured clone cannot', () => {
      const reply = encodeValue({ when: new Date(0), tags: new Set(['a', 'b']), big: 10n })

      expect(decodeReply(reply).isOk()).toBe(true)
      expect(decodeReply(reply).unwrapOr(undefined)).toEqual({
        when: new Date(0),
        tags: new Set(['a', 'b']),
        big: 10n,
      })
    })

    it('should turn a value that cannot be serialized into a failure', () => {
      const reply = encodeValue({ callback: () => 1 })

      expect(reply.ok).toBe(false)
    })

    it('should rebuild built-in errors with their class', () => {
      const rebuilt = rebuildFault(encodeFailure(new TypeError('wrong type')))

      expect(rebuilt).toBeInstanceOf(TypeError)
      expect(rebuilt).toHaveProperty('message', 'wrong type')
    })

    it('should rebuild DOMExceptions as DOMExceptions', () => {
      const rebuilt = rebuildFault(encodeFailure(new DOMException('stopped', 'AbortError')))

      expect(rebuilt).toBeInstanceOf(DOMException)
      expect(rebuilt).toHaveProperty('name', 'AbortError')
    })

    it('should pass thrown non-errors through as values', () => {
      expect(rebuildFault(encodeFailure('plain string'))).toBe('plain string')
      expect(rebuildFault(encodeFailure({ code: 42 }))).toEqual({ code: 42 })
    })
  })
})
