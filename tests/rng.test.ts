/**
 * Seeded randomness, identifiers and credentials
 */

import { describe, it, expect } from 'vitest'
import { hashPassword } from '../generator/credentials'
import { hashedUuid, IdentityCollisionError, IdentityFactory } from '../generator/identity'
import { createRng, generateUuid, pickWeightedIndex, randomInt, sampleDistinct } from '../generator/rng'

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
const UUID_V5 = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('createRng', () => {
  it('should repeat the sequence for the same seed', () => {
    const a = createRng(1234)
    const b = createRng(1234)
    const c = createRng(1235)

    const seqA = Array.from({ length: 5 }, () => a())
    const seqB = Array.from({ length: 5 }, () => b())
    const seqC = Array.from({ length: 5 }, () => c())

    expect(seqA).toEqual(seqB)
    expect(seqA).not.toEqual(seqC)
    for (const v of seqA) {
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThan(1)
    }
  })

  it('should keep randomInt inside its inclusive bounds', () => {
    const rng = createRng(9)
    const seen = new Set<number>()
    for (let i = 0; i < 1000; i++) seen.add(randomInt(3, 6, rng))

    expect([...seen].sort()).toEqual([3, 4, 5, 6])
  })

  it('should sample distinct elements', () => {
    const rng = createRng(5)
    const picked = sampleDistinct(['a', 'b', 'c', 'd', 'e'], 3, rng)

    expect(picked).toHaveLength(3)
    expect(new Set(picked).size).toBe(3)
    expect(sampleDistinct(['a', 'b'], 5, rng)).toHaveLength(2)
  })

  it('should format seeded UUIDs as version 4', () => {
    const rng = createRng(77)
    for (let i = 0; i < 20; i++) {
      expect(generateUuid(rng)).toMatch(UUID_V4)
    }
  })
})

describe('pickWeightedIndex', () => {
  // Weights 1, 0, 2
  const cumulative = [1, 1, 3]

  it('should never pick a zero-weight entry', () => {
    const rng = createRng(3)
    for (let i = 0; i < 500; i++) {
      expect(pickWeightedIndex(cumulative, rng)).not.toBe(1)
    }
  })

  it('should map the bottom of the range to the first entry', () => {
    expect(pickWeightedIndex(cumulative, () => 0)).toBe(0)
  })

  it('should only pick at or after the lower index', () => {
    const rng = createRng(4)
    for (let i = 0; i < 100; i++) {
      expect(pickWeightedIndex(cumulative, rng, 2)).toBe(2)
    }
  })
})

describe('IdentityFactory', () => {
  it('should derive hashed ids from logical names', () => {
    const first = new IdentityFactory('hashed', createRng(1))
    const second = new IdentityFactory('hashed', createRng(2))

    const id = first.issue('user:alice')
    expect(id).toMatch(UUID_V5)
    expect(id).toBe(hashedUuid('chatbench', 'user:alice'))
    expect(second.issue('user:alice')).toBe(id)
  })

  it('should refuse to issue the same id twice', () => {
    const ids = new IdentityFactory('hashed', createRng(1))
    ids.issue('user:alice')

    expect(() => ids.issue('user:alice')).toThrow(IdentityCollisionError)
    expect(ids.size).toBe(1)
  })

  it('should repeat seeded ids for the same seed', () => {
    const a = new IdentityFactory('seeded', createRng(42))
    const b = new IdentityFactory('seeded', createRng(42))

    const idsA = ['x', 'y', 'z'].map((name) => a.issue(name))
    const idsB = ['x', 'y', 'z'].map((name) => b.issue(name))

    expect(idsA).toEqual(idsB)
    expect(new Set(idsA).size).toBe(3)
  })
})

describe('credentials', () => {
  it('should hash deterministically per user', () => {
    const hash = hashPassword('test-secret', 'user-1')

    expect(hash).toMatch(/^scrypt\$1024\$[0-9a-f]{32}\$[0-9a-f]{64}$/)
    expect(hashPassword('test-secret', 'user-1')).toBe(hash)
    expect(hashPassword('test-secret', 'user-2')).not.toBe(hash)
  })
})
