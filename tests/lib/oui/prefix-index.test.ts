/**
 * Prefix index tests
 */

import { describe, it, expect } from 'vitest'
import { PrefixIndex } from '@/lib/oui/prefix-index'
import { createRecord } from '@/lib/oui/record-parser'
import { DuplicatePrefixError, MalformedRecordError } from '@/lib/errors'

const large = createRecord('ACDE48', 'Example Corp', '1 Example Way')
const medium = createRecord('ACDE48A', 'Example Sub Block Ltd')
const small = createRecord('ACDE48A12', 'Tiny Block GmbH')
const other = createRecord('001BC5', 'Parent Networks')
const otherSmall = createRecord('001BC5001', 'example corp')

describe('PrefixIndex', () => {
  const index = PrefixIndex.build([large, medium, small, other, otherSmall])

  // ==========================================================================
  // Longest Prefix Match
  // ==========================================================================

  describe('lookup', () => {
    it('returns the 24-bit block when nothing narrower covers the address', () => {
      expect(index.lookup(0xacde48112233)).toBe(large)
    })

    it('prefers the 28-bit block over the 24-bit block', () => {
      expect(index.lookup(0xacde48a90000)).toBe(medium)
    })

    it('prefers the 36-bit block over everything else', () => {
      expect(index.lookup(0xacde48a12345)).toBe(small)
    })

    it('covers the full range of a block', () => {
      expect(index.lookup(0xacde48a12000)).toBe(small)
      expect(index.lookup(0xacde48a12fff)).toBe(small)
      expect(index.lookup(0xacde48a13000)).toBe(medium)
      expect(index.lookup(0xacde48ffffff)).toBe(large)
    })

    it('returns null for an unregistered address', () => {
      expect(index.lookup(0x001122334455)).toBeNull()
    })

    it('returns null for values outside the 48-bit range', () => {
      expect(index.lookup(-1)).toBeNull()
      expect(index.lookup(2 ** 48)).toBeNull()
    })

    it('works with an empty index', () => {
      expect(PrefixIndex.build([]).lookup(0xacde48112233)).toBeNull()
    })
  })

  // ==========================================================================
  // Accessors
  // ==========================================================================

  describe('accessors', () => {
    it('get returns exact records only', () => {
      expect(index.get(28, 0xacde48a00000)).toBe(medium)
      expect(index.get(24, 0xacde48a00000)).toBeNull()
    })

    it('counts records per width', () => {
      expect(index.size).toBe(5)
      expect(index.counts()).toEqual({ 24: 2, 28: 1, 36: 2 })
    })

    it('lists records by width then prefix', () => {
      expect(index.records()).toEqual([other, large, medium, otherSmall, small])
    })

    it('is frozen', () => {
      expect(Object.isFrozen(index)).toBe(true)
    })
  })

  describe('prefixesFor', () => {
    it('matches organization names exactly, ignoring case', () => {
      expect(index.prefixesFor('EXAMPLE CORP')).toEqual([large, otherSmall])
      expect(index.prefixesFor('  tiny block gmbh ')).toEqual([small])
    })

    it('does not match partial names', () => {
      expect(index.prefixesFor('Example')).toEqual([])
    })

    it('returns nothing for a blank name', () => {
      expect(index.prefixesFor('  ')).toEqual([])
    })
  })

  // ==========================================================================
  // Build Errors
  // ==========================================================================

  describe('build', () => {
    it('rejects duplicate prefixes of the same width', () => {
      const duplicate = createRecord('AC-DE-48', 'Someone Else')
      let caught: unknown
      try {
        PrefixIndex.build([large, duplicate])
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(DuplicatePrefixError)
      expect(caught).toMatchObject({
        code: 'DUPLICATE_PREFIX',
        existing: large,
        duplicate,
        message: 'Duplicate MA-L prefix AC:DE:48:00:00:00/24: "Example Corp" and "Someone Else"',
      })
    })

    it('rejects records with bits set below their width', () => {
      const handBuilt = {
        prefixBits: 28,
        prefixValue: 0x70b3d5f10000,
        organization: 'Hand Built',
        registeredAddress: null,
      } as const
      expect(() => PrefixIndex.build([handBuilt])).toThrow(MalformedRecordError)
      expect(() => PrefixIndex.build([handBuilt])).toThrow('prefix 70B3D5F10000 is not a valid /28 block')
    })

    it('allows the same value at different widths', () => {
      const wide = createRecord('ACDE48/24', 'Wide')
      const narrow = createRecord('ACDE48000/36', 'Narrow')
      const built = PrefixIndex.build([wide, narrow])
      expect(built.lookup(0xacde48000001)).toBe(narrow)
      expect(built.lookup(0xacde48001001)).toBe(wide)
    })
  })
})
