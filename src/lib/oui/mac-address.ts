/**
 * MAC address parsing
 * Handles formats: AC:DE:48:00:00:01, AC-DE-48-00-00-01, AC.DE.48.00.00.01,
 * acde.4800.0001, acde48000001
 */

import { InvalidAddressFormatError } from '@/lib/errors'

export type ParsedMacAddress = { ok: true; value: number } | { ok: false; reason: string }

const BARE_PATTERN = /^[0-9a-f]{12}$/i
const DELIMITERS = [':', '-', '.'] as const

function groupsMatch(groups: string[], count: number, width: number): boolean {
  return groups.length === count && groups.every((group) => group.length === width && /^[0-9a-f]+$/i.test(group))
}

/**
 * Parse MAC address text into its 48-bit value
 * One delimiter kind per address; groups must be uniform.
 */
export function parseMacAddress(text: string): ParsedMacAddress {
  const trimmed = text.trim()
  if (!trimmed) {
    return { ok: false, reason: 'address is empty' }
  }

  if (BARE_PATTERN.test(trimmed)) {
    return { ok: true, value: parseInt(trimmed, 16) }
  }

  const used = DELIMITERS.filter((d) => trimmed.includes(d))
  if (used.length === 0) {
    return { ok: false, reason: 'expected 12 hex digits' }
  }
  if (used.length > 1) {
    return { ok: false, reason: `mixes delimiters ${used.map((d) => `"${d}"`).join(', ')}` }
  }

  const delimiter = used[0]
  const groups = trimmed.split(delimiter)

  if (groupsMatch(groups, 6, 2) || (delimiter === '.' && groupsMatch(groups, 3, 4))) {
    return { ok: true, value: parseInt(groups.join(''), 16) }
  }

  return {
    ok: false,
    reason:
      delimiter === '.'
        ? 'expected six 2-digit or three 4-digit hex groups'
        : 'expected six 2-digit hex groups',
  }
}

/**
 * Like parseMacAddress, but throws InvalidAddressFormatError
 */
export function parseMacAddressOrThrow(text: string): number {
  const parsed = parseMacAddress(text)
  if (!parsed.ok) {
    throw new InvalidAddressFormatError(text, parsed.reason)
  }
  return parsed.value
}

export function isValidMacAddress(text: string): boolean {
  return parseMacAddress(text).ok
}
