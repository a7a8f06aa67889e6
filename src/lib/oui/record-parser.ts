/**
 * Registry record parser
 *
 * Turns one line of the registry table into an OuiRecord. Lines look like
 *
 *   ACDE48;Example Corp;1 Example Way, Springfield
 *   70-B3-D5-F;Sub Block Ltd;
 *   00:1B:C5:00:10:00/36;"Small Block, Inc.";Some Street 1
 *
 * Prefix width comes from the digit count (6 -> 24, 7 -> 28, 9 -> 36) or
 * from an explicit "/bits" suffix.
 */

import { MalformedRecordError } from '@/lib/errors'
import type { OuiRecord, PrefixBits } from './types'
import { HEX_DIGITS_TO_BITS, isPrefixBits } from './types'
import { hexToPrefixValue, maskToPrefix } from './prefix'

export const DEFAULT_DELIMITER = ';'

const HEX_SEPARATORS = /[-:.]/g
const HEX_PATTERN = /^[0-9a-f]+$/i

// =============================================================================
// Types
// =============================================================================

export interface ParseLineOptions {
  delimiter?: string
  /** 1-based, used in error messages */
  lineNumber?: number
  /** Treat a line with a non-hex prefix as a header instead of an error */
  allowHeader?: boolean
}

export type SkipReason = 'blank' | 'comment' | 'header'

export type ParsedLine =
  | { kind: 'record'; record: OuiRecord }
  | { kind: 'skip'; reason: SkipReason }

export type ParsedPrefix =
  | { ok: true; prefixBits: PrefixBits; prefixValue: number }
  | { ok: false; reason: string }

// =============================================================================
// Field Splitting
// =============================================================================

/**
 * Split a line on the delimiter, honouring double-quoted fields ("" is a literal quote).
 * Returns null for an unterminated quote.
 */
export function splitFields(line: string, delimiter: string = DEFAULT_DELIMITER): string[] | null {
  const fields: string[] = []
  let current = ''
  let inQuotes = false

  for (let i = 0; i < line.length; i++) {
    const ch = line[i]

    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"'
          i++
        } else {
          inQuotes = false
        }
      } else {
        current += ch
      }
    } else if (ch === '"' && current.trim() === '') {
      inQuotes = true
      current = ''
    } else if (line.startsWith(delimiter, i)) {
      fields.push(current)
      current = ''
      i += delimiter.length - 1
    } else {
      current += ch
    }
  }

  if (inQuotes) return null

  fields.push(current)
  return fields.map((field) => field.trim())
}

// =============================================================================
// Prefix Parsing
// =============================================================================

function isHexPrefix(field: string): boolean {
  const hexPart = field.split('/')[0].replace(HEX_SEPARATORS, '')
  return HEX_PATTERN.test(hexPart)
}

/**
 * Parse the prefix column
 * "AC-DE-48"             -> 24 bits, 0xACDE48000000
 * "70B3D5F"              -> 28 bits, 0x70B3D5F00000
 * "00:1B:C5:00:10:00/36" -> 36 bits, 0x001BC5001000
 */
export function parsePrefix(field: string): ParsedPrefix {
  const trimmed = field.trim()
  if (!trimmed) {
    return { ok: false, reason: 'prefix is empty' }
  }

  const slashIdx = trimmed.indexOf('/')
  const digits = (slashIdx === -1 ? trimmed : trimmed.substring(0, slashIdx)).replace(HEX_SEPARATORS, '')

  if (!HEX_PATTERN.test(digits)) {
    return { ok: false, reason: `prefix "${trimmed}" is not hexadecimal` }
  }

  // Width inferred from the digit count
  if (slashIdx === -1) {
    const prefixBits: PrefixBits | undefined = HEX_DIGITS_TO_BITS[digits.length]
    if (prefixBits === undefined) {
      return {
        ok: false,
        reason: `prefix "${trimmed}" has ${digits.length} hex digits, expected 6, 7 or 9`,
      }
    }
    return { ok: true, prefixBits, prefixValue: hexToPrefixValue(digits) }
  }

  // Explicit width: "<hex>/<bits>"
  const widthPart = trimmed.substring(slashIdx + 1).trim()
  if (!/^\d+$/.test(widthPart)) {
    return { ok: false, reason: `prefix width "${widthPart}" is not a number` }
  }

  const bits = parseInt(widthPart, 10)
  if (!isPrefixBits(bits)) {
    return { ok: false, reason: `prefix width /${bits} is not one of 24, 28 or 36` }
  }
  if (digits.length > 12) {
    return { ok: false, reason: `prefix "${trimmed}" is longer than 48 bits` }
  }
  if (digits.length * 4 < bits) {
    return { ok: false, reason: `prefix "${trimmed}" has too few digits for /${bits}` }
  }

  const prefixValue = hexToPrefixValue(digits)
  if (maskToPrefix(prefixValue, bits) !== prefixValue) {
    return { ok: false, reason: `prefix "${trimmed}" has bits set beyond /${bits}` }
  }

  return { ok: true, prefixBits: bits, prefixValue }
}

// =============================================================================
// Record Construction
// =============================================================================

/**
 * Build a frozen record from a prefix string, throwing MalformedRecordError on bad input
 */
export function createRecord(
  prefix: string,
  organization: string,
  registeredAddress?: string | null,
  lineNumber = 0
): OuiRecord {
  const line = [prefix, organization, registeredAddress ?? ''].join(DEFAULT_DELIMITER)

  const parsed = parsePrefix(prefix)
  if (!parsed.ok) {
    throw new MalformedRecordError(parsed.reason, lineNumber, line)
  }

  const org = organization.trim()
  if (!org) {
    throw new MalformedRecordError('organization name is empty', lineNumber, line)
  }

  const address = registeredAddress?.trim()

  return Object.freeze({
    prefixBits: parsed.prefixBits,
    prefixValue: parsed.prefixValue,
    organization: org,
    registeredAddress: address ? address : null,
  })
}

/**
 * Parse one registry line
 *
 * Blank lines, "#" comments and (with allowHeader) a header row are skipped.
 * Anything else either becomes a record or throws MalformedRecordError.
 */
export function parseRecordLine(line: string, options: ParseLineOptions = {}): ParsedLine {
  const { delimiter = DEFAULT_DELIMITER, lineNumber = 0, allowHeader = false } = options
  const trimmed = line.trim()

  if (!trimmed) return { kind: 'skip', reason: 'blank' }
  if (trimmed.startsWith('#')) return { kind: 'skip', reason: 'comment' }

  const fields = splitFields(trimmed, delimiter)
  if (!fields) {
    throw new MalformedRecordError('unterminated quoted field', lineNumber, line)
  }

  const [prefixField, organization = '', address = ''] = fields

  // A single-field line is more likely data split on the wrong delimiter
  if (allowHeader && fields.length >= 2 && !isHexPrefix(prefixField)) {
    return { kind: 'skip', reason: 'header' }
  }

  if (fields.length < 2) {
    throw new MalformedRecordError(`expected at least 2 fields separated by "${delimiter}"`, lineNumber, line)
  }

  const parsed = parsePrefix(prefixField)
  if (!parsed.ok) {
    throw new MalformedRecordError(parsed.reason, lineNumber, line)
  }

  if (!organization) {
    throw new MalformedRecordError('organization name is empty', lineNumber, line)
  }

  return {
    kind: 'record',
    record: Object.freeze({
      prefixBits: parsed.prefixBits,
      prefixValue: parsed.prefixValue,
      organization,
      registeredAddress: address ? address : null,
    }),
  }
}
