/**
 * 48-bit prefix arithmetic and display formatting
 *
 * Addresses are plain numbers (48 bits fits well inside 2^53). Masking uses
 * multiplication and division by powers of two, since JavaScript bitwise
 * operators truncate to signed 32 bits.
 */

import type { OuiRecord, PrefixBits } from './types'
import { MAC_ADDRESS_BITS, REGISTRY_NAMES } from './types'

export const MAX_ADDRESS = 2 ** MAC_ADDRESS_BITS - 1

/**
 * Is the value a whole number in [0, 2^48)
 */
export function isMacAddressValue(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_ADDRESS
}

/**
 * Keep the top `bits` bits of a 48-bit address, zeroing the rest
 * (0xACDE48112233, 24) -> 0xACDE48000000
 */
export function maskToPrefix(address: number, bits: number): number {
  const unit = 2 ** (MAC_ADDRESS_BITS - bits)
  return Math.floor(address / unit) * unit
}

/**
 * Left-justify `digits` hex digits into the 48-bit space
 * "ACDE48" -> 0xACDE48000000, "70B3D5F" -> 0x70B3D5F00000
 */
export function hexToPrefixValue(hex: string): number {
  return parseInt(hex, 16) * 16 ** (12 - hex.length)
}

/**
 * 12 uppercase hex digits for a 48-bit value
 */
export function toHex12(value: number): string {
  return value.toString(16).toUpperCase().padStart(12, '0')
}

/**
 * Format a 48-bit value as a MAC address
 * 0xACDE48112233 -> "AC:DE:48:11:22:33"
 */
export function formatMacAddress(value: number, separator: ':' | '-' | '' = ':'): string {
  const hex = toHex12(value)
  const octets: string[] = []
  for (let i = 0; i < 12; i += 2) {
    octets.push(hex.substring(i, i + 2))
  }
  return octets.join(separator)
}

/**
 * Prefix in CIDR-like notation, e.g. "70:B3:D5:F0:00:00/28"
 * This form is accepted back by the record parser.
 */
export function formatPrefix(record: Pick<OuiRecord, 'prefixBits' | 'prefixValue'>): string {
  return `${formatMacAddress(record.prefixValue)}/${record.prefixBits}`
}

/**
 * Bare registry digits for a prefix: "ACDE48", "70B3D5F", "70B3D5123"
 */
export function prefixDigits(record: Pick<OuiRecord, 'prefixBits' | 'prefixValue'>): string {
  return toHex12(record.prefixValue).substring(0, record.prefixBits / 4)
}

/**
 * Short label for output, e.g. "MA-L AC:DE:48:00:00:00/24"
 */
export function describePrefix(record: Pick<OuiRecord, 'prefixBits' | 'prefixValue'>): string {
  return `${REGISTRY_NAMES[record.prefixBits]} ${formatPrefix(record)}`
}

/**
 * Number of addresses in a block of the given width
 */
export function blockSize(bits: PrefixBits): number {
  return 2 ** (MAC_ADDRESS_BITS - bits)
}
