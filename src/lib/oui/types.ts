/**
 * OUI registry types
 * Records, lookup outcomes and loader options shared by the lookup core
 */

// =============================================================================
// Prefix Widths
// =============================================================================

/**
 * Block widths assigned by the IEEE registry
 * MA-L = 24 bits, MA-M = 28 bits, MA-S = 36 bits
 */
export type PrefixBits = 24 | 28 | 36

export type RegistryName = 'MA-L' | 'MA-M' | 'MA-S'

/** Probe order for longest-prefix matching (narrowest block first) */
export const PREFIX_WIDTHS: readonly PrefixBits[] = [36, 28, 24]

export const REGISTRY_NAMES: Record<PrefixBits, RegistryName> = {
  24: 'MA-L',
  28: 'MA-M',
  36: 'MA-S',
}

/** Hex digits a bare prefix of each width is written with */
export const HEX_DIGITS_TO_BITS: Readonly<Record<number, PrefixBits>> = {
  6: 24,
  7: 28,
  9: 36,
}

export const MAC_ADDRESS_BITS = 48

export function isPrefixBits(value: number): value is PrefixBits {
  return value === 24 || value === 28 || value === 36
}

// =============================================================================
// Records
// =============================================================================

export interface OuiRecord {
  readonly prefixBits: PrefixBits
  /** Top `prefixBits` bits of the 48-bit space, low bits zero */
  readonly prefixValue: number
  readonly organization: string
  readonly registeredAddress: string | null
}

export type PrefixCounts = Record<PrefixBits, number>

// =============================================================================
// Lookup Results
// =============================================================================

export interface ResolvedResult {
  status: 'resolved'
  address: number
  organization: string
  registeredAddress: string | null
  matchedPrefixBits: PrefixBits
  record: OuiRecord
}

export interface UnresolvedResult {
  status: 'unresolved'
  address: number
}

export interface InvalidAddressResult {
  status: 'invalid'
  input: string
  reason: string
}

export type LookupResult = ResolvedResult | UnresolvedResult | InvalidAddressResult

// =============================================================================
// Loading
// =============================================================================

/**
 * strict: any malformed line aborts the load
 * skip: malformed lines are counted and left out
 */
export type LoadPolicy = 'strict' | 'skip'

export interface LoadStats {
  lines: number
  records: number
  /** Blank, comment and header lines */
  skipped: number
  malformed: number
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}
