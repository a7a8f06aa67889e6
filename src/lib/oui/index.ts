/**
 * OUI lookup exports
 */

// Types
export type {
  PrefixBits,
  RegistryName,
  OuiRecord,
  PrefixCounts,
  LookupResult,
  ResolvedResult,
  UnresolvedResult,
  InvalidAddressResult,
  LoadPolicy,
  LoadStats,
  Logger,
} from './types'

export { PREFIX_WIDTHS, REGISTRY_NAMES, isPrefixBits } from './types'

// Parsing
export type { ParsedLine, ParsedPrefix, ParseLineOptions, SkipReason } from './record-parser'
export { parseRecordLine, parsePrefix, createRecord, splitFields, DEFAULT_DELIMITER } from './record-parser'
export type { ParsedMacAddress } from './mac-address'
export { parseMacAddress, parseMacAddressOrThrow, isValidMacAddress } from './mac-address'

// Index
export { PrefixIndex } from './prefix-index'
export { formatMacAddress, formatPrefix, describePrefix, prefixDigits, maskToPrefix } from './prefix'

// Loading
export type { LoadOptions, LoadResult, RegistrySource } from './loader'
export { load, loadFile, decodeSource } from './loader'

// Engine
export type { BatchEntry, EngineStats } from './engine'
export {
  resolve,
  prefixesForOrganization,
  macMatchesPrefixes,
  OuiLookupEngine,
  getOuiEngine,
  initializeOuiEngine,
} from './engine'
