/**
 * OUI lookup engine
 *
 * `resolve(index, text)` is the pure query: MAC text in, typed result out.
 * Bad input and unknown prefixes are ordinary results, never exceptions.
 *
 * `OuiLookupEngine` holds the current index for a long-running process.
 * Reloads build a fresh index off to the side and swap the reference, so
 * readers never see a half-built index and need no locking.
 */

import type { OuiConfig } from '@/lib/config'
import { getConfig } from '@/lib/config'
import { IndexNotReadyError } from '@/lib/errors'
import { createConsoleLogger } from '@/lib/logger'
import type { LoadOptions, RegistrySource } from './loader'
import { load, loadFile } from './loader'
import { parseMacAddress } from './mac-address'
import { blockSize } from './prefix'
import type { PrefixIndex } from './prefix-index'
import type { LoadStats, LookupResult, OuiRecord, PrefixCounts } from './types'

// =============================================================================
// Pure Queries
// =============================================================================

/**
 * Resolve MAC address text against an index
 *
 * @example
 * resolve(index, 'AC:DE:48:11:22:33') // { status: 'resolved', organization: 'Example Corp', matchedPrefixBits: 24, ... }
 * resolve(index, '00:11:22:33:44:55') // { status: 'unresolved', ... }
 * resolve(index, 'not-a-mac')         // { status: 'invalid', ... }
 */
export function resolve(index: PrefixIndex, macText: string): LookupResult {
  const parsed = parseMacAddress(macText)
  if (!parsed.ok) {
    return { status: 'invalid', input: macText, reason: parsed.reason }
  }

  const record = index.lookup(parsed.value)
  if (!record) {
    return { status: 'unresolved', address: parsed.value }
  }

  return {
    status: 'resolved',
    address: parsed.value,
    organization: record.organization,
    registeredAddress: record.registeredAddress,
    matchedPrefixBits: record.prefixBits,
    record,
  }
}

/**
 * Records registered to an exact organization name (case-insensitive, no partial matching)
 */
export function prefixesForOrganization(index: PrefixIndex, organization: string): readonly OuiRecord[] {
  return index.prefixesFor(organization)
}

/**
 * Does the MAC address fall inside any of the given blocks
 * Useful for filtering hosts by vendor
 */
export function macMatchesPrefixes(macText: string, records: readonly OuiRecord[]): boolean {
  if (records.length === 0) return false

  const parsed = parseMacAddress(macText)
  if (!parsed.ok) return false

  return records.some(
    (record) =>
      parsed.value >= record.prefixValue && parsed.value < record.prefixValue + blockSize(record.prefixBits)
  )
}

// =============================================================================
// Engine
// =============================================================================

export interface BatchEntry {
  input: string
  result: LookupResult
}

export interface EngineStats {
  ready: boolean
  records: number
  counts: PrefixCounts
  lookups: number
  resolved: number
  unresolved: number
  invalid: number
}

export class OuiLookupEngine {
  private index: PrefixIndex | null = null
  private lastError: Error | null = null
  private lookups = 0
  private resolvedCount = 0
  private unresolvedCount = 0
  private invalidCount = 0
  private readonly loadOptions: LoadOptions

  constructor(loadOptions: LoadOptions = {}) {
    this.loadOptions = loadOptions
  }

  /**
   * Swap in a fully built index
   */
  install(index: PrefixIndex): void {
    this.index = index
    this.lastError = null
  }

  isReady(): boolean {
    return this.index !== null
  }

  getIndex(): PrefixIndex | null {
    return this.index
  }

  getLastError(): Error | null {
    return this.lastError
  }

  /**
   * @throws IndexNotReadyError if no index has been installed
   */
  resolve(macText: string): LookupResult {
    const index = this.index
    if (!index) {
      throw new IndexNotReadyError()
    }

    const result = resolve(index, macText)
    this.lookups++
    if (result.status === 'resolved') this.resolvedCount++
    else if (result.status === 'unresolved') this.unresolvedCount++
    else this.invalidCount++

    return result
  }

  /**
   * Resolve several addresses against the same index snapshot.
   * One entry per input, in order, repeats included.
   */
  resolveBatch(macTexts: readonly string[]): BatchEntry[] {
    return macTexts.map((input) => ({ input, result: this.resolve(input) }))
  }

  /**
   * Build a new index from registry text or bytes and install it.
   * On failure the current index stays in place and the error propagates.
   */
  reload(source: RegistrySource): LoadStats {
    try {
      const { index, stats } = load(source, this.loadOptions)
      this.install(index)
      return stats
    } catch (err) {
      this.lastError = err instanceof Error ? err : new Error(String(err))
      throw err
    }
  }

  async reloadFile(path: string): Promise<LoadStats> {
    try {
      const { index, stats } = await loadFile(path, this.loadOptions)
      this.install(index)
      return stats
    } catch (err) {
      this.lastError = err instanceof Error ? err : new Error(String(err))
      throw err
    }
  }

  getStats(): EngineStats {
    return {
      ready: this.index !== null,
      records: this.index?.size ?? 0,
      counts: this.index?.counts() ?? { 24: 0, 28: 0, 36: 0 },
      lookups: this.lookups,
      resolved: this.resolvedCount,
      unresolved: this.unresolvedCount,
      invalid: this.invalidCount,
    }
  }

  resetStats(): void {
    this.lookups = 0
    this.resolvedCount = 0
    this.unresolvedCount = 0
    this.invalidCount = 0
  }
}

// =============================================================================
// Shared Instance
// =============================================================================

let engineInstance: OuiLookupEngine | null = null

function createEngine(config: OuiConfig): OuiLookupEngine {
  return new OuiLookupEngine({
    delimiter: config.delimiter,
    policy: config.loadPolicy,
    logger: createConsoleLogger({ debug: config.debug }),
  })
}

/**
 * Get the process-wide engine, created from the environment configuration on first use
 */
export function getOuiEngine(): OuiLookupEngine {
  if (!engineInstance) {
    engineInstance = createEngine(getConfig())
  }
  return engineInstance
}

/**
 * Load a registry with the given configuration and make it the shared engine.
 * If loading fails the current shared engine is left as it was.
 */
export async function initializeOuiEngine(config: OuiConfig = getConfig()): Promise<LoadStats> {
  const engine = createEngine(config)
  const stats = await engine.reloadFile(config.registryPath)
  engineInstance = engine
  return stats
}
