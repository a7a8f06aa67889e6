/**
 * Longest-prefix-match index over the three IEEE block widths
 *
 * Only 24, 28 and 36-bit prefixes exist, so instead of a 48-bit trie the index
 * keeps one exact-match map per width and probes them narrowest first.
 * Built once, never mutated afterwards.
 */

import { DuplicatePrefixError, MalformedRecordError } from '@/lib/errors'
import type { OuiRecord, PrefixBits, PrefixCounts } from './types'
import { PREFIX_WIDTHS, isPrefixBits } from './types'
import { formatPrefix, isMacAddressValue, maskToPrefix, toHex12 } from './prefix'

type Partition = ReadonlyMap<number, OuiRecord>

// Records built by hand can carry low bits that no lookup would ever hit
function isAlignedPrefix(record: OuiRecord): boolean {
  return (
    isPrefixBits(record.prefixBits) &&
    isMacAddressValue(record.prefixValue) &&
    maskToPrefix(record.prefixValue, record.prefixBits) === record.prefixValue
  )
}

export class PrefixIndex {
  private readonly partitions: Readonly<Record<PrefixBits, Partition>>
  // Lowercased organization -> records, for exact reverse lookups
  private readonly byOrganization: ReadonlyMap<string, readonly OuiRecord[]>

  private constructor(
    partitions: Record<PrefixBits, Partition>,
    byOrganization: ReadonlyMap<string, readonly OuiRecord[]>
  ) {
    this.partitions = Object.freeze(partitions)
    this.byOrganization = byOrganization
    Object.freeze(this)
  }

  /**
   * Build an index from a batch of records
   *
   * @throws MalformedRecordError for a prefix with bits set below its width
   * @throws DuplicatePrefixError when two records of one width share a prefix.
   *   Nothing is returned in that case, so no partial index ever escapes.
   */
  static build(records: Iterable<OuiRecord>): PrefixIndex {
    const partitions: Record<PrefixBits, Map<number, OuiRecord>> = {
      24: new Map(),
      28: new Map(),
      36: new Map(),
    }
    const byOrganization = new Map<string, OuiRecord[]>()

    for (const record of records) {
      if (!isAlignedPrefix(record)) {
        throw new MalformedRecordError(
          `prefix ${toHex12(record.prefixValue)} is not a valid /${record.prefixBits} block`,
          0,
          `${formatPrefix(record)};${record.organization}`
        )
      }

      const partition = partitions[record.prefixBits]
      const existing = partition.get(record.prefixValue)
      if (existing) {
        throw new DuplicatePrefixError(existing, record)
      }
      partition.set(record.prefixValue, record)

      const key = record.organization.toLowerCase()
      const owned = byOrganization.get(key)
      if (owned) {
        owned.push(record)
      } else {
        byOrganization.set(key, [record])
      }
    }

    return new PrefixIndex(partitions, byOrganization)
  }

  /**
   * Most specific record covering the address: 36-bit, then 28-bit, then 24-bit.
   * Returns null when nothing matches or the value is not a 48-bit address.
   */
  lookup(address: number): OuiRecord | null {
    if (!isMacAddressValue(address)) return null

    for (const bits of PREFIX_WIDTHS) {
      const record = this.partitions[bits].get(maskToPrefix(address, bits))
      if (record) return record
    }

    return null
  }

  /**
   * Exact record for a prefix of a given width
   */
  get(prefixBits: PrefixBits, prefixValue: number): OuiRecord | null {
    return this.partitions[prefixBits].get(prefixValue) ?? null
  }

  get size(): number {
    return this.partitions[24].size + this.partitions[28].size + this.partitions[36].size
  }

  counts(): PrefixCounts {
    return {
      24: this.partitions[24].size,
      28: this.partitions[28].size,
      36: this.partitions[36].size,
    }
  }

  /**
   * All records, widest blocks first, ascending prefix within a width
   */
  records(): OuiRecord[] {
    const all: OuiRecord[] = []
    for (const bits of [24, 28, 36] as const) {
      const sorted = [...this.partitions[bits].values()].sort((a, b) => a.prefixValue - b.prefixValue)
      all.push(...sorted)
    }
    return all
  }

  /**
   * Records registered to exactly this organization name (case-insensitive)
   */
  prefixesFor(organization: string): readonly OuiRecord[] {
    const key = organization.trim().toLowerCase()
    if (!key) return []
    return this.byOrganization.get(key) ?? []
  }
}
