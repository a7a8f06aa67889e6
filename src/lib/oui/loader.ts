/**
 * Registry loader
 * Reads the whole registry table, parses every line and builds the index.
 *
 * Strict policy (default): one malformed line fails the whole load, so a
 * corrupt registry never turns into a partial index. The error reports the
 * first malformed line and how many there were in total.
 *
 * Skip policy: malformed lines are logged, counted and left out.
 *
 * Duplicate prefixes abort the load under either policy.
 */

import { readFile } from 'node:fs/promises'
import { TextDecoder } from 'node:util'
import { MalformedRecordError, RegistryLoadError } from '@/lib/errors'
import { defaultLogger } from '@/lib/logger'
import { PrefixIndex } from './prefix-index'
import { DEFAULT_DELIMITER, parseRecordLine } from './record-parser'
import type { LoadPolicy, LoadStats, Logger, OuiRecord } from './types'

export type RegistrySource = string | Uint8Array

export interface LoadOptions {
  delimiter?: string
  policy?: LoadPolicy
  logger?: Logger
}

export interface LoadResult {
  index: PrefixIndex
  stats: LoadStats
}

const utf8 = new TextDecoder('utf-8')

/**
 * Registry text from a string or raw bytes, without a byte order mark
 */
export function decodeSource(source: RegistrySource): string {
  const text = typeof source === 'string' ? source : utf8.decode(source)
  return text.startsWith('\uFEFF') ? text.substring(1) : text
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/)
  // A trailing newline is a terminator, not an extra empty line
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}

/**
 * Parse a full registry and build its index
 *
 * @throws RegistryLoadError under the strict policy when any line is malformed
 * @throws DuplicatePrefixError when two records of one width collide
 */
export function load(source: RegistrySource, options: LoadOptions = {}): LoadResult {
  const { delimiter = DEFAULT_DELIMITER, policy = 'strict', logger = defaultLogger } = options

  const lines = splitLines(decodeSource(source))
  const records: OuiRecord[] = []
  const stats: LoadStats = { lines: lines.length, records: 0, skipped: 0, malformed: 0 }
  let firstError: MalformedRecordError | null = null
  let seenContent = false

  for (const [i, line] of lines.entries()) {
    const lineNumber = i + 1
    try {
      const parsed = parseRecordLine(line, { delimiter, lineNumber, allowHeader: !seenContent })
      if (parsed.kind === 'record') {
        seenContent = true
        records.push(parsed.record)
      } else {
        if (parsed.reason === 'header') {
          seenContent = true
          logger.debug(`Skipping header on line ${lineNumber}`)
        }
        stats.skipped++
      }
    } catch (err) {
      if (!(err instanceof MalformedRecordError)) throw err
      seenContent = true
      stats.malformed++
      firstError ??= err
      if (policy === 'skip') {
        logger.warn(`Skipping malformed registry line: ${err.message}`)
      }
    }
  }

  if (firstError && policy === 'strict') {
    throw new RegistryLoadError(firstError, stats.malformed)
  }

  const index = PrefixIndex.build(records)
  stats.records = index.size

  const counts = index.counts()
  logger.debug(
    `Loaded ${stats.records} records (MA-L ${counts[24]}, MA-M ${counts[28]}, MA-S ${counts[36]}), ` +
      `${stats.skipped} skipped, ${stats.malformed} malformed`
  )

  return { index, stats }
}

/**
 * Read and load a registry file. File system errors propagate unchanged.
 */
export async function loadFile(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  const logger = options.logger ?? defaultLogger
  logger.debug(`Reading registry from ${path}`)
  const bytes = await readFile(path)
  return load(bytes, options)
}
