/**
 * Registry loader tests
 */

import { describe, it, expect } from 'vitest'
import { fileURLToPath } from 'node:url'
import { decodeSource, load, loadFile } from '@/lib/oui/loader'
import { DuplicatePrefixError, RegistryLoadError } from '@/lib/errors'
import { createSilentLogger } from '../../helpers/logger'

const FIXTURE = fileURLToPath(new URL('../../fixtures/sample-registry.csv', import.meta.url))

const WITH_BAD_LINES = [
  'Assignment;Organization Name',
  'ACDE48;Example Corp',
  'ZZZZZZ;Bad One',
  'ACDE49;',
  '001122;Good Co',
].join('\n')

function loadError(source: string): unknown {
  try {
    load(source, { logger: createSilentLogger() })
  } catch (err) {
    return err
  }
  return undefined
}

describe('Registry Loader', () => {
  // ==========================================================================
  // Source Decoding
  // ==========================================================================

  describe('decodeSource', () => {
    it('decodes UTF-8 bytes', () => {
      expect(decodeSource(new TextEncoder().encode('ACDE48;Zürich AG'))).toBe('ACDE48;Zürich AG')
    })

    it('strips a byte order mark', () => {
      expect(decodeSource('\uFEFFACDE48;Example Corp')).toBe('ACDE48;Example Corp')
      expect(decodeSource(new Uint8Array([0xef, 0xbb, 0xbf, 0x41]))).toBe('A')
    })
  })

  // ==========================================================================
  // Well-formed Registries
  // ==========================================================================

  describe('load', () => {
    it('builds an index and reports stats', () => {
      const { index, stats } = load('ACDE48;Example Corp\n70B3D5F;Sub Block Ltd;Street 2\n', {
        logger: createSilentLogger(),
      })
      expect(stats).toEqual({ lines: 2, records: 2, skipped: 0, malformed: 0 })
      expect(index.lookup(0x70b3d5f12345)?.organization).toBe('Sub Block Ltd')
    })

    it('handles CRLF line endings', () => {
      const { index, stats } = load('ACDE48;Example Corp\r\n001BC5;Parent Networks\r\n', {
        logger: createSilentLogger(),
      })
      expect(stats.records).toBe(2)
      expect(index.lookup(0x001bc5000001)?.organization).toBe('Parent Networks')
    })

    it('skips the header, comments and blank lines', () => {
      const { stats } = load('Assignment;Organization Name\n\n# comment\nACDE48;Example Corp', {
        logger: createSilentLogger(),
      })
      expect(stats).toEqual({ lines: 4, records: 1, skipped: 3, malformed: 0 })
    })

    it('only treats the first content line as a header', () => {
      const err = loadError('ACDE48;Example Corp\nAssignment;Organization Name')
      expect(err).toBeInstanceOf(RegistryLoadError)
      expect(err).toMatchObject({
        message: 'Registry load failed: Line 2: prefix "Assignment" is not hexadecimal',
      })
    })

    it('fails when the first line was split on the wrong delimiter', () => {
      expect(loadError('ACDE48,Comma Corp\n001122;Good Co')).toMatchObject({
        message: 'Registry load failed: Line 1: expected at least 2 fields separated by ";"',
      })
    })

    it('returns an empty index for an empty source', () => {
      const { index, stats } = load('', { logger: createSilentLogger() })
      expect(index.size).toBe(0)
      expect(stats).toEqual({ lines: 0, records: 0, skipped: 0, malformed: 0 })
    })

    it('honours the delimiter option', () => {
      const { index } = load('ACDE48,"Example, Corp",Springfield', {
        delimiter: ',',
        logger: createSilentLogger(),
      })
      expect(index.lookup(0xacde48000001)?.organization).toBe('Example, Corp')
    })

    it('logs a debug summary', () => {
      const logger = createSilentLogger()
      load('ACDE48;Example Corp\n70B3D5F;Sub Block Ltd', { logger })
      expect(logger.debug).toHaveBeenCalledWith(
        'Loaded 2 records (MA-L 1, MA-M 1, MA-S 0), 0 skipped, 0 malformed'
      )
    })
  })

  // ==========================================================================
  // Malformed Registries
  // ==========================================================================

  describe('strict policy', () => {
    it('fails with the first malformed line and a count', () => {
      const err = loadError(WITH_BAD_LINES)
      expect(err).toBeInstanceOf(RegistryLoadError)
      if (err instanceof RegistryLoadError) {
        expect(err.firstError.lineNumber).toBe(3)
        expect(err.malformedCount).toBe(2)
        expect(err.cause).toBe(err.firstError)
        expect(err.message).toBe(
          'Registry load failed: Line 3: prefix "ZZZZZZ" is not hexadecimal (and 1 more malformed line)'
        )
      }
    })

    it('does not warn for each line', () => {
      const logger = createSilentLogger()
      expect(() => load(WITH_BAD_LINES, { logger })).toThrow(RegistryLoadError)
      expect(logger.warn).not.toHaveBeenCalled()
    })
  })

  describe('skip policy', () => {
    it('leaves malformed lines out and counts them', () => {
      const logger = createSilentLogger()
      const { index, stats } = load(WITH_BAD_LINES, { policy: 'skip', logger })
      expect(stats).toEqual({ lines: 5, records: 2, skipped: 1, malformed: 2 })
      expect(index.lookup(0x001122334455)?.organization).toBe('Good Co')
      expect(index.lookup(0xacde49000000)).toBeNull()
    })

    it('warns once per malformed line', () => {
      const logger = createSilentLogger()
      load(WITH_BAD_LINES, { policy: 'skip', logger })
      expect(logger.warn).toHaveBeenCalledTimes(2)
      expect(logger.warn).toHaveBeenNthCalledWith(
        1,
        'Skipping malformed registry line: Line 3: prefix "ZZZZZZ" is not hexadecimal'
      )
      expect(logger.warn).toHaveBeenNthCalledWith(
        2,
        'Skipping malformed registry line: Line 4: organization name is empty'
      )
    })
  })

  describe('duplicates', () => {
    it('abort the load under either policy', () => {
      const source = 'ACDE48;Example Corp\nAC-DE-48;Someone Else'
      expect(() => load(source, { logger: createSilentLogger() })).toThrow(DuplicatePrefixError)
      expect(() => load(source, { policy: 'skip', logger: createSilentLogger() })).toThrow(DuplicatePrefixError)
    })
  })

  // ==========================================================================
  // Files
  // ==========================================================================

  describe('loadFile', () => {
    it('loads the sample registry', async () => {
      const { index, stats } = await loadFile(FIXTURE, { logger: createSilentLogger() })
      expect(stats).toEqual({ lines: 8, records: 6, skipped: 2, malformed: 0 })
      expect(index.counts()).toEqual({ 24: 3, 28: 1, 36: 2 })
    })

    it('reads quoted fields', async () => {
      const { index } = await loadFile(FIXTURE, { logger: createSilentLogger() })
      const record = index.lookup(0x0050c2000001)
      expect(record?.organization).toBe('Quoted, Inc.')
      expect(record?.registeredAddress).toBe('10 Quote Lane')
    })

    it('propagates file system errors', async () => {
      await expect(
        loadFile(fileURLToPath(new URL('../../fixtures/missing.csv', import.meta.url)), {
          logger: createSilentLogger(),
        })
      ).rejects.toMatchObject({ code: 'ENOENT' })
    })
  })
})
