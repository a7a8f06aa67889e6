/**
 * Configuration tests
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_OUI_CONFIG, DEFAULT_REGISTRY_PATH, getConfig, parseDelimiter, parseLoadPolicy } from '@/lib/config'
import { ConfigError } from '@/lib/errors'

describe('getConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(getConfig({})).toEqual({
      registryPath: DEFAULT_REGISTRY_PATH,
      delimiter: ';',
      loadPolicy: 'strict',
      debug: false,
    })
  })

  it('places the default registry under ~/.local/share/oui', () => {
    expect(DEFAULT_REGISTRY_PATH.endsWith('/.local/share/oui/IEEE_OUI.csv')).toBe(true)
  })

  it('reads OUI_* variables', () => {
    expect(
      getConfig({
        OUI_REGISTRY_PATH: '/srv/oui/registry.csv',
        OUI_DELIMITER: 'comma',
        OUI_LOAD_POLICY: 'SKIP',
        OUI_DEBUG: 'yes',
      })
    ).toEqual({
      registryPath: '/srv/oui/registry.csv',
      delimiter: ',',
      loadPolicy: 'skip',
      debug: true,
    })
  })

  it('does not share state between calls', () => {
    const config = getConfig({})
    config.delimiter = '|'
    expect(getConfig({}).delimiter).toBe(';')
    expect(DEFAULT_OUI_CONFIG.delimiter).toBe(';')
  })

  it('rejects invalid values', () => {
    expect(() => getConfig({ OUI_LOAD_POLICY: 'lenient' })).toThrow(ConfigError)
    expect(() => getConfig({ OUI_LOAD_POLICY: 'lenient' })).toThrow(
      'OUI_LOAD_POLICY: expected "strict" or "skip", got "lenient"'
    )
    expect(() => getConfig({ OUI_DEBUG: 'maybe' })).toThrow('OUI_DEBUG: expected a boolean, got "maybe"')
  })

  it('treats an empty OUI_DEBUG as off', () => {
    expect(getConfig({ OUI_DEBUG: '' }).debug).toBe(false)
  })
})

describe('parseDelimiter', () => {
  it('accepts single characters', () => {
    expect(parseDelimiter(';')).toBe(';')
    expect(parseDelimiter('|')).toBe('|')
    expect(parseDelimiter(',')).toBe(',')
  })

  it('accepts names', () => {
    expect(parseDelimiter('tab')).toBe('\t')
    expect(parseDelimiter('TAB')).toBe('\t')
    expect(parseDelimiter('\\t')).toBe('\t')
    expect(parseDelimiter('semicolon')).toBe(';')
    expect(parseDelimiter('pipe')).toBe('|')
  })

  it('rejects multi-character values', () => {
    expect(() => parseDelimiter(';;')).toThrow('OUI_DELIMITER: delimiter must be a single character, got ";;"')
  })

  it('rejects characters that appear in prefixes', () => {
    expect(() => parseDelimiter('a')).toThrow('OUI_DELIMITER: "a" cannot be used as a delimiter')
    expect(() => parseDelimiter(':', '--delimiter')).toThrow('--delimiter: ":" cannot be used as a delimiter')
    expect(() => parseDelimiter('"')).toThrow(ConfigError)
  })
})

describe('parseLoadPolicy', () => {
  it('normalizes case and whitespace', () => {
    expect(parseLoadPolicy(' Strict ')).toBe('strict')
    expect(parseLoadPolicy('skip')).toBe('skip')
  })
})
