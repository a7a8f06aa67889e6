/**
 * Resolver configuration
 * Defaults, overridable through OUI_* environment variables
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '@/lib/errors'
import type { LoadPolicy } from '@/lib/oui/types'

// =============================================================================
// Types
// =============================================================================

export interface OuiConfig {
  registryPath: string
  delimiter: string
  loadPolicy: LoadPolicy
  debug: boolean
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_REGISTRY_PATH = join(homedir(), '.local', 'share', 'oui', 'IEEE_OUI.csv')

export const DEFAULT_OUI_CONFIG: OuiConfig = {
  registryPath: DEFAULT_REGISTRY_PATH,
  delimiter: ';',
  loadPolicy: 'strict',
  debug: false,
}

const NAMED_DELIMITERS: Record<string, string> = {
  tab: '\t',
  comma: ',',
  semicolon: ';',
  pipe: '|',
}

// =============================================================================
// Parsers
// =============================================================================

/**
 * Accepts a single character or one of: tab, comma, semicolon, pipe.
 * Hex digits, quotes and prefix separators are rejected since they
 * would collide with the prefix column.
 */
export function parseDelimiter(value: string, variable = 'OUI_DELIMITER'): string {
  const name = value.toLowerCase()
  if (Object.hasOwn(NAMED_DELIMITERS, name)) return NAMED_DELIMITERS[name]

  if (value === '\\t') return '\t'

  if (value.length !== 1) {
    throw new ConfigError(variable, `delimiter must be a single character, got "${value}"`)
  }
  if (/[0-9a-f"\-:./]/i.test(value)) {
    throw new ConfigError(variable, `"${value}" cannot be used as a delimiter`)
  }
  return value
}

export function parseLoadPolicy(value: string, variable = 'OUI_LOAD_POLICY'): LoadPolicy {
  const normalized = value.trim().toLowerCase()
  if (normalized === 'strict' || normalized === 'skip') return normalized
  throw new ConfigError(variable, `expected "strict" or "skip", got "${value}"`)
}

function parseFlag(value: string, variable: string): boolean {
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false
  throw new ConfigError(variable, `expected a boolean, got "${value}"`)
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Build configuration from the environment, falling back to defaults
 */
export function getConfig(env: NodeJS.ProcessEnv = process.env): OuiConfig {
  const config: OuiConfig = { ...DEFAULT_OUI_CONFIG }

  if (env.OUI_REGISTRY_PATH) {
    config.registryPath = env.OUI_REGISTRY_PATH
  }
  if (env.OUI_DELIMITER) {
    config.delimiter = parseDelimiter(env.OUI_DELIMITER)
  }
  if (env.OUI_LOAD_POLICY) {
    config.loadPolicy = parseLoadPolicy(env.OUI_LOAD_POLICY)
  }
  if (env.OUI_DEBUG !== undefined) {
    config.debug = parseFlag(env.OUI_DEBUG, 'OUI_DEBUG')
  }

  return config
}
