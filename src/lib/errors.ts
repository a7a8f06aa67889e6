/**
 * Error types for registry loading and MAC lookups, plus friendly error display
 */

import type { OuiRecord } from '@/lib/oui/types'
import { REGISTRY_NAMES } from '@/lib/oui/types'
import { formatPrefix } from '@/lib/oui/prefix'

// =============================================================================
// Error Classes
// =============================================================================

export type OuiErrorCode =
  | 'MALFORMED_RECORD'
  | 'REGISTRY_LOAD_FAILED'
  | 'DUPLICATE_PREFIX'
  | 'INVALID_ADDRESS_FORMAT'
  | 'INDEX_NOT_READY'
  | 'CONFIG_INVALID'

export class OuiError extends Error {
  readonly code: OuiErrorCode

  constructor(code: OuiErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A registry line that cannot be turned into a record.
 * lineNumber is 0 when the record did not come from a registry line.
 */
export class MalformedRecordError extends OuiError {
  readonly lineNumber: number
  readonly line: string
  readonly reason: string

  constructor(reason: string, lineNumber: number, line: string) {
    super('MALFORMED_RECORD', lineNumber > 0 ? `Line ${lineNumber}: ${reason}` : reason)
    this.reason = reason
    this.lineNumber = lineNumber
    this.line = line
  }
}

/**
 * Strict load aborted; carries the first bad line and how many lines were bad
 */
export class RegistryLoadError extends OuiError {
  readonly firstError: MalformedRecordError
  readonly malformedCount: number

  constructor(firstError: MalformedRecordError, malformedCount: number) {
    const others = malformedCount - 1
    const suffix = others > 0 ? ` (and ${others} more malformed line${others === 1 ? '' : 's'})` : ''
    super('REGISTRY_LOAD_FAILED', `Registry load failed: ${firstError.message}${suffix}`, {
      cause: firstError,
    })
    this.firstError = firstError
    this.malformedCount = malformedCount
  }
}

/**
 * Two records of the same width claim the same block
 */
export class DuplicatePrefixError extends OuiError {
  readonly existing: OuiRecord
  readonly duplicate: OuiRecord

  constructor(existing: OuiRecord, duplicate: OuiRecord) {
    super(
      'DUPLICATE_PREFIX',
      `Duplicate ${REGISTRY_NAMES[duplicate.prefixBits]} prefix ${formatPrefix(duplicate)}: ` +
        `"${existing.organization}" and "${duplicate.organization}"`
    )
    this.existing = existing
    this.duplicate = duplicate
  }
}

export class InvalidAddressFormatError extends OuiError {
  readonly input: string

  constructor(input: string, reason: string) {
    super('INVALID_ADDRESS_FORMAT', `Invalid MAC address "${input}": ${reason}`)
    this.input = input
  }
}

/**
 * Lookup attempted before any index was installed. A caller bug, not a runtime condition.
 */
export class IndexNotReadyError extends OuiError {
  constructor() {
    super('INDEX_NOT_READY', 'OUI index has not been loaded')
  }
}

export class ConfigError extends OuiError {
  readonly variable: string

  constructor(variable: string, message: string) {
    super('CONFIG_INVALID', `${variable}: ${message}`)
    this.variable = variable
  }
}

// =============================================================================
// Friendly Errors
// =============================================================================

export interface FriendlyError {
  title: string
  message: string
  code?: string
  canRetry: boolean
}

const ERROR_PATTERNS: Array<{
  pattern: RegExp
  title: string
  message: string
  canRetry: boolean
}> = [
  {
    pattern: /ENOENT/,
    title: 'Registry Not Found',
    message: 'The registry file does not exist. Check the path or set OUI_REGISTRY_PATH.',
    canRetry: false,
  },
  {
    pattern: /EACCES|EPERM/,
    title: 'Access Denied',
    message: 'The registry file cannot be read with the current permissions.',
    canRetry: false,
  },
  {
    pattern: /EISDIR/,
    title: 'Not A File',
    message: 'The registry path points to a directory, not a file.',
    canRetry: false,
  },
  {
    pattern: /EMFILE|ENFILE|EBUSY/,
    title: 'File Busy',
    message: 'The system could not open the registry file right now. Please try again.',
    canRetry: true,
  },
]

function describeOuiError(error: OuiError): FriendlyError {
  switch (error.code) {
    case 'MALFORMED_RECORD':
    case 'REGISTRY_LOAD_FAILED':
      return { title: 'Corrupt Registry', message: error.message, code: error.code, canRetry: false }
    case 'DUPLICATE_PREFIX':
      return { title: 'Inconsistent Registry', message: error.message, code: error.code, canRetry: false }
    case 'INVALID_ADDRESS_FORMAT':
      return { title: 'Invalid MAC Address', message: error.message, code: error.code, canRetry: false }
    case 'INDEX_NOT_READY':
      return { title: 'Registry Not Loaded', message: error.message, code: error.code, canRetry: true }
    case 'CONFIG_INVALID':
      return { title: 'Configuration Error', message: error.message, code: error.code, canRetry: false }
  }
}

/**
 * Turn any thrown value into a user-facing description
 */
export function describeError(error: unknown): FriendlyError {
  if (!error) {
    return {
      title: 'Unknown Error',
      message: 'An unexpected error occurred.',
      canRetry: true,
    }
  }

  if (error instanceof OuiError) {
    return describeOuiError(error)
  }

  let errorMessage = ''
  let errorCode: string | undefined

  if (error instanceof Error) {
    errorMessage = error.message
    // Node system errors carry a string code (ENOENT, EACCES, ...)
    if ('code' in error && typeof error.code === 'string') {
      errorCode = error.code
    }
  } else if (typeof error === 'string') {
    errorMessage = error
  } else {
    errorMessage = String(error)
  }

  for (const { pattern, title, message, canRetry } of ERROR_PATTERNS) {
    if ((errorCode && pattern.test(errorCode)) || pattern.test(errorMessage)) {
      return { title, message, code: errorCode, canRetry }
    }
  }

  return {
    title: 'Error',
    message: sanitizeErrorMessage(errorMessage),
    code: errorCode,
    canRetry: true,
  }
}

function sanitizeErrorMessage(message: string): string {
  let sanitized = message.trim()

  if (sanitized.length > 200) {
    sanitized = sanitized.substring(0, 197) + '...'
  }

  if (sanitized.length > 0) {
    sanitized = sanitized.charAt(0).toUpperCase() + sanitized.slice(1)
  }

  return sanitized || 'An unexpected error occurred.'
}
