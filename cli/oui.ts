#!/usr/bin/env npx tsx
/**
 * oui - look up the registered owner of a MAC address
 *
 * Usage: oui [options] <mac> [<mac> ...]
 */

import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import chalk, { Chalk, type ChalkInstance } from 'chalk'
import ora from 'ora'
import prompts from 'prompts'
import type { OuiConfig } from '@/lib/config'
import { getConfig, parseDelimiter } from '@/lib/config'
import { OuiError, describeError } from '@/lib/errors'
import { createConsoleLogger } from '@/lib/logger'
import { OuiLookupEngine } from '@/lib/oui/engine'
import { isValidMacAddress } from '@/lib/oui/mac-address'
import { describePrefix, formatMacAddress, formatPrefix } from '@/lib/oui/prefix'
import type { LoadStats, Logger, LookupResult, OuiRecord } from '@/lib/oui/types'
import { REGISTRY_NAMES } from '@/lib/oui/types'

// =============================================================================
// Types
// =============================================================================

interface CliOptions {
  macs: string[]
  registryPath?: string
  delimiter?: string
  skipMalformed: boolean
  json: boolean
  showAddress: boolean
  vendor?: string
  stats: boolean
  verbose: boolean
}

interface CliResult {
  output: string[]
  errors: string[]
  exitCode: number
}

interface RunOptions {
  env?: NodeJS.ProcessEnv
  /** Colors, spinner and the interactive prompt */
  interactive?: boolean
  logger?: Logger
}

// =============================================================================
// Constants
// =============================================================================

const VERSION = '0.1.0'

const EXIT_OK = 0
const EXIT_ERROR = 1
const EXIT_UNRESOLVED = 2

// =============================================================================
// Argument Parsing
// =============================================================================

function parseArgs(args: string[]): CliOptions | { error: string } {
  const options: CliOptions = {
    macs: [],
    skipMalformed: false,
    json: false,
    showAddress: false,
    stats: false,
    verbose: false,
  }

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '-r' || arg === '--registry') {
      i++
      if (i >= args.length) {
        return { error: `option requires an argument -- '${arg}'` }
      }
      options.registryPath = args[i]
    } else if (arg === '-d' || arg === '--delimiter') {
      i++
      if (i >= args.length) {
        return { error: `option requires an argument -- '${arg}'` }
      }
      options.delimiter = args[i]
    } else if (arg === '--vendor') {
      i++
      if (i >= args.length) {
        return { error: "option requires an argument -- '--vendor'" }
      }
      options.vendor = args[i]
    } else if (arg === '--skip-malformed') {
      options.skipMalformed = true
    } else if (arg === '-j' || arg === '--json') {
      options.json = true
    } else if (arg === '-a' || arg === '--address') {
      options.showAddress = true
    } else if (arg === '-s' || arg === '--stats') {
      options.stats = true
    } else if (arg === '-v' || arg === '--verbose') {
      options.verbose = true
    } else if (arg === '-h' || arg === '--help') {
      return { error: 'SHOW_HELP' }
    } else if (arg === '-V' || arg === '--version') {
      return { error: 'SHOW_VERSION' }
    } else if (arg === '--') {
      options.macs.push(...args.slice(i + 1))
      break
    } else if (arg.startsWith('-') && arg.length > 1) {
      return { error: `unknown option '${arg}'` }
    } else {
      options.macs.push(arg)
    }
    i++
  }

  return options
}

function getUsageMessage(): string {
  return `oui (version ${VERSION})
usage: oui [options] <mac> [<mac> ...]
	-r, --registry <path>   registry file (default $OUI_REGISTRY_PATH or ~/.local/share/oui/IEEE_OUI.csv)
	-d, --delimiter <char>  registry field delimiter (default ";")
	    --skip-malformed    skip malformed registry lines instead of failing
	-j, --json              print results as JSON
	-a, --address           include the registered address
	    --vendor <name>     list prefixes registered to an organization (exact name)
	-s, --stats             print registry statistics
	-v, --verbose           debug logging
	-h, --help              display this help
	-V, --version           display version

  MAC addresses may be written AC:DE:48:00:00:01, AC-DE-48-00-00-01,
  acde.4800.0001 or acde48000001
exit status: 0 all resolved, 1 error or invalid address, 2 unresolved address`
}

// =============================================================================
// Formatting
// =============================================================================

function formatResult(result: LookupResult, showAddress: boolean, paint: ChalkInstance): string[] {
  switch (result.status) {
    case 'resolved': {
      const lines = [
        `${paint.bold(formatMacAddress(result.address))}  ${paint.green(result.organization)}  ` +
          paint.gray(`(${describePrefix(result.record)})`),
      ]
      if (showAddress && result.registeredAddress) {
        lines.push(`    ${result.registeredAddress}`)
      }
      return lines
    }
    case 'unresolved':
      return [`${paint.bold(formatMacAddress(result.address))}  ${paint.yellow('No match.')}`]
    case 'invalid':
      return []
  }
}

function resultToJson(input: string, result: LookupResult): Record<string, unknown> {
  switch (result.status) {
    case 'resolved':
      return {
        input,
        status: result.status,
        mac: formatMacAddress(result.address),
        organization: result.organization,
        registeredAddress: result.registeredAddress,
        registry: REGISTRY_NAMES[result.matchedPrefixBits],
        prefixBits: result.matchedPrefixBits,
        prefix: formatPrefix(result.record),
      }
    case 'unresolved':
      return { input, status: result.status, mac: formatMacAddress(result.address) }
    case 'invalid':
      return { input, status: result.status, reason: result.reason }
  }
}

function formatStats(stats: LoadStats, engine: OuiLookupEngine, registryPath: string): string[] {
  const counts = engine.getStats().counts
  return [
    `Registry: ${registryPath}`,
    `Records:  ${stats.records}`,
    `  MA-L (24-bit): ${counts[24]}`,
    `  MA-M (28-bit): ${counts[28]}`,
    `  MA-S (36-bit): ${counts[36]}`,
    `Skipped lines:   ${stats.skipped}`,
    `Malformed lines: ${stats.malformed}`,
  ]
}

function formatVendor(records: readonly OuiRecord[]): string[] {
  return records.map((record) => `${describePrefix(record)}  ${record.organization}`)
}

// =============================================================================
// Main
// =============================================================================

async function promptForMac(): Promise<string | null> {
  const { mac } = await prompts({
    type: 'text',
    name: 'mac',
    message: 'MAC address',
    validate: (value: string) => isValidMacAddress(value) || 'Enter a MAC address like AC:DE:48:00:00:01',
  })
  return typeof mac === 'string' && mac ? mac : null
}

async function runOui(args: string[], runOptions: RunOptions = {}): Promise<CliResult> {
  const { env = process.env, interactive = false } = runOptions
  const output: string[] = []
  const errors: string[] = []
  const paint: ChalkInstance = new Chalk({ level: interactive ? chalk.level : 0 })

  const optionsOrError = parseArgs(args)
  if ('error' in optionsOrError) {
    if (optionsOrError.error === 'SHOW_HELP') {
      output.push(getUsageMessage())
      return { output, errors, exitCode: EXIT_OK }
    }
    if (optionsOrError.error === 'SHOW_VERSION') {
      output.push(`oui (version ${VERSION})`)
      return { output, errors, exitCode: EXIT_OK }
    }
    errors.push(`oui: ${optionsOrError.error}`)
    errors.push("Try 'oui --help' for more information.")
    return { output, errors, exitCode: EXIT_ERROR }
  }

  const options = optionsOrError

  let config: OuiConfig
  try {
    config = getConfig(env)
    if (options.registryPath) config.registryPath = options.registryPath
    if (options.delimiter) config.delimiter = parseDelimiter(options.delimiter, '--delimiter')
    if (options.skipMalformed) config.loadPolicy = 'skip'
    if (options.verbose) config.debug = true
  } catch (err) {
    const friendly = describeError(err)
    errors.push(`oui: ${friendly.title}: ${friendly.message}`)
    return { output, errors, exitCode: EXIT_ERROR }
  }

  if (options.macs.length === 0 && !options.vendor && !options.stats) {
    const mac = interactive ? await promptForMac() : null
    if (!mac) {
      errors.push('oui: at least one MAC address is required')
      errors.push("Try 'oui --help' for more information.")
      return { output, errors, exitCode: EXIT_ERROR }
    }
    options.macs.push(mac)
  }

  const logger = runOptions.logger ?? createConsoleLogger({ debug: config.debug, prefix: '' })
  const engine = new OuiLookupEngine({ delimiter: config.delimiter, policy: config.loadPolicy, logger })

  const spinner = ora({ text: 'Loading OUI registry...', isSilent: !interactive || options.json }).start()
  let loadStats: LoadStats
  try {
    loadStats = await engine.reloadFile(config.registryPath)
    spinner.stop()
  } catch (err) {
    spinner.stop()
    const friendly = describeError(err)
    errors.push(paint.red(`oui: ${friendly.title}: ${friendly.message}`))
    if (!(err instanceof OuiError)) {
      errors.push(`     ${config.registryPath}`)
    }
    return { output, errors, exitCode: EXIT_ERROR }
  }

  let exitCode = EXIT_OK

  if (options.stats) {
    output.push(...formatStats(loadStats, engine, config.registryPath))
  }

  if (options.vendor) {
    const records = engine.getIndex()?.prefixesFor(options.vendor) ?? []
    if (records.length === 0) {
      errors.push(`oui: no prefixes registered to "${options.vendor}"`)
      exitCode = EXIT_UNRESOLVED
    } else {
      output.push(...formatVendor(records))
    }
  }

  const json: Record<string, unknown>[] = []
  for (const { input, result } of engine.resolveBatch(options.macs)) {
    if (result.status === 'invalid') {
      exitCode = EXIT_ERROR
      if (!options.json) errors.push(paint.red(`oui: invalid MAC address "${input}": ${result.reason}`))
    } else if (result.status === 'unresolved' && exitCode === EXIT_OK) {
      exitCode = EXIT_UNRESOLVED
    }

    if (options.json) {
      json.push(resultToJson(input, result))
    } else {
      output.push(...formatResult(result, options.showAddress, paint))
    }
  }

  if (options.json && options.macs.length > 0) {
    output.push(JSON.stringify(json, null, 2))
  }

  return { output, errors, exitCode }
}

// =============================================================================
// Exports
// =============================================================================

export { parseArgs, getUsageMessage, formatResult, resultToJson, runOui, VERSION }

export type { CliOptions, CliResult, RunOptions }

// CLI entry point when run directly
function isEntryPoint(): boolean {
  const invoked = process.argv[1]
  if (!invoked) return false
  try {
    return realpathSync(invoked) === fileURLToPath(import.meta.url)
  } catch {
    return false
  }
}

if (isEntryPoint()) {
  process.on('SIGINT', () => {
    console.log()
    process.exit(130)
  })

  runOui(process.argv.slice(2), { interactive: Boolean(process.stdout.isTTY && process.stdin.isTTY) })
    .then((result) => {
      for (const line of result.output) {
        console.log(line)
      }
      for (const line of result.errors) {
        console.error(line)
      }
      process.exitCode = result.exitCode
    })
    .catch((err: unknown) => {
      console.error(chalk.red(`oui: ${describeError(err).message}`))
      process.exitCode = EXIT_ERROR
    })
}
