/* eslint-disable no-console */
import type { CommandContext } from './commands.js'
import type { DotverConfig, DotverOptions } from './types.js'
import process from 'node:process'
import { loadDotverConfig } from './config.js'
import { InvalidArgumentError, isMalformedVersionLiteral } from './errors.js'
import { isRenderMode } from './format.js'
import { ExitCode } from './types.js'
import { colors, ignoreWarning, logWarning, symbols } from './utils.js'

export interface CLIOptions {
  declare?: boolean
  quiet?: boolean
  verbose?: boolean
  desc?: boolean
  format?: string
}

export function exitCodeFor(error: Error): ExitCode {
  if (isMalformedVersionLiteral(error) || error instanceof InvalidArgumentError)
    return ExitCode.InvalidArgument
  return ExitCode.FatalError
}

/**
 * Error handler
 */
export function errorHandler(error: Error, verbose: boolean = false): never {
  let message = error.message || String(error)

  // Always show full error details in CI for debugging
  if (verbose || process.env.CI || process.env.DEBUG) {
    message += `\n\n${error.stack || ''}`
  }

  console.error(colors.red(`${symbols.error} ${message}`))
  process.exit(exitCodeFor(error))
}

/**
 * Config files are plain JavaScript, so their values are checked here
 */
export function validateConfig(config: DotverConfig): DotverConfig {
  if (!isRenderMode(config.sortFormat))
    throw new InvalidArgumentError(`Invalid format: ${String(config.sortFormat)} (expected normal, numify or stringify)`)
  if (config.sortDirection !== 'asc' && config.sortDirection !== 'desc')
    throw new InvalidArgumentError(`Invalid sort direction: ${String(config.sortDirection)} (expected asc or desc)`)
  return config
}

/**
 * Parse and prepare config from CLI options
 */
export async function prepareConfig(options: CLIOptions, cwd?: string): Promise<DotverConfig> {
  // Only pass CLI arguments that were explicitly provided, let config file fill in the rest
  const cliOverrides: DotverOptions = {}

  if (options.declare !== undefined)
    cliOverrides.declare = options.declare
  if (options.quiet !== undefined)
    cliOverrides.quiet = options.quiet
  if (options.verbose !== undefined)
    cliOverrides.verbose = options.verbose
  if (options.desc !== undefined)
    cliOverrides.sortDirection = options.desc ? 'desc' : 'asc'
  if (options.format !== undefined) {
    if (!isRenderMode(options.format))
      throw new InvalidArgumentError(`Invalid format: ${options.format} (expected normal, numify or stringify)`)
    cliOverrides.sortFormat = options.format
  }

  return validateConfig(await loadDotverConfig(cliOverrides, cwd))
}

export function contextFrom(config: DotverConfig): CommandContext {
  return {
    declare: config.declare,
    onWarning: config.quiet ? ignoreWarning : logWarning,
  }
}
