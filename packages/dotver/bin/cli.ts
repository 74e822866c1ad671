#!/usr/bin/env node
/* eslint-disable no-console */
import type { CLIOptions } from '../src/cli.js'
import type { DotverConfig, RenderMode } from '../src/types.js'
import process from 'node:process'
import { CLI } from '@stacksjs/clapp'
import pkg from '../package.json' with { type: 'json' }
import { contextFrom, errorHandler, prepareConfig } from '../src/cli.js'
import { checkCommand, compareCommand, renderCommand, showCommand, sortCommand } from '../src/commands.js'

const cli = new CLI('dotver')

async function run(options: CLIOptions, command: (config: DotverConfig) => string[]): Promise<void> {
  let verbose = options.verbose ?? false
  try {
    const config = await prepareConfig(options)
    verbose = config.verbose
    for (const line of command(config)) {
      console.log(line)
    }
  }
  catch (error) {
    errorHandler(error instanceof Error ? error : new Error(String(error)), verbose)
  }
}

function renderAction(mode: RenderMode) {
  return (literal: string, options: CLIOptions) =>
    run(options, config => renderCommand(literal, mode, contextFrom(config)))
}

cli
  .option('--declare', 'Treat literals as dotted-decimal declarations')
  .option('-q, --quiet', 'Suppress parse warnings')
  .option('--verbose', 'Show stack traces on errors')

cli
  .command('normal <literal>', 'Print the canonical dotted form')
  .example('dotver normal 1.0023')
  .action(renderAction('normal'))

cli
  .command('numify <literal>', 'Print the canonical decimal form')
  .example('dotver numify v1.2.3')
  .action(renderAction('numify'))

cli
  .command('stringify <literal>', 'Print the closest form to the original literal')
  .action(renderAction('stringify'))

cli
  .command('show <literal>', 'Print components, flags and every rendering')
  .action((literal: string, options: CLIOptions) =>
    run(options, config => showCommand(literal, contextFrom(config))))

cli
  .command('compare <left> <right>', 'Print <, = or > for two literals')
  .example('dotver compare v0.95.0 0.96')
  .action((left: string, right: string, options: CLIOptions) =>
    run(options, config => compareCommand(left, right, contextFrom(config))))

cli
  .command('sort [...literals]', 'Sort literals in version order')
  .option('--desc', 'Sort from highest to lowest')
  .option('--format <mode>', 'Render as normal, numify or stringify')
  .example('dotver sort 1.10 v1.9.0 1.9_1')
  .action((literals: string[], options: CLIOptions) =>
    run(options, config => sortCommand(literals, {
      ...contextFrom(config),
      format: config.sortFormat,
      direction: config.sortDirection,
    })))

cli
  .command('check <literal>', 'Report whether a literal is lax and strict')
  .action((literal: string, options: CLIOptions) =>
    run(options, () => checkCommand(literal)))

// Version command
cli
  .command('version', 'Show the version of dotver')
  .action(() => {
    console.log(pkg.version)
  })

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:')
  errorHandler(reason instanceof Error ? reason : new Error(String(reason)))
})

cli.version(pkg.version)
cli.help()
cli.parse()
