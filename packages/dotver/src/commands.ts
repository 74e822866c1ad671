import type { RenderMode, SortDirection, WarningHandler } from './types.js'
import type { Version } from './version.js'
import { compare, sortVersions } from './compare.js'
import { normal, numify, render, stringify } from './format.js'
import { Ordering } from './types.js'
import { isLax, isStrict } from './validate.js'
import { declare, parse } from './version.js'

export interface CommandContext {
  declare: boolean
  onWarning: WarningHandler
}

export interface SortContext extends CommandContext {
  format: RenderMode
  direction: SortDirection
}

const orderingSymbols: Record<Ordering, string> = {
  [Ordering.Less]: '<',
  [Ordering.Equal]: '=',
  [Ordering.Greater]: '>',
}

/**
 * CLI arguments are always text: a shell has no numeric literals
 */
export function readVersion(literal: string, context: CommandContext): Version {
  const options = { onWarning: context.onWarning }
  return context.declare ? declare(literal, options) : parse(literal, options)
}

export function renderCommand(literal: string, mode: RenderMode, context: CommandContext): string[] {
  return [render(readVersion(literal, context), mode)]
}

export function showCommand(literal: string, context: CommandContext): string[] {
  const version = readVersion(literal, context)
  return [
    `components: ${version.components.join(', ')}`,
    `qv: ${version.isQv}`,
    `alpha: ${version.isAlpha}`,
    `normal: ${normal(version)}`,
    `numify: ${numify(version)}`,
    `stringify: ${stringify(version)}`,
  ]
}

export function compareCommand(left: string, right: string, context: CommandContext): string[] {
  const ordering = compare(readVersion(left, context), readVersion(right, context))
  return [orderingSymbols[ordering]]
}

export function sortCommand(literals: string[], context: SortContext): string[] {
  const versions = literals.map(literal => readVersion(literal, context))
  return sortVersions(versions, context.direction).map(version => render(version, context.format))
}

export function checkCommand(literal: string): string[] {
  return [
    `lax: ${isLax(literal)}`,
    `strict: ${isStrict(literal)}`,
  ]
}
