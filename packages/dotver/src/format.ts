import type { RenderMode } from './types.js'
import type { Version } from './version.js'
import { InvalidArgumentError, isMalformedVersionLiteral } from './errors.js'
import { ignoreWarning } from './utils.js'
import { parse } from './version.js'

const NORMAL_MIN_COMPONENTS = 3
const GROUP_WIDTH = 3

/**
 * Canonical dotted form with at least three components, e.g. `v1.200.0`.
 *
 * An alpha version gets `_` in place of the last `.`. When the version has
 * fewer than three components, the padding zeros are added first, so the
 * marker deliberately sits before the padded last component: `1.2_3` (two
 * components, 1 and 230) gives `v1.230_0`. The marker has to stay in the
 * final segment for the output to parse back to the same value.
 */
export function normal(version: Version): string {
  const parts = version.components.map(component => component.toString())
  while (parts.length < NORMAL_MIN_COMPONENTS) {
    parts.push('0')
  }

  if (!version.isAlpha)
    return `v${parts.join('.')}`

  const last = parts.pop()
  return `v${parts.join('.')}_${last}`
}

/**
 * Canonical decimal form: the inverse of the grouping transform. The alpha
 * flag is not part of the decimal value and is left out.
 */
export function numify(version: Version): string {
  const [integer, ...groups] = version.components
  const fraction = groups
    .map(group => group.toString().padStart(GROUP_WIDTH, '0'))
    .join('')
    .replace(/0+$/, '')

  return fraction.length > 0 ? `${integer}.${fraction}` : `${integer}`
}

function literalMatches(version: Version, literal: string): boolean {
  let reparsed: Version
  try {
    reparsed = parse(literal, { onWarning: ignoreWarning })
  }
  catch (error) {
    if (isMalformedVersionLiteral(error))
      return false
    throw error
  }

  return reparsed.isQv === version.isQv
    && reparsed.isAlpha === version.isAlpha
    && reparsed.components.length === version.components.length
    && reparsed.components.every((component, i) => component === version.components[i])
}

/**
 * The original literal when it still describes this exact value, otherwise
 * `normal` for dotted-decimal versions and `numify` for decimal ones.
 */
export function stringify(version: Version): string {
  const literal = version.originalLiteral
  if (literal !== null && literalMatches(version, literal))
    return literal.replace(/^V/, 'v')

  return version.isQv ? normal(version) : numify(version)
}

export function render(version: Version, mode: RenderMode): string {
  switch (mode) {
    case 'normal':
      return normal(version)
    case 'numify':
      return numify(version)
    case 'stringify':
      return stringify(version)
    default:
      throw new InvalidArgumentError(`Invalid format: ${String(mode)} (expected normal, numify or stringify)`)
  }
}

export function isRenderMode(value: string): value is RenderMode {
  return ['normal', 'numify', 'stringify'].includes(value)
}
