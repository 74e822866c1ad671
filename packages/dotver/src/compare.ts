import type { LiteralInput, Relation, SortDirection, VersionLiteral } from './types.js'
import { UnsupportedCoercionError } from './errors.js'
import { Ordering } from './types.js'
import { describeType } from './utils.js'
import { parse, Version } from './version.js'

export type Comparable = Version | LiteralInput

function isLiteralObject(value: object): value is VersionLiteral {
  if (!('kind' in value) || !('value' in value))
    return false
  if (value.kind === 'text')
    return typeof value.value === 'string'
  if (value.kind === 'numeric')
    return typeof value.value === 'number' || typeof value.value === 'bigint'
  return false
}

/**
 * Turn an operand into a Version. Non-Version values go through `parse`, so
 * `0.96` becomes `[0, 960]`, not `[0, 96]`.
 */
export function coerce(value: unknown): Version {
  if (value instanceof Version)
    return value
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint')
    return parse(value)
  if (typeof value === 'object' && value !== null && isLiteralObject(value))
    return parse(value)

  throw new UnsupportedCoercionError(describeType(value))
}

/**
 * Three-way comparison. Components are compared with the shorter side padded
 * by zeros; on a tie an alpha version sorts below its release.
 */
export function compare(a: Comparable, b: Comparable): Ordering {
  const left = coerce(a)
  const right = coerce(b)
  const length = Math.max(left.components.length, right.components.length)

  for (let i = 0; i < length; i++) {
    const x = left.components[i] ?? 0n
    const y = right.components[i] ?? 0n
    if (x < y)
      return Ordering.Less
    if (x > y)
      return Ordering.Greater
  }

  if (left.isAlpha !== right.isAlpha)
    return left.isAlpha ? Ordering.Less : Ordering.Greater

  return Ordering.Equal
}

const relations = {
  lt: ordering => ordering === Ordering.Less,
  le: ordering => ordering !== Ordering.Greater,
  gt: ordering => ordering === Ordering.Greater,
  ge: ordering => ordering !== Ordering.Less,
  eq: ordering => ordering === Ordering.Equal,
  ne: ordering => ordering !== Ordering.Equal,
} satisfies Record<Relation, (ordering: Ordering) => boolean>

export function relate(relation: Relation, a: Comparable, b: Comparable): boolean {
  return relations[relation](compare(a, b))
}

export const lt = (a: Comparable, b: Comparable): boolean => relate('lt', a, b)
export const le = (a: Comparable, b: Comparable): boolean => relate('le', a, b)
export const gt = (a: Comparable, b: Comparable): boolean => relate('gt', a, b)
export const ge = (a: Comparable, b: Comparable): boolean => relate('ge', a, b)
export const eq = (a: Comparable, b: Comparable): boolean => relate('eq', a, b)
export const ne = (a: Comparable, b: Comparable): boolean => relate('ne', a, b)

/**
 * Coerce and sort. The sort is stable, so equal versions keep their input order.
 */
export function sortVersions(values: readonly Comparable[], direction: SortDirection = 'asc'): Version[] {
  const sign = direction === 'asc' ? 1 : -1
  return values
    .map(value => coerce(value))
    .sort((a, b) => sign * compare(a, b))
}

export function maxVersion(values: readonly Comparable[]): Version {
  if (values.length === 0)
    throw new RangeError('Cannot take the maximum of an empty list')
  return sortVersions(values, 'desc')[0]
}

export function minVersion(values: readonly Comparable[]): Version {
  if (values.length === 0)
    throw new RangeError('Cannot take the minimum of an empty list')
  return sortVersions(values)[0]
}
