import type { Comparable } from './compare.js'
import type { ComponentFlags, LiteralInput, Ordered, Ordering, ParseOptions } from './types.js'
import { classify, toLiteral } from './classifier.js'
import { compare, relate } from './compare.js'
import { extractComponents } from './extractor.js'
import { normal, numify, stringify } from './format.js'
import { logWarning } from './utils.js'

/**
 * Immutable version value unifying decimal (`1.002003`) and dotted-decimal
 * (`v1.2.3`) literals.
 *
 * Create one with `parse`, `declare` or `Version.fromComponents`.
 */
export class Version implements Ordered<Comparable> {
  readonly components: readonly bigint[]
  readonly isQv: boolean
  readonly isAlpha: boolean
  /**
   * Input text, kept for `stringify`. Null for structurally composed values.
   */
  readonly originalLiteral: string | null

  private constructor(components: readonly bigint[], isQv: boolean, isAlpha: boolean, originalLiteral: string | null) {
    if (components.length === 0)
      throw new RangeError('A version needs at least one component')
    if (components.some(component => component < 0n))
      throw new RangeError('Version components must be non-negative')

    this.components = Object.freeze([...components])
    this.isQv = isQv
    this.isAlpha = isAlpha
    this.originalLiteral = originalLiteral
    Object.freeze(this)
  }

  private static fromLiteral(input: LiteralInput, forceQv: boolean, options: ParseOptions): Version {
    const classification = classify(toLiteral(input))
    const { components, isAlpha, warnings } = extractComponents(classification)
    const onWarning = options.onWarning ?? logWarning
    for (const warning of warnings) {
      onWarning(warning)
    }

    const isQv = forceQv || classification.grammar === 'DirectDotted'
    return new Version(components, isQv, isAlpha, classification.text)
  }

  /**
   * Parse a literal; the grammar it matches decides `isQv`
   */
  static parse(input: LiteralInput, options: ParseOptions = {}): Version {
    return Version.fromLiteral(input, false, options)
  }

  /**
   * Parse a literal and mark it dotted-decimal regardless of its grammar.
   * The components still follow the grammar: `declare('1.2')` is `v1.200.0`.
   */
  static declare(input: LiteralInput, options: ParseOptions = {}): Version {
    return Version.fromLiteral(input, true, options)
  }

  static fromComponents(components: ReadonlyArray<bigint | number>, flags: ComponentFlags = {}): Version {
    return new Version(components.map(component => BigInt(component)), flags.qv ?? false, flags.alpha ?? false, null)
  }

  compare(other: Comparable): Ordering {
    return compare(this, other)
  }

  lt(other: Comparable): boolean {
    return relate('lt', this, other)
  }

  le(other: Comparable): boolean {
    return relate('le', this, other)
  }

  gt(other: Comparable): boolean {
    return relate('gt', this, other)
  }

  ge(other: Comparable): boolean {
    return relate('ge', this, other)
  }

  eq(other: Comparable): boolean {
    return relate('eq', this, other)
  }

  ne(other: Comparable): boolean {
    return relate('ne', this, other)
  }

  normal(): string {
    return normal(this)
  }

  numify(): string {
    return numify(this)
  }

  stringify(): string {
    return stringify(this)
  }

  toString(): string {
    return stringify(this)
  }

  toJSON(): string {
    return stringify(this)
  }
}

export function parse(input: LiteralInput, options?: ParseOptions): Version {
  return Version.parse(input, options)
}

export function declare(input: LiteralInput, options?: ParseOptions): Version {
  return Version.declare(input, options)
}

export const qv = declare

export function isAlphaVersion(version: Version): boolean {
  return version.isAlpha
}

export function isQvVersion(version: Version): boolean {
  return version.isQv
}
