import type { Classification, Grammar, LiteralInput, VersionLiteral } from './types.js'
import { MalformedVersionLiteralError } from './errors.js'

/**
 * Lift a plain string or number into the tagged literal union
 */
export function toLiteral(input: LiteralInput): VersionLiteral {
  if (typeof input === 'string')
    return { kind: 'text', value: input }
  if (typeof input === 'number' || typeof input === 'bigint')
    return { kind: 'numeric', value: input }
  return input
}

/**
 * Exact decimal text of a number written in exponent notation, built by
 * moving the point through the digits: `1.23456789e-7` is `0.000000123456789`.
 * Returns the text unchanged when it is not `<digits>[.<digits>]e<exponent>`.
 */
function expandExponent(text: string): string {
  const match = text.match(/^(\d+)(?:\.(\d+))?e([+-]\d+)$/i)
  if (!match)
    return text

  const [, integer, fraction = '', exponent] = match
  const digits = `${integer}${fraction}`
  const point = integer.length + Number.parseInt(exponent, 10)

  if (point <= 0)
    return `0.${'0'.repeat(-point)}${digits}`
  if (point >= digits.length)
    return digits.padEnd(point, '0')
  return `${digits.slice(0, point)}.${digits.slice(point)}`
}

/**
 * Decimal text of a numeric literal. Whatever is not plain digits (a sign,
 * `NaN`, `Infinity`) is rejected later by the classifier.
 */
function numericText(value: number | bigint): string {
  if (typeof value === 'bigint' || !Number.isFinite(value))
    return String(value)

  return expandExponent(String(value))
}

export function literalText(literal: VersionLiteral): string {
  return literal.kind === 'numeric' ? numericText(literal.value) : literal.value
}

function countDots(text: string): number {
  let dots = 0
  for (const char of text) {
    if (char === '.')
      dots++
  }
  return dots
}

/**
 * Decide which grammar a literal follows and locate its alpha marker.
 *
 * A literal is `DirectDotted` when it starts with `v`/`V` or has two or more
 * dots; everything else is `DecimalGrouped`.
 */
export function classify(literal: VersionLiteral): Classification {
  const text = literalText(literal)
  const malformed = (reason: string) => new MalformedVersionLiteralError(text, reason)

  if (text.length === 0)
    throw malformed('no digits')

  const leadingV = text.startsWith('v') || text.startsWith('V')
  const residual = leadingV ? text.slice(1) : text

  if (/[vV]/.test(residual))
    throw malformed('"v" is only allowed at the start')

  const unexpected = residual.match(/[^\d._]/)
  if (unexpected)
    throw malformed(`unexpected character "${unexpected[0]}"`)

  if (!/\d/.test(residual))
    throw malformed('no digits')

  if (residual.split('.').includes(''))
    throw malformed('"." must have digits on both sides')

  const dots = countDots(residual)
  const grammar: Grammar = leadingV || dots >= 2 ? 'DirectDotted' : 'DecimalGrouped'

  const alphaIndex = residual.indexOf('_')
  if (alphaIndex !== residual.lastIndexOf('_'))
    throw malformed('more than one alpha marker "_"')

  if (alphaIndex !== -1) {
    if (alphaIndex < residual.lastIndexOf('.'))
      throw malformed('the alpha marker "_" is only allowed in the final segment')
    if (grammar === 'DecimalGrouped' && dots === 0)
      throw malformed('the alpha marker "_" is only allowed in the fractional part')
    if (!/\d/.test(residual.charAt(alphaIndex - 1)) || !/\d/.test(residual.charAt(alphaIndex + 1)))
      throw malformed('the alpha marker "_" must have digits on both sides')
  }

  return {
    grammar,
    leadingV,
    alphaIndex: alphaIndex === -1 ? null : alphaIndex,
    residual,
    text,
  }
}
