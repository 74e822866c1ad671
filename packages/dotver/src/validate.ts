import type { LiteralInput } from './types.js'
import { literalText, toLiteral } from './classifier.js'
import { isMalformedVersionLiteral } from './errors.js'
import { ignoreWarning } from './utils.js'
import { parse } from './version.js'

const STRICT_DECIMAL = /^(?:0|[1-9]\d*)(?:\.\d+)?$/
const STRICT_DOTTED = /^v(?:0|[1-9]\d*)(?:\.\d{1,3}){2,}$/

/**
 * Whether `parse` accepts the literal
 */
export function isLax(input: LiteralInput): boolean {
  try {
    parse(input, { onWarning: ignoreWarning })
    return true
  }
  catch (error) {
    if (isMalformedVersionLiteral(error))
      return false
    throw error
  }
}

/**
 * Whether the literal is in one of the two unambiguous spellings: a plain
 * decimal without leading zeros, or `v` followed by three or more components
 * where every component after the first has at most three digits. Alpha
 * literals are never strict.
 */
export function isStrict(input: LiteralInput): boolean {
  const text = literalText(toLiteral(input))
  return STRICT_DECIMAL.test(text) || STRICT_DOTTED.test(text)
}
