import type { Classification, ExtractedComponents } from './types.js'

const GROUP_WIDTH = 3

function extractDotted(classification: Classification): ExtractedComponents {
  // `_` splits like `.`; it only sets the flag
  const segments = classification.residual.split(/[._]/)
  const warnings: string[] = []

  if (segments.length === 1) {
    warnings.push(`Version literal "${classification.text}" has a single component; dotted versions should have at least two dots`)
  }

  return {
    components: segments.map(segment => BigInt(segment)),
    isAlpha: classification.alphaIndex !== null,
    warnings,
  }
}

/**
 * The decimal to dotted grouping transform: `1.0023` becomes `[1, 2, 300]`.
 */
function extractDecimal(classification: Classification): ExtractedComponents {
  const [integer, fraction = ''] = classification.residual.split('.')
  const digits = fraction.replace('_', '')
  const padded = digits.padEnd(Math.ceil(digits.length / GROUP_WIDTH) * GROUP_WIDTH, '0')

  const components = [BigInt(integer)]
  for (let i = 0; i < padded.length; i += GROUP_WIDTH) {
    components.push(BigInt(padded.slice(i, i + GROUP_WIDTH)))
  }

  return {
    components,
    isAlpha: classification.alphaIndex !== null,
    warnings: [],
  }
}

/**
 * Produce the ordered integer components of a classified literal
 */
export function extractComponents(classification: Classification): ExtractedComponents {
  return classification.grammar === 'DirectDotted'
    ? extractDotted(classification)
    : extractDecimal(classification)
}
