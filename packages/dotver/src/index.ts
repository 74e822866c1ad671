export { classify, literalText, toLiteral } from './classifier.js'
export { coerce, compare, eq, ge, gt, le, lt, maxVersion, minVersion, ne, relate, sortVersions } from './compare.js'
export type { Comparable } from './compare.js'
export { defaultConfig, defineConfig, loadDotverConfig } from './config.js'
export { DotverError, InvalidArgumentError, isMalformedVersionLiteral, MalformedVersionLiteralError, UnsupportedCoercionError } from './errors.js'
export type { DotverErrorCode } from './errors.js'
export { extractComponents } from './extractor.js'
export { isRenderMode, normal, numify, render, stringify } from './format.js'
export * from './types.js'
export { isLax, isStrict } from './validate.js'
export { declare, isAlphaVersion, isQvVersion, parse, qv, Version } from './version.js'
