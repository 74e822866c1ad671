/* eslint-disable no-console */
import type { WarningHandler } from './types.js'

/**
 * Console symbols for better output
 */
export const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  question: '?',
}

/**
 * Colorize console output (simple ANSI colors)
 */
export const colors = {
  green: (text: string) => `\x1B[32m${text}\x1B[0m`,
  red: (text: string) => `\x1B[31m${text}\x1B[0m`,
  yellow: (text: string) => `\x1B[33m${text}\x1B[0m`,
  blue: (text: string) => `\x1B[34m${text}\x1B[0m`,
  gray: (text: string) => `\x1B[90m${text}\x1B[0m`,
  bold: (text: string) => `\x1B[1m${text}\x1B[0m`,
  italic: (text: string) => `\x1B[3m${text}\x1B[0m`,
}

/**
 * Default sink for soft parse warnings
 */
export const logWarning: WarningHandler = (message) => {
  console.warn(colors.yellow(`${symbols.warning} ${message}`))
}

export const ignoreWarning: WarningHandler = () => {}

/**
 * Describe a value's runtime type for error messages
 */
export function describeType(value: unknown): string {
  if (value === null)
    return 'null'
  if (Array.isArray(value))
    return 'array'
  return typeof value
}

