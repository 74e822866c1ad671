export type NumericLiteral = { kind: 'numeric', value: number | bigint }

export type TextLiteral = { kind: 'text', value: string }

/**
 * Raw input to the classifier. Plain strings and numbers are lifted into this
 * union by `toLiteral()` so every input follows the same rule table.
 */
export type VersionLiteral = NumericLiteral | TextLiteral

export type LiteralInput = VersionLiteral | string | number | bigint

export type Grammar = 'DirectDotted' | 'DecimalGrouped'

export interface Classification {
  grammar: Grammar
  /**
   * Whether the literal started with `v` or `V` (already consumed from `residual`)
   */
  leadingV: boolean
  /**
   * Index of the `_` alpha marker within `residual`, or null when absent
   */
  alphaIndex: number | null
  /**
   * Digits and separators left after the leading `v` was removed
   */
  residual: string
  /**
   * The full literal text the classification was made from
   */
  text: string
}

export interface ExtractedComponents {
  components: bigint[]
  isAlpha: boolean
  warnings: string[]
}

export type WarningHandler = (message: string) => void

export interface ParseOptions {
  /**
   * Receives soft warnings, such as a single-component dotted literal.
   * Defaults to a yellow `console.warn`.
   */
  onWarning?: WarningHandler
}

export interface ComponentFlags {
  alpha?: boolean
  qv?: boolean
}

export enum Ordering {
  Less = -1,
  Equal = 0,
  Greater = 1,
}

export type Relation = 'lt' | 'le' | 'gt' | 'ge' | 'eq' | 'ne'

export interface Ordered<T> {
  compare: (other: T) => Ordering
}

export type RenderMode = 'normal' | 'numify' | 'stringify'

export type SortDirection = 'asc' | 'desc'

export interface DotverConfig {
  /**
   * Treat every CLI literal as a dotted-decimal declaration
   */
  declare: boolean
  quiet: boolean
  verbose: boolean
  sortFormat: RenderMode
  sortDirection: SortDirection
}

export type DotverOptions = Partial<DotverConfig>

export enum ExitCode {
  Success = 0,
  InvalidArgument = 1,
  FatalError = 2,
}
