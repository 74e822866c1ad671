export type DotverErrorCode = 'MALFORMED_VERSION_LITERAL' | 'UNSUPPORTED_COERCION' | 'INVALID_ARGUMENT'

export class DotverError extends Error {
  readonly code: DotverErrorCode

  constructor(code: DotverErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Thrown by `parse` and `declare` when a literal matches neither grammar
 */
export class MalformedVersionLiteralError extends DotverError {
  readonly literal: string
  readonly reason: string

  constructor(literal: string, reason: string) {
    super('MALFORMED_VERSION_LITERAL', `Invalid version literal "${literal}": ${reason}`)
    this.literal = literal
    this.reason = reason
  }
}

export class UnsupportedCoercionError extends DotverError {
  readonly received: string

  constructor(received: string) {
    super('UNSUPPORTED_COERCION', `Cannot compare a version with a value of type ${received}`)
    this.received = received
  }
}

/**
 * A CLI option or config value outside its allowed set
 */
export class InvalidArgumentError extends DotverError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message)
  }
}

export function isMalformedVersionLiteral(error: unknown): error is MalformedVersionLiteralError {
  return error instanceof MalformedVersionLiteralError
}
