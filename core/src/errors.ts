/**
 * Ledger error hierarchy.
 *
 * Every failure raised by the ledger is a `LedgerError` carrying the kind of
 * failure and a machine-readable code, so callers can branch on `kind`
 * without parsing messages.
 */

export type LedgerErrorKind =
  | 'PreconditionViolation'
  | 'AuthorizationFailure'
  | 'StateConflict'
  | 'ExternalResolutionFailure'
  | 'PaymentMismatch'

export type LedgerErrorCode =
  // Precondition violations
  | 'NULL_ADDRESS'
  | 'INVALID_ADDRESS'
  | 'INVALID_AMOUNT'
  | 'INVALID_PRICE'
  | 'INVALID_ACHIEVEMENT_ID'
  | 'INVALID_TOKEN_ID'
  | 'INVALID_SIGNATURE'
  | 'LENGTH_MISMATCH'
  | 'EMPTY_BATCH'
  | 'ID_EXHAUSTED'
  | 'PAYEE_NOT_SET'
  | 'VALUE_OVERFLOW'
  | 'OUT_OF_BOUNDS'
  // Authorization failures
  | 'NOT_ADMINISTRATOR'
  | 'INSUFFICIENT_BALANCE'
  | 'NOT_TOKEN_OWNER'
  // State conflicts
  | 'ALREADY_BOUND'
  | 'NOT_BOUND'
  | 'PERMANENTLY_BOUND'
  | 'SOLD_OUT'
  | 'REENTRANT_CALL'
  // External resolution
  | 'NULL_CONTRACT'
  | 'CALL_FAILED'
  | 'UNDECODABLE_OWNER'
  // Payment
  | 'PRICE_MISMATCH'

export class LedgerError extends Error {
  readonly kind: LedgerErrorKind
  readonly code: LedgerErrorCode

  constructor(kind: LedgerErrorKind, code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
    this.code = code
  }
}

export class PreconditionViolation extends LedgerError {
  constructor(code: LedgerErrorCode, message: string) {
    super('PreconditionViolation', code, message)
  }
}

export class AuthorizationFailure extends LedgerError {
  constructor(code: LedgerErrorCode, message: string) {
    super('AuthorizationFailure', code, message)
  }
}

export class StateConflict extends LedgerError {
  constructor(code: LedgerErrorCode, message: string) {
    super('StateConflict', code, message)
  }
}

/**
 * The ownership of an external token could not be determined. This is never
 * folded into "owner" or "not owner".
 */
export class ExternalResolutionFailure extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, cause?: unknown) {
    super('ExternalResolutionFailure', code, message, cause === undefined ? undefined : { cause })
  }
}

export class PaymentMismatch extends LedgerError {
  readonly expected: bigint
  readonly received: bigint

  constructor(expected: bigint, received: bigint) {
    super('PaymentMismatch', 'PRICE_MISMATCH', `Payment must equal the price: expected ${expected}, got ${received}`)
    this.expected = expected
    this.received = received
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError
}
