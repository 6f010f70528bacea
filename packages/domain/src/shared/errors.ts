// ---------------------------------------------------------------------------
// Domain error taxonomy.
//
// Every error raised by the computation core carries a stable machine code so
// the HTTP layer can translate it into a 4xx response without string matching.
// ---------------------------------------------------------------------------

export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'TOTAL_MISMATCH'
  | 'INVALID_STATE'
  | 'NOT_FOUND'
  | 'CONFLICT'

export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/** Bad numeric input, a missing required field, or a rejected policy check. */
export class ValidationError extends DomainError {
  readonly code: DomainErrorCode = 'VALIDATION_ERROR'
}

/**
 * The client-submitted total disagrees with the server-side recomputation by
 * more than the money tolerance.
 */
export class TotalMismatchError extends ValidationError {
  override readonly code: DomainErrorCode = 'TOTAL_MISMATCH'

  constructor(
    readonly calculated: number,
    readonly submitted: number,
  ) {
    super(
      `Invoice total mismatch: calculated ${calculated.toFixed(2)}, submitted ${submitted.toFixed(2)}`,
    )
  }
}

/** The operation is not allowed in the aggregate's current lifecycle state. */
export class StateError extends DomainError {
  readonly code: DomainErrorCode = 'INVALID_STATE'
}

/** A referenced client, trip, invoice or currency does not exist. */
export class NotFoundError extends DomainError {
  readonly code: DomainErrorCode = 'NOT_FOUND'
}

/** Optimistic concurrency check failed: the record changed since it was read. */
export class ConflictError extends DomainError {
  readonly code: DomainErrorCode = 'CONFLICT'
}

export function isDomainError(err: unknown): err is DomainError {
  return err instanceof DomainError
}
