/**
 * Typed error class for Bearing operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'DATA_INTEGRITY'
  | 'INVALID_TRANSITION'
  | 'NOTIFY_ERROR'

export class BearingError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'BearingError'
    this.code = code
  }

  static notFound(entity: string, id: string): BearingError {
    return new BearingError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): BearingError {
    return new BearingError('VALIDATION_ERROR', message)
  }

  static db(message: string): BearingError {
    return new BearingError('DB_ERROR', message)
  }

  /** A stored row carries a value outside its closed set. */
  static integrity(message: string): BearingError {
    return new BearingError('DATA_INTEGRITY', message)
  }

  static transition(message: string): BearingError {
    return new BearingError('INVALID_TRANSITION', message)
  }

  static notify(message: string): BearingError {
    return new BearingError('NOTIFY_ERROR', message)
  }
}

/** Error message from an unknown thrown value. */
export function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
