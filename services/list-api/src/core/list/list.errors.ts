// services/list-api/src/core/list/list.errors.ts

export type ListErrorCode = 'validation' | 'persistence' | 'precondition'

export type ListErrorShape = {
  code: ListErrorCode | 'internal'
  message: string
  retryable?: boolean
}

export class ListError extends Error {
  readonly code: ListErrorCode
  readonly retryable: boolean

  constructor(code: ListErrorCode, message: string, opts: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.name = new.target.name
    this.code = code
    this.retryable = opts.retryable ?? false
  }
}

/** Required input missing or malformed. Nothing was mutated. */
export class ValidationError extends ListError {
  constructor(message: string) {
    super('validation', message)
  }
}

/**
 * Remote load or save failed. In-memory state is kept, so memory and the
 * remote store may differ until the next successful save.
 */
export class PersistenceError extends ListError {
  readonly operation: 'load' | 'save'

  constructor(operation: 'load' | 'save', cause: unknown) {
    super('persistence', `${operation} failed: ${messageOf(cause)}`, { retryable: true, cause })
    this.operation = operation
  }
}

/** Operation called before initialize(). */
export class PreconditionError extends ListError {
  constructor(operation: string) {
    super('precondition', `${operation} requires an initialized list; call initialize() first`)
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function toErrorShape(err: unknown): ListErrorShape {
  if (err instanceof ListError) {
    return {
      code: err.code,
      message: err.message,
      retryable: err.retryable || undefined,
    }
  }
  return { code: 'internal', message: messageOf(err) }
}
