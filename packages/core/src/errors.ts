/**
 * Error Types
 *
 * Malformed user input never raises: the prompt loops re-ask instead.
 * These errors mark programming or environment defects, plus the
 * interrupt that ends a session early.
 */

/**
 * Thrown when an empty animal name or question text reaches the tree model.
 */
export class InvalidInputError extends Error {
  constructor(
    public readonly field: 'animal' | 'question',
    message = `${field === 'animal' ? 'Animal name' : 'Question text'} must not be empty`
  ) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

/**
 * Thrown when a tree operation is called on a shape it does not apply to,
 * e.g. replacing a node that is not a child of the given question.
 */
export class PreconditionFailedError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PreconditionFailedError'
  }
}

/**
 * Thrown when the persisted tree cannot be read or written.
 */
export class PersistenceUnavailableError extends Error {
  constructor(
    public readonly path: string,
    public readonly operation: 'load' | 'save',
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Could not ${operation} game data at ${path}${detail}`, { cause })
    this.name = 'PersistenceUnavailableError'
  }
}

/**
 * Thrown by a prompter when the player interrupts (Ctrl-C) or input ends.
 */
export class InterruptedError extends Error {
  constructor(public readonly reason: 'interrupt' | 'end-of-input' = 'interrupt') {
    super(reason === 'interrupt' ? 'Interrupted by user' : 'Input closed')
    this.name = 'InterruptedError'
  }
}
