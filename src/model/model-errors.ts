/**
 * Raised synchronously, before any mutation, when a caller passes an
 * argument the model cannot accept.
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidArgumentError'
  }
}

export const isInvalidArgumentError = (err: unknown): err is InvalidArgumentError =>
  err instanceof InvalidArgumentError
