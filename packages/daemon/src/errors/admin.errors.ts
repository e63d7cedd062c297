/**
 * Errors raised by the admin API
 *
 * Access errors and transient failures (a VM vanishing mid-query) are part of
 * normal operation: handlers treat them as "nothing visible".
 */

/**
 * Root of every admin API failure
 */
export class QubesException extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'QubesException'
  }
}

/**
 * The caller lacks permission for the requested call
 */
export class QubesDaemonAccessError extends QubesException {
  constructor(message = 'Got empty response from qubesd. See journalctl in dom0 for details.') {
    super(message)
    this.name = 'QubesDaemonAccessError'
  }
}

/**
 * The caller lacks permission to read a property
 */
export class QubesPropertyAccessError extends QubesDaemonAccessError {
  constructor(public readonly property: string) {
    super(`Failed to access '${property}' property`)
    this.name = 'QubesPropertyAccessError'
  }
}

/**
 * The VM does not exist (anymore)
 */
export class QubesVMNotFoundError extends QubesException {
  constructor(message: string) {
    super(message)
    this.name = 'QubesVMNotFoundError'
  }
}

/**
 * The transport to the admin API failed
 */
export class QubesDaemonCommunicationError extends QubesException {
  constructor(message: string) {
    super(message)
    this.name = 'QubesDaemonCommunicationError'
  }
}

/**
 * Narrow an unknown value to an admin API failure
 */
export const isAdminError = (error: unknown): error is QubesException =>
  error instanceof QubesException

/**
 * Readable message of an unknown failure
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error'
