// Custom error types for the timer sync engine
// Each carries a stable `code` so callers can branch without string matching

export type TransportErrorCode = 'NOT_CONNECTED' | 'CLOSED'

/**
 * Thrown by the transport when a message cannot be handed to the socket
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode

  constructor(code: TransportErrorCode, message?: string) {
    super(
      message ??
        (code === 'NOT_CONNECTED'
          ? 'Timer server is not connected'
          : 'Timer server connection has been closed')
    )
    this.name = 'TransportError'
    this.code = code

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError)
    }
  }
}

export type IntentErrorCode = 'MISSING_EVENT_CONTEXT' | 'CONTROL_DISABLED'

/**
 * Raised when a user control cannot be turned into a well-formed message.
 * No message is sent when this happens.
 */
export class IntentError extends Error {
  public readonly code: IntentErrorCode
  public readonly control: string

  constructor(code: IntentErrorCode, control: string, message: string) {
    super(message)
    this.name = 'IntentError'
    this.code = code
    this.control = control

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IntentError)
    }
  }
}

export interface ConfigurationIssue {
  field: string
  message: string
}

/**
 * Thrown when environment configuration fails validation
 */
export class ConfigurationError extends Error {
  public readonly code = 'INVALID_CONFIGURATION'
  public readonly issues: ConfigurationIssue[]

  constructor(issues: ConfigurationIssue[]) {
    super(
      `Invalid configuration: ${issues.map(issue => `${issue.field} ${issue.message}`).join('; ')}`
    )
    this.name = 'ConfigurationError'
    this.issues = issues

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError)
    }
  }
}

export type ControlError = TransportError | IntentError
