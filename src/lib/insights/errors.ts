import type { ZodIssue } from 'zod'

export type UnavailableReason =
  | 'timeout'
  | 'aborted'
  | 'network'
  | 'rate_limited'
  | 'authentication'
  | 'refused'
  | 'invalid_response'
  | 'unsafe_content'
  | 'upstream_error'

/**
 * The stack or risk scores failed validation. Thrown before any
 * outbound call is made.
 */
export class InvalidInputError extends Error {
  public readonly issues: ZodIssue[]

  constructor(issues: ZodIssue[]) {
    const messages = issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ')
    super(`Invalid risk explanation input: ${messages}`)
    this.name = 'InvalidInputError'
    this.issues = issues
  }
}

/**
 * Required settings are missing or malformed. Raised at startup.
 */
export class ConfigurationError extends Error {
  public readonly missing: string[]

  constructor(message: string, missing: string[] = []) {
    super(message)
    this.name = 'ConfigurationError'
    this.missing = missing
  }
}

/**
 * No explanation could be produced: the provider failed, timed out, or
 * returned data that does not match the response schema.
 */
export class ExplanationUnavailableError extends Error {
  public readonly reason: UnavailableReason
  public readonly status: number | null

  constructor(
    reason: UnavailableReason,
    message: string,
    options: { status?: number | null; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'ExplanationUnavailableError'
    this.reason = reason
    this.status = options.status ?? null
  }
}

export class RateLimitedError extends ExplanationUnavailableError {
  public readonly retryAfterMs: number | null

  constructor(message: string, options: { retryAfterMs?: number | null; cause?: unknown } = {}) {
    super('rate_limited', message, { status: 429, cause: options.cause })
    this.name = 'RateLimitedError'
    this.retryAfterMs = options.retryAfterMs ?? null
  }
}
