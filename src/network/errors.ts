/**
 * Failure classes the workers log by. None of them is ever allowed to stop
 * the process; each ends up as degraded state in the snapshot.
 */
export type ErrorClass = 'transient' | 'protocol' | 'configuration' | 'unknown'

/**
 * Non-2xx HTTP response
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string
  ) {
    super(message)
    this.name = 'HttpError'
  }
}

/**
 * Request abandoned after its time budget
 */
export class RequestTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
  }
}

/**
 * Request abandoned because its caller cancelled it (shutdown)
 */
export class RequestCancelledError extends Error {
  constructor(public readonly url: string) {
    super(`Request to ${url} cancelled`)
    this.name = 'RequestCancelledError'
  }
}

/**
 * Connection-level failure (refused, reset, DNS)
 */
export class NetworkError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message)
    this.name = 'NetworkError'
  }
}

/**
 * Payload that does not match the provider's expected schema
 */
export class ProtocolError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/**
 * Setting that cannot be honoured (unknown pair, rejected subscription)
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'EAI_AGAIN'
])

/**
 * Map any thrown value onto the failure taxonomy
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof RequestTimeoutError || error instanceof RequestCancelledError) {
    return 'transient'
  }

  if (error instanceof NetworkError) {
    return error.code === undefined || TRANSIENT_CODES.has(error.code) ? 'transient' : 'unknown'
  }

  if (error instanceof HttpError) {
    if (error.status === 429 || error.status >= 500) {
      return 'transient'
    }
    return 'protocol'
  }

  if (error instanceof ProtocolError || error instanceof SyntaxError) {
    return 'protocol'
  }

  if (error instanceof ConfigurationError) {
    return 'configuration'
  }

  return 'unknown'
}

/**
 * One-line description for log context
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}
