import { HttpError, NetworkError, RequestCancelledError, RequestTimeoutError } from './errors'

/**
 * Options for a single request
 */
export interface RequestOptions {
  /** Request timeout in milliseconds */
  readonly timeoutMs?: number
  /** Request headers */
  readonly headers?: Record<string, string>
  /** Query string parameters appended to the URL */
  readonly query?: Record<string, string | number | boolean>
  /** Cancels the request, body included, before its timeout */
  readonly signal?: AbortSignal
}

/**
 * Minimal HTTP surface the providers and pollers need.
 * Every call is a single bounded attempt; retrying is the caller's schedule.
 */
export interface HttpClient {
  getJson(url: string, options?: RequestOptions): Promise<unknown>
  getText(url: string, options?: RequestOptions): Promise<string>
}

export const DEFAULT_TIMEOUT_MS = 10000

export const USER_AGENT = 'hashboard/0.1'

/**
 * Append query parameters to a URL
 */
export function buildUrl(url: string, query?: RequestOptions['query']): string {
  if (!query) return url

  const target = new URL(url)
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value))
  }
  return target.toString()
}

function causeCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined
  const cause: unknown = error.cause
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return undefined
}

/**
 * HTTP client on the runtime's fetch. The timeout and the caller's signal
 * cover the whole exchange, reading the body included.
 */
export class FetchHttpClient implements HttpClient {
  constructor(private readonly defaultTimeoutMs = DEFAULT_TIMEOUT_MS) {}

  getJson(url: string, options?: RequestOptions): Promise<unknown> {
    // Malformed JSON surfaces as SyntaxError, classified as a protocol failure
    return this.request(url, options, (response): Promise<unknown> => response.json())
  }

  getText(url: string, options?: RequestOptions): Promise<string> {
    return this.request(url, options, response => response.text())
  }

  private async request<T>(
    url: string,
    options: RequestOptions | undefined,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const target = buildUrl(url, options?.query)
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeoutMs
    const cancel = options?.signal
    const timeout = AbortSignal.timeout(timeoutMs)

    try {
      const response = await fetch(target, {
        method: 'GET',
        headers: { 'User-Agent': USER_AGENT, ...options?.headers },
        signal: cancel ? AbortSignal.any([cancel, timeout]) : timeout
      })

      if (!response.ok) {
        // Drain the body so the connection can be reused
        await response.text().catch(() => '')
        throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, target)
      }

      return await read(response)
    } catch (error) {
      throw translateError(error, target, timeoutMs, cancel)
    }
  }
}

function translateError(error: unknown, target: string, timeoutMs: number, cancel?: AbortSignal): Error {
  if (error instanceof HttpError || error instanceof SyntaxError) {
    return error
  }
  if (cancel?.aborted) {
    return new RequestCancelledError(target)
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new RequestTimeoutError(target, timeoutMs)
  }
  return new NetworkError(
    error instanceof Error ? error.message : String(error),
    causeCode(error)
  )
}
