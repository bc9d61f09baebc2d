import type { HttpMethod, RequestFields } from '@root/types/trakt.types.js'
import type { Logger } from 'pino'
import { TRAKT_HEADERS } from './constants.js'
import {
  AccountLimitError,
  ApiError,
  MaxRetriesError,
  RetryAfterParseError,
  TransportError,
} from './errors.js'
import type { TraktSession } from './session.js'

/** Total attempts for one logical request, rate-limit retries included */
export const MAX_ATTEMPTS = 5
export const MAX_REDIRECTS = 10

// https://github.com/trakt/api-help/discussions/350
export const STATUS_ENHANCE_YOUR_CALM = 420
export const STATUS_TOO_MANY_REQUESTS = 429

// 404 is handed back so callers can tell "gone" apart from a failure
const PASS_THROUGH_STATUSES = new Set([200, 201, 204, 404])
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])

// Never forwarded to another origin
const CREDENTIAL_HEADERS = [TRAKT_HEADERS.authorization, TRAKT_HEADERS.apiKey]

export type Sleep = (ms: number) => Promise<void>

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms))

export interface RequestEngineOptions {
  session: TraktSession
  log: Logger
  /** Used for the Retry-After wait; injectable so tests do not block */
  sleep?: Sleep
  maxAttempts?: number
}

interface SentRequest {
  response: Response
  method: HttpMethod
  url: string
}

/**
 * Parses a Retry-After header holding whole seconds.
 *
 * @returns the number of seconds, or `null` when the header is absent or not a non-negative integer
 */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null) return null
  const trimmed = value.trim()
  if (!/^\d+$/.test(trimmed)) return null
  return Number(trimmed)
}

async function drain(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel()
  }
}

/**
 * Sends requests on behalf of a {@link TraktSession}: attaches and collects
 * cookies, follows redirects itself so cookies set along the way are kept,
 * and classifies the final status.
 */
export class RequestEngine {
  private readonly session: TraktSession
  private readonly log: Logger
  private readonly sleep: Sleep
  private readonly maxAttempts: number

  constructor(options: RequestEngineOptions) {
    this.session = options.session
    this.log = options.log
    this.sleep = options.sleep ?? defaultSleep
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS
  }

  /**
   * Executes a request, retrying on 429 after the advertised Retry-After.
   *
   * @returns the response for 200, 201, 204 and 404; its body is left for the caller
   * @throws {AccountLimitError} on 420, never retried
   * @throws {RetryAfterParseError} when a 429 carries no usable Retry-After
   * @throws {MaxRetriesError} when every attempt was rate limited
   * @throws {ApiError} on any other status
   * @throws {TransportError} when no response was received
   */
  async execute(fields: RequestFields): Promise<Response> {
    const url = `${fields.baseUrl}${fields.endpoint}`

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const sent = await this.send(
        fields.method,
        url,
        fields.body,
        fields.headers,
      )
      const { response } = sent

      if (PASS_THROUGH_STATUSES.has(response.status)) {
        return response
      }

      await drain(response)

      if (response.status === STATUS_ENHANCE_YOUR_CALM) {
        throw new AccountLimitError(sent.method, sent.url, response.status)
      }

      if (response.status === STATUS_TOO_MANY_REQUESTS) {
        const retryAfterHeader = response.headers.get('Retry-After')
        const retryAfter = parseRetryAfter(retryAfterHeader)
        if (retryAfter === null) {
          throw new RetryAfterParseError(
            sent.method,
            sent.url,
            retryAfterHeader,
          )
        }
        if (attempt === this.maxAttempts) break
        this.log.warn(
          `trakt rate limit reached, waiting for ${retryAfter}s then retrying http request ${sent.method} ${sent.url} (attempt ${attempt}/${this.maxAttempts})`,
        )
        await this.sleep(retryAfter * 1000)
        continue
      }

      throw new ApiError(
        sent.method,
        sent.url,
        response.status,
        `unexpected status code ${response.status}`,
      )
    }

    throw new MaxRetriesError(fields.method, url, this.maxAttempts)
  }

  private async send(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    headers: Record<string, string> | undefined,
  ): Promise<SentRequest> {
    let currentMethod = method
    let currentUrl = url
    let currentBody = body
    let currentHeaders = headers

    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.fetchOnce(
        currentMethod,
        currentUrl,
        currentBody,
        currentHeaders,
      )
      const location = response.headers.get('Location')
      if (!REDIRECT_STATUSES.has(response.status) || !location) {
        return { response, method: currentMethod, url: currentUrl }
      }

      await drain(response)
      this.log.debug(
        `following ${response.status} redirect from ${currentUrl} to ${location}`,
      )
      const target = new URL(location, currentUrl)
      if (target.origin !== new URL(currentUrl).origin) {
        currentHeaders = withoutHeaders(currentHeaders, CREDENTIAL_HEADERS)
      }
      currentUrl = target.toString()
      // Browsers replay method and body only for 307/308
      if (response.status !== 307 && response.status !== 308) {
        currentMethod = 'GET'
        currentBody = undefined
        currentHeaders = withoutHeaders(currentHeaders, [
          TRAKT_HEADERS.contentType,
        ])
      }
    }

    throw new ApiError(
      method,
      url,
      0,
      `exceeded ${MAX_REDIRECTS} redirects, last location ${currentUrl}`,
    )
  }

  private async fetchOnce(
    method: HttpMethod,
    url: string,
    body: string | undefined,
    headers: Record<string, string> | undefined,
  ): Promise<Response> {
    const requestHeaders = new Headers(headers)
    const cookie = await this.session.cookieHeader(url)
    if (cookie) {
      requestHeaders.set('Cookie', cookie)
    }

    this.log.debug(`${method} ${url}`)
    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers: requestHeaders,
        body,
        redirect: 'manual',
      })
    } catch (error) {
      throw new TransportError(method, url, error)
    }

    await this.session.storeCookies(response.headers.getSetCookie(), url)
    return response
  }
}

function withoutHeaders(
  headers: Record<string, string> | undefined,
  names: readonly string[],
): Record<string, string> | undefined {
  if (!headers) return headers
  const dropped = new Set(names.map((name) => name.toLowerCase()))
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => !dropped.has(key.toLowerCase())),
  )
}
