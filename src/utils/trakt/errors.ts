import type { AuthStepName } from '@root/types/trakt.types.js'

/**
 * Base class for every error raised by the client. Keeps the prototype chain
 * intact after down-emit and preserves the stack trace when available.
 */
export class TraktError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

export class ConfigError extends TraktError {
  constructor(public readonly issues: string[]) {
    super(`invalid trakt configuration: ${issues.join('; ')}`)
  }
}

/**
 * The request never produced a response (DNS, connection reset, TLS, ...).
 */
export class TransportError extends TraktError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    cause: unknown,
  ) {
    super(`error sending http request ${method} ${url}`, { cause })
  }
}

/**
 * A terminal, non-retryable HTTP status.
 */
export class ApiError extends TraktError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly status: number,
    public readonly details: string,
  ) {
    super(`trakt api error ${method} ${url} (status ${status}): ${details}`)
  }
}

/** Trakt answers 420 when the account exceeded its item limits. */
export class AccountLimitError extends ApiError {
  constructor(method: string, url: string, status: number) {
    super(
      method,
      url,
      status,
      'trakt account limit exceeded, more info here: https://github.com/trakt/api-help/discussions/350',
    )
  }
}

/**
 * Kept apart from {@link ApiError} so callers can tell a list deleted upstream
 * from any other failure.
 */
export class ListNotFoundError extends TraktError {
  public readonly status = 404

  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly listId: string,
  ) {
    super(`list with id ${listId} could not be found (${method} ${url})`)
  }
}

export class RetryAfterParseError extends TraktError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly value: string | null,
  ) {
    super(
      `failure parsing the value of trakt header Retry-After (${JSON.stringify(value)}) to integer for ${method} ${url}`,
    )
  }
}

export class MaxRetriesError extends TraktError {
  constructor(
    public readonly method: string,
    public readonly url: string,
    public readonly attempts: number,
  ) {
    super(`reached max retry attempts (${attempts}) for ${method} ${url}`)
  }
}

export class ScrapeError extends TraktError {
  constructor(
    public readonly step: AuthStepName,
    public readonly selector: string,
    public readonly attribute: string,
    reason = 'no matching node',
  ) {
    super(
      `failure scraping trakt page during ${step}: ${reason} for selector "${selector}" attribute "${attribute}"`,
    )
  }
}

export class HydrationError extends TraktError {
  constructor(
    public readonly step: AuthStepName,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`failure hydrating trakt client at step ${step}: ${reason}`, {
      cause,
    })
  }
}

export class DecodeError extends TraktError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`failure unmarshalling trakt ${operation}: ${reason}`, { cause })
  }
}

export class SessionStateError extends TraktError {}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError
}

export function isListNotFoundError(
  error: unknown,
): error is ListNotFoundError {
  return error instanceof ListNotFoundError
}
