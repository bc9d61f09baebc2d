import type { TraktConfig } from '@schemas/config/trakt-config.schema.js'
import type { HttpMethod } from '@root/types/trakt.types.js'
import {
  TRAKT_API_VERSION,
  TRAKT_HEADERS,
} from '@utils/trakt/constants.js'
import { ApiError, DecodeError } from '@utils/trakt/errors.js'
import type { RequestEngine } from '@utils/trakt/request-engine.js'
import type { TraktSession } from '@utils/trakt/session.js'
import type { Logger } from 'pino'
import type { z } from 'zod'

/**
 * Everything an operation needs to talk to Trakt on behalf of one session.
 */
export interface TraktContext {
  engine: RequestEngine
  session: TraktSession
  config: TraktConfig
  log: Logger
}

export interface ApiRequestOptions {
  /** JSON-serialized as the request body */
  payload?: unknown
  /** Hand a 404 back to the caller instead of raising an {@link ApiError} */
  allowNotFound?: boolean
}

/**
 * Headers sent on every API call. The bearer token is added once the session holds one.
 */
export function apiHeaders(ctx: TraktContext): Record<string, string> {
  const headers: Record<string, string> = {
    [TRAKT_HEADERS.apiVersion]: TRAKT_API_VERSION,
    [TRAKT_HEADERS.contentType]: 'application/json',
    [TRAKT_HEADERS.apiKey]: ctx.config.clientId,
  }
  const token = ctx.session.accessToken
  if (token) {
    headers[TRAKT_HEADERS.authorization] = `Bearer ${token}`
  }
  return headers
}

export function formHeaders(): Record<string, string> {
  return {
    [TRAKT_HEADERS.contentType]: 'application/x-www-form-urlencoded',
  }
}

/**
 * Sends a JSON request to the API base URL.
 */
export async function apiRequest(
  ctx: TraktContext,
  method: HttpMethod,
  endpoint: string,
  options: ApiRequestOptions = {},
): Promise<Response> {
  const response = await ctx.engine.execute({
    method,
    baseUrl: ctx.config.apiBaseUrl,
    endpoint,
    body:
      options.payload === undefined
        ? undefined
        : JSON.stringify(options.payload),
    headers: apiHeaders(ctx),
  })

  if (response.status === 404 && !options.allowNotFound) {
    await response.body?.cancel()
    throw new ApiError(
      method,
      `${ctx.config.apiBaseUrl}${endpoint}`,
      404,
      'resource not found',
    )
  }
  return response
}

/**
 * Reads a JSON body and validates it.
 *
 * @param operation - Named in the {@link DecodeError}, e.g. `watchlist`
 * @throws {DecodeError} on malformed JSON or an unexpected shape
 */
export async function readJson<T>(
  response: Response,
  schema: z.ZodType<T>,
  operation: string,
): Promise<T> {
  let raw: unknown
  try {
    raw = await response.json()
  } catch (error) {
    throw new DecodeError(operation, error)
  }

  const result = schema.safeParse(raw)
  if (!result.success) {
    throw new DecodeError(operation, result.error)
  }
  return result.data
}
