import {
  type AuthCodes,
  AuthCodesResponseSchema,
  type AuthTokens,
  AuthTokensResponseSchema,
} from '@schemas/trakt/trakt.schema.js'
import {
  AUTH_SELECTORS,
  FORM_KEYS,
  TRAKT_HEADERS,
  TRAKT_PATHS,
} from '@utils/trakt/constants.js'
import { ScrapeError } from '@utils/trakt/errors.js'
import { scrapeAttribute } from '@utils/trakt/scraper.js'
import {
  apiHeaders,
  formHeaders,
  readJson,
  type TraktContext,
} from '../api/helpers.js'

// Each step is a plain function of the session context and the previous step's
// output, so a failure can be pinned to one page and tested against a fixture.

async function browse(ctx: TraktContext, endpoint: string): Promise<string> {
  const response = await ctx.engine.execute({
    method: 'GET',
    baseUrl: ctx.config.browserBaseUrl,
    endpoint,
  })
  return response.text()
}

async function submitForm(
  ctx: TraktContext,
  endpoint: string,
  fields: Record<string, string>,
): Promise<Response> {
  return ctx.engine.execute({
    method: 'POST',
    baseUrl: ctx.config.browserBaseUrl,
    endpoint,
    body: new URLSearchParams(fields).toString(),
    headers: formHeaders(),
  })
}

/**
 * Requests a device code and the user code to confirm it with.
 */
export async function requestDeviceCodes(
  ctx: TraktContext,
): Promise<AuthCodes> {
  const response = await ctx.engine.execute({
    method: 'POST',
    baseUrl: ctx.config.apiBaseUrl,
    endpoint: TRAKT_PATHS.authCodes,
    body: JSON.stringify({ client_id: ctx.config.clientId }),
    headers: apiHeaders(ctx),
  })
  return readJson(response, AuthCodesResponseSchema, 'auth codes response')
}

/**
 * Opens the sign-in page and returns the authenticity token of its form.
 */
export async function browseSignIn(ctx: TraktContext): Promise<string> {
  const html = await browse(ctx, TRAKT_PATHS.authSignIn)
  return scrapeAttribute(html, {
    step: 'BrowseSignIn',
    ...AUTH_SELECTORS.BrowseSignIn,
  })
}

/**
 * Posts the account credentials. The session cookies set by the response are
 * what every later browser step relies on.
 */
export async function submitSignIn(
  ctx: TraktContext,
  authenticityToken: string,
): Promise<void> {
  const response = await submitForm(ctx, TRAKT_PATHS.authSignIn, {
    [FORM_KEYS.authenticityToken]: authenticityToken,
    [FORM_KEYS.userLogin]: ctx.config.email,
    [FORM_KEYS.userPassword]: ctx.config.password,
    [FORM_KEYS.userRemember]: '1',
  })
  await response.body?.cancel()
}

export async function browseActivate(ctx: TraktContext): Promise<string> {
  const html = await browse(ctx, TRAKT_PATHS.activate)
  return scrapeAttribute(html, {
    step: 'BrowseActivate',
    ...AUTH_SELECTORS.BrowseActivate,
  })
}

/**
 * Enters the user code on the activation page.
 *
 * @returns the token of the authorization form rendered in response
 */
export async function submitActivate(
  ctx: TraktContext,
  userCode: string,
  authenticityToken: string,
): Promise<string> {
  const response = await submitForm(ctx, TRAKT_PATHS.activate, {
    [FORM_KEYS.authenticityToken]: authenticityToken,
    [FORM_KEYS.code]: userCode,
    [FORM_KEYS.commit]: 'Continue',
  })
  return scrapeAttribute(await response.text(), {
    step: 'SubmitActivate',
    ...AUTH_SELECTORS.SubmitActivate,
  })
}

/**
 * Allows the API app and reads the signed-in username from the avatar link,
 * whose href has the form `/users/<username>`.
 */
export async function submitAuthorize(
  ctx: TraktContext,
  authenticityToken: string,
): Promise<string> {
  const response = await submitForm(ctx, TRAKT_PATHS.activateAuthorize, {
    [FORM_KEYS.authenticityToken]: authenticityToken,
    [FORM_KEYS.commit]: 'Yes',
  })
  const target = {
    step: 'SubmitAuthorize',
    ...AUTH_SELECTORS.SubmitAuthorize,
  } as const
  const href = scrapeAttribute(await response.text(), target)

  const segments = href.split('/')
  if (segments.length !== 3 || !segments[2]) {
    throw new ScrapeError(
      target.step,
      target.selector,
      target.attribute,
      `expected a link of three path segments, got "${href}"`,
    )
  }
  return segments[2]
}

/**
 * Trades the now-approved device code for a bearer token.
 */
export async function exchangeToken(
  ctx: TraktContext,
  deviceCode: string,
): Promise<AuthTokens> {
  const response = await ctx.engine.execute({
    method: 'POST',
    baseUrl: ctx.config.apiBaseUrl,
    endpoint: TRAKT_PATHS.authTokens,
    body: JSON.stringify({
      code: deviceCode,
      client_id: ctx.config.clientId,
      client_secret: ctx.config.clientSecret,
    }),
    headers: { [TRAKT_HEADERS.contentType]: 'application/json' },
  })
  return readJson(response, AuthTokensResponseSchema, 'auth tokens response')
}
