import type { AuthStepName } from '@root/types/trakt.types.js'
import { HydrationError } from '@utils/trakt/errors.js'
import type { TraktContext } from '../api/helpers.js'
import {
  browseActivate,
  browseSignIn,
  exchangeToken,
  requestDeviceCodes,
  submitActivate,
  submitAuthorize,
  submitSignIn,
} from './steps.js'

async function runStep<T>(
  ctx: TraktContext,
  step: AuthStepName,
  action: () => Promise<T>,
): Promise<T> {
  ctx.log.debug(`auth step ${step}`)
  try {
    return await action()
  } catch (error) {
    throw new HydrationError(step, error)
  }
}

/**
 * Signs in through the browser pages and the device-code flow, leaving the
 * session with its cookies, the account username and a bearer token.
 *
 * The steps run strictly in order; the first failure aborts the sequence.
 *
 * @throws {HydrationError} naming the step that failed, with the original error as `cause`
 */
export async function hydrateSession(ctx: TraktContext): Promise<void> {
  const codes = await runStep(ctx, 'RequestDeviceCodes', () =>
    requestDeviceCodes(ctx),
  )
  const signInToken = await runStep(ctx, 'BrowseSignIn', () =>
    browseSignIn(ctx),
  )
  await runStep(ctx, 'SubmitSignIn', () => submitSignIn(ctx, signInToken))
  const activateToken = await runStep(ctx, 'BrowseActivate', () =>
    browseActivate(ctx),
  )
  const authorizeToken = await runStep(ctx, 'SubmitActivate', () =>
    submitActivate(ctx, codes.userCode, activateToken),
  )
  const username = await runStep(ctx, 'SubmitAuthorize', () =>
    submitAuthorize(ctx, authorizeToken),
  )
  const tokens = await runStep(ctx, 'ExchangeToken', () =>
    exchangeToken(ctx, codes.deviceCode),
  )

  ctx.session.setUsername(username)
  ctx.session.setAccessToken(tokens.accessToken)
  ctx.log.info(`signed in to trakt as ${username}`)
}
