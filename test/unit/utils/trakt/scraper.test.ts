import { AUTH_SELECTORS } from '@utils/trakt/constants.js'
import { ScrapeError } from '@utils/trakt/errors.js'
import { scrapeAttribute } from '@utils/trakt/scraper.js'
import { describe, expect, it } from 'vitest'
import {
  activatePage,
  authorizedPage,
  authorizePage,
  signInPage,
} from '../../../mocks/trakt-pages.js'

describe('trakt/scraper', () => {
  it('should read the sign-in form token', () => {
    expect(
      scrapeAttribute(signInPage('signin-token'), {
        step: 'BrowseSignIn',
        ...AUTH_SELECTORS.BrowseSignIn,
      }),
    ).toBe('signin-token')
  })

  it('should read the activation form token', () => {
    expect(
      scrapeAttribute(activatePage('activate-token'), {
        step: 'BrowseActivate',
        ...AUTH_SELECTORS.BrowseActivate,
      }),
    ).toBe('activate-token')
  })

  it('should take the token of the first authorization form', () => {
    expect(
      scrapeAttribute(authorizePage('authorize-token'), {
        step: 'SubmitActivate',
        ...AUTH_SELECTORS.SubmitActivate,
      }),
    ).toBe('authorize-token')
  })

  it('should read the avatar link', () => {
    expect(
      scrapeAttribute(authorizedPage('/users/test-user'), {
        step: 'SubmitAuthorize',
        ...AUTH_SELECTORS.SubmitAuthorize,
      }),
    ).toBe('/users/test-user')
  })

  it('should name the step and selector when nothing matches', () => {
    let caught: unknown
    try {
      scrapeAttribute('<html><body></body></html>', {
        step: 'BrowseSignIn',
        ...AUTH_SELECTORS.BrowseSignIn,
      })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ScrapeError)
    expect(caught).toMatchObject({
      step: 'BrowseSignIn',
      selector: '#new_user > input[name=authenticity_token]',
      attribute: 'value',
      message:
        'failure scraping trakt page during BrowseSignIn: no matching node for selector "#new_user > input[name=authenticity_token]" attribute "value"',
    })
  })

  it('should fail when the matched node has no value', () => {
    const html =
      '<form id="new_user"><input name="authenticity_token" value=""></form>'

    expect(() =>
      scrapeAttribute(html, {
        step: 'BrowseSignIn',
        ...AUTH_SELECTORS.BrowseSignIn,
      }),
    ).toThrow(
      'failure scraping trakt page during BrowseSignIn: attribute missing on matched node for selector "#new_user > input[name=authenticity_token]" attribute "value"',
    )
  })
})
