import type { AuthStepName } from '@root/types/trakt.types.js'

export const TRAKT_API_VERSION = '2'
export const HISTORY_PAGE_LIMIT = 1000

export const TRAKT_HEADERS = {
  apiKey: 'trakt-api-key',
  apiVersion: 'trakt-api-version',
  authorization: 'Authorization',
  contentType: 'Content-Type',
} as const

export const FORM_KEYS = {
  authenticityToken: 'authenticity_token',
  code: 'code',
  commit: 'commit',
  userLogin: 'user[login]',
  userPassword: 'user[password]',
  userRemember: 'user[remember_me]',
} as const

export const TRAKT_PATHS = {
  activate: '/activate',
  activateAuthorize: '/activate/authorize',
  authCodes: '/oauth/device/code',
  authSignIn: '/auth/signin',
  authTokens: '/oauth/device/token',
  history: '/sync/history',
  historyRemove: '/sync/history/remove',
  ratings: '/sync/ratings',
  ratingsRemove: '/sync/ratings/remove',
  watchlist: '/sync/watchlist',
  watchlistRemove: '/sync/watchlist/remove',
  historyGet: (type: string, id: string, limit: number) =>
    `/sync/history/${encodeURIComponent(type)}s/${encodeURIComponent(id)}?limit=${limit}`,
  userLists: (username: string) =>
    `/users/${encodeURIComponent(username)}/lists`,
  userList: (username: string, listId: string) =>
    `/users/${encodeURIComponent(username)}/lists/${encodeURIComponent(listId)}`,
  userListItems: (username: string, listId: string) =>
    `/users/${encodeURIComponent(username)}/lists/${encodeURIComponent(listId)}/items`,
  userListItemsRemove: (username: string, listId: string) =>
    `/users/${encodeURIComponent(username)}/lists/${encodeURIComponent(listId)}/items/remove`,
} as const

/**
 * DOM paths of the nodes scraped during sign-in. These follow trakt.tv markup
 * and break when the site changes it.
 */
export const AUTH_SELECTORS = {
  BrowseSignIn: {
    selector: '#new_user > input[name=authenticity_token]',
    attribute: 'value',
  },
  BrowseActivate: {
    selector:
      '#auth-form-wrapper > form.form-signin > input[name=authenticity_token]',
    attribute: 'value',
  },
  SubmitActivate: {
    selector:
      '#auth-form-wrapper > div.form-signin.less-top > div > form:nth-child(1) > input[name=authenticity_token]:nth-child(1)',
    attribute: 'value',
  },
  SubmitAuthorize: {
    selector: '#desktop-user-avatar',
    attribute: 'href',
  },
} as const satisfies Partial<
  Record<AuthStepName, { selector: string; attribute: string }>
>

export const WATCHLIST_SLUG = 'watchlist'
