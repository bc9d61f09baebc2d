import { CookieJar } from 'tough-cookie'
import { SessionStateError } from './errors.js'

/**
 * Browser-like state of one signed-in Trakt user.
 *
 * The cookie jar is appended to by every response. The bearer token and the
 * username are written once during hydration and read-only afterwards;
 * writing the same value again is a no-op so a replayed sign-in converges on
 * the same state.
 */
export class TraktSession {
  private token: string | undefined
  private user: string | undefined

  constructor(readonly cookies: CookieJar = new CookieJar()) {}

  get accessToken(): string | undefined {
    return this.token
  }

  get username(): string | undefined {
    return this.user
  }

  get isAuthenticated(): boolean {
    return this.token !== undefined
  }

  setAccessToken(token: string): void {
    this.token = writeOnce('access token', this.token, token)
  }

  setUsername(username: string): void {
    this.user = writeOnce('username', this.user, username)
  }

  /**
   * Username of the signed-in account, needed by every `/users/{user}` route.
   *
   * @throws {SessionStateError} when called before sign-in completed
   */
  requireUsername(): string {
    if (this.user === undefined) {
      throw new SessionStateError(
        'trakt username is unknown: the session has not been hydrated',
      )
    }
    return this.user
  }

  async cookieHeader(url: string): Promise<string> {
    return this.cookies.getCookieString(url)
  }

  async storeCookies(setCookieHeaders: string[], url: string): Promise<void> {
    for (const header of setCookieHeaders) {
      await this.cookies.setCookie(header, url, { ignoreError: true })
    }
  }
}

function writeOnce(
  label: string,
  current: string | undefined,
  next: string,
): string {
  if (current !== undefined && current !== next) {
    throw new SessionStateError(`trakt session ${label} is already set`)
  }
  return next
}
