/**
 * Minimal trakt.tv pages carrying only the markup the sign-in steps scrape.
 */

export const signInPage = (token: string): string => `<!DOCTYPE html>
<html>
  <body>
    <form id="new_user" action="/auth/signin" method="post">
      <input type="hidden" name="authenticity_token" value="${token}">
      <input type="email" name="user[login]">
      <input type="password" name="user[password]">
    </form>
  </body>
</html>`

export const activatePage = (token: string): string => `<!DOCTYPE html>
<html>
  <body>
    <div id="auth-form-wrapper">
      <form class="form-signin" action="/activate" method="post">
        <input type="hidden" name="authenticity_token" value="${token}">
        <input type="text" name="code">
      </form>
    </div>
  </body>
</html>`

export const authorizePage = (token: string): string => `<!DOCTYPE html>
<html>
  <body>
    <div id="auth-form-wrapper">
      <div class="form-signin less-top">
        <div>
          <form action="/activate/authorize" method="post">
            <input type="hidden" name="authenticity_token" value="${token}">
            <input type="submit" name="commit" value="Yes">
          </form>
          <form action="/activate/authorize" method="post">
            <input type="hidden" name="authenticity_token" value="deny-token">
            <input type="submit" name="commit" value="No">
          </form>
        </div>
      </div>
    </div>
  </body>
</html>`

export const authorizedPage = (avatarHref: string): string => `<!DOCTYPE html>
<html>
  <body>
    <a id="desktop-user-avatar" href="${avatarHref}"><img alt="avatar"></a>
    <p>Woohoo! Your device is now connected.</p>
  </body>
</html>`
