import type { SyncMode } from '@root/types/trakt.types.js'
import type { TraktContext } from '@services/trakt/api/helpers.js'
import { parseConfig } from '@utils/config.js'
import { RequestEngine, type Sleep } from '@utils/trakt/request-engine.js'
import { TraktSession } from '@utils/trakt/session.js'
import type { HttpHandler } from 'msw'
import { vi } from 'vitest'
import { createMockLogger } from '../mocks/logger.js'
import { TEST_ACCESS_TOKEN, TEST_CONFIG } from '../mocks/trakt-api-handlers.js'
import { server } from '../setup/msw-setup.js'

export interface TestContextOptions {
  syncMode?: SyncMode
  /** Leave the session signed out */
  anonymous?: boolean
  sleep?: Sleep
}

/**
 * Builds a context whose session is already signed in as `test-user`.
 */
export function createTestContext(
  options: TestContextOptions = {},
): TraktContext {
  const log = createMockLogger()
  const session = new TraktSession()
  if (!options.anonymous) {
    session.setUsername('test-user')
    session.setAccessToken(TEST_ACCESS_TOKEN)
  }
  const engine = new RequestEngine({
    session,
    log,
    sleep: options.sleep ?? vi.fn(async () => {}),
  })
  const config = parseConfig({ ...TEST_CONFIG, syncMode: options.syncMode ?? 'full' })
  return { engine, session, config, log }
}

/**
 * Registers handlers and records every request that reaches them as
 * `METHOD path`, query string included.
 */
export function useRecordedHandlers(...handlers: HttpHandler[]): string[] {
  const requests: string[] = []
  server.events.removeAllListeners('request:start')
  server.events.on('request:start', ({ request }) => {
    const url = new URL(request.url)
    requests.push(`${request.method} ${url.pathname}${url.search}`)
  })
  server.use(...handlers)
  return requests
}
