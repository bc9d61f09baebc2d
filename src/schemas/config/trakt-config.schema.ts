import { SYNC_MODES } from '@root/types/trakt.types.js'
import { z } from 'zod'

export const DEFAULT_API_BASE_URL = 'https://api.trakt.tv'
export const DEFAULT_BROWSER_BASE_URL = 'https://trakt.tv'

const BaseUrlSchema = z.url().transform((value) => value.replace(/\/+$/, ''))

/**
 * Credentials and behaviour of a single client instance.
 * The sync mode is checked here so an unknown value fails before any request is sent.
 */
export const TraktConfigSchema = z.object({
  clientId: z.string().min(1, 'clientId is required'),
  clientSecret: z.string().min(1, 'clientSecret is required'),
  email: z.string().min(1, 'email is required'),
  password: z.string().min(1, 'password is required'),
  syncMode: z.enum(SYNC_MODES, {
    error: () => `syncMode must be one of ${SYNC_MODES.join(', ')}`,
  }),
  apiBaseUrl: BaseUrlSchema.default(DEFAULT_API_BASE_URL),
  browserBaseUrl: BaseUrlSchema.default(DEFAULT_BROWSER_BASE_URL),
})

export type TraktConfigInput = z.input<typeof TraktConfigSchema>
export type TraktConfig = z.infer<typeof TraktConfigSchema>
