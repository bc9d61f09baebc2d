import type {
  TraktItem,
  TraktItemSpec,
  TraktListIds,
} from '@schemas/trakt/trakt.schema.js'

export const SYNC_MODES = ['full', 'add-only', 'dry-run'] as const

/** Gates whether mutating calls are actually sent */
export type SyncMode = (typeof SYNC_MODES)[number]

export type MutationKind = 'add' | 'remove'

/**
 * The device-code sign-in sequence, in execution order.
 */
export const AUTH_STEPS = [
  'RequestDeviceCodes',
  'BrowseSignIn',
  'SubmitSignIn',
  'BrowseActivate',
  'SubmitActivate',
  'SubmitAuthorize',
  'ExchangeToken',
] as const

export type AuthStepName = (typeof AUTH_STEPS)[number]

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export interface RequestFields {
  method: HttpMethod
  baseUrl: string
  endpoint: string
  /** Kept as a string so the identical payload can be replayed on retry */
  body?: string
  headers?: Record<string, string>
}

export interface TraktList {
  ids: TraktListIds
  name?: string
  isWatchlist: boolean
  items: TraktItem[]
}

export type TraktSyncEntry = TraktItemSpec &
  Partial<Pick<TraktItem, 'rating' | 'rated_at' | 'watched_at'>>

/** Add/remove payload accepted by every sync endpoint */
export interface TraktSyncBody {
  movies: TraktSyncEntry[]
  shows: TraktSyncEntry[]
  episodes: TraktSyncEntry[]
}

export interface TraktListAddBody {
  name: string
  description: string
  privacy: 'private' | 'friends' | 'public'
  display_numbers: boolean
  allow_comments: boolean
  sort_by: string
  sort_how: 'asc' | 'desc'
}

/**
 * Receipt of a mutating call. `executed: false` means the sync mode
 * simulated the call and nothing was sent.
 */
export type MutationOutcome<T> =
  | { executed: false }
  | { executed: true; result: T }

export type HistoryItemType = 'movie' | 'show' | 'episode'
