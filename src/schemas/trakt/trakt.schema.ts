import { z } from 'zod'

export const TraktIdsSchema = z.object({
  trakt: z.number().int().optional(),
  slug: z.string().nullish(),
  imdb: z.string().nullish(),
  tmdb: z.number().int().nullish(),
  tvdb: z.number().int().nullish(),
})

export const TraktItemSpecSchema = z.object({
  title: z.string().nullish(),
  year: z.number().int().nullish(),
  season: z.number().int().optional(),
  number: z.number().int().optional(),
  ids: TraktIdsSchema,
})

// Per-item metadata Trakt attaches next to the media object
const itemMetaShape = {
  id: z.number().int().optional(),
  rank: z.number().int().optional(),
  rating: z.number().int().min(1).max(10).optional(),
  rated_at: z.string().optional(),
  watched_at: z.string().optional(),
  listed_at: z.string().optional(),
}

export const TraktMovieItemSchema = z.object({
  ...itemMetaShape,
  type: z.literal('movie'),
  movie: TraktItemSpecSchema,
})

export const TraktShowItemSchema = z.object({
  ...itemMetaShape,
  type: z.literal('show'),
  show: TraktItemSpecSchema,
})

export const TraktEpisodeItemSchema = z.object({
  ...itemMetaShape,
  type: z.literal('episode'),
  episode: TraktItemSpecSchema,
  show: TraktItemSpecSchema.optional(),
})

export const TraktItemSchema = z.discriminatedUnion('type', [
  TraktMovieItemSchema,
  TraktShowItemSchema,
  TraktEpisodeItemSchema,
])

export const SUPPORTED_ITEM_TYPES = ['movie', 'show', 'episode'] as const

function isSupportedEntry(entry: unknown): boolean {
  return (
    typeof entry === 'object' &&
    entry !== null &&
    'type' in entry &&
    SUPPORTED_ITEM_TYPES.some((type) => type === entry.type)
  )
}

// Lists may also hold seasons and people, which the sync endpoints never take
export const TraktItemsSchema = z
  .array(z.unknown())
  .transform((entries) => entries.filter(isSupportedEntry))
  .pipe(z.array(TraktItemSchema))

export const TraktListIdsSchema = z.object({
  trakt: z.number().int().optional(),
  slug: z.string().min(1),
})

export const TraktListMetadataSchema = z
  .object({
    name: z.string(),
    description: z.string().nullish(),
    privacy: z.string().optional(),
    item_count: z.number().int().optional(),
    ids: TraktListIdsSchema,
  })
  .transform((list) => ({
    name: list.name,
    description: list.description ?? undefined,
    privacy: list.privacy,
    itemCount: list.item_count,
    ids: list.ids,
  }))

export const TraktListsMetadataSchema = z.array(TraktListMetadataSchema)

const SyncCountsSchema = z
  .object({
    movies: z.number().int().nonnegative().default(0),
    shows: z.number().int().nonnegative().default(0),
    seasons: z.number().int().nonnegative().default(0),
    episodes: z.number().int().nonnegative().default(0),
  })
  .default({ movies: 0, shows: 0, seasons: 0, episodes: 0 })

// not_found lists the unmatched entries themselves rather than counts
const NotFoundSchema = z
  .object({
    movies: z.array(z.unknown()).default([]),
    shows: z.array(z.unknown()).default([]),
    seasons: z.array(z.unknown()).default([]),
    episodes: z.array(z.unknown()).default([]),
  })
  .default({ movies: [], shows: [], seasons: [], episodes: [] })
  .transform((notFound) => ({
    movies: notFound.movies.length,
    shows: notFound.shows.length,
    seasons: notFound.seasons.length,
    episodes: notFound.episodes.length,
  }))

export const SyncResponseSchema = z
  .object({
    added: SyncCountsSchema,
    deleted: SyncCountsSchema,
    existing: SyncCountsSchema,
    not_found: NotFoundSchema,
  })
  .transform((response) =>
    Object.freeze({
      added: Object.freeze(response.added),
      deleted: Object.freeze(response.deleted),
      existing: Object.freeze(response.existing),
      notFound: Object.freeze(response.not_found),
    }),
  )

export const AuthCodesResponseSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_url: z.string().optional(),
    expires_in: z.number().int().optional(),
    interval: z.number().int().optional(),
  })
  .transform((codes) => ({
    deviceCode: codes.device_code,
    userCode: codes.user_code,
    verificationUrl: codes.verification_url,
    expiresIn: codes.expires_in,
    interval: codes.interval,
  }))

export const AuthTokensResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().int().optional(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
    created_at: z.number().int().optional(),
  })
  .transform((tokens) => ({
    accessToken: tokens.access_token,
    tokenType: tokens.token_type,
    expiresIn: tokens.expires_in,
    refreshToken: tokens.refresh_token,
    scope: tokens.scope,
    createdAt: tokens.created_at,
  }))

export type TraktItemSpec = z.infer<typeof TraktItemSpecSchema>
export type TraktItem = z.infer<typeof TraktItemSchema>
export type TraktListIds = z.infer<typeof TraktListIdsSchema>
export type TraktListMetadata = z.infer<typeof TraktListMetadataSchema>
export type SyncResult = z.infer<typeof SyncResponseSchema>
export type AuthCodes = z.infer<typeof AuthCodesResponseSchema>
export type AuthTokens = z.infer<typeof AuthTokensResponseSchema>
