import type { TraktItem } from '@schemas/trakt/trakt.schema.js'
import type { TraktSyncBody, TraktSyncEntry } from '@root/types/trakt.types.js'

function itemMeta(
  item: TraktItem,
): Pick<TraktSyncEntry, 'rating' | 'rated_at' | 'watched_at'> {
  const meta: Pick<TraktSyncEntry, 'rating' | 'rated_at' | 'watched_at'> = {}
  if (item.rating !== undefined) meta.rating = item.rating
  if (item.rated_at !== undefined) meta.rated_at = item.rated_at
  if (item.watched_at !== undefined) meta.watched_at = item.watched_at
  return meta
}

/**
 * Groups items by type into the body the sync endpoints take. Each entry is
 * the media object merged with the item's rating and timestamps.
 */
export function mapItemsToSyncBody(items: readonly TraktItem[]): TraktSyncBody {
  const body: TraktSyncBody = { movies: [], shows: [], episodes: [] }
  for (const item of items) {
    switch (item.type) {
      case 'movie':
        body.movies.push({ ...item.movie, ...itemMeta(item) })
        break
      case 'show':
        body.shows.push({ ...item.show, ...itemMeta(item) })
        break
      case 'episode':
        body.episodes.push({ ...item.episode, ...itemMeta(item) })
        break
    }
  }
  return body
}
