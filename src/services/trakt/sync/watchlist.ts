import {
  type SyncResult,
  type TraktItem,
  TraktItemsSchema,
} from '@schemas/trakt/trakt.schema.js'
import type { MutationOutcome, TraktList } from '@root/types/trakt.types.js'
import { TRAKT_PATHS, WATCHLIST_SLUG } from '@utils/trakt/constants.js'
import { apiRequest, readJson, type TraktContext } from '../api/helpers.js'
import { type ItemCollection, syncItems } from './item-sync.js'

const WATCHLIST: ItemCollection = {
  label: 'watchlist',
  addEndpoint: () => TRAKT_PATHS.watchlist,
  removeEndpoint: () => TRAKT_PATHS.watchlistRemove,
}

export async function getWatchlist(ctx: TraktContext): Promise<TraktList> {
  const response = await apiRequest(ctx, 'GET', TRAKT_PATHS.watchlist)
  const items = await readJson(response, TraktItemsSchema, 'watchlist')
  return { ids: { slug: WATCHLIST_SLUG }, isWatchlist: true, items }
}

export function addWatchlistItems(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'add', WATCHLIST, items)
}

export function removeWatchlistItems(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'remove', WATCHLIST, items)
}
