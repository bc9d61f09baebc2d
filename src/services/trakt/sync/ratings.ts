import {
  type SyncResult,
  type TraktItem,
  TraktItemsSchema,
} from '@schemas/trakt/trakt.schema.js'
import type { MutationOutcome } from '@root/types/trakt.types.js'
import { TRAKT_PATHS } from '@utils/trakt/constants.js'
import { apiRequest, readJson, type TraktContext } from '../api/helpers.js'
import { type ItemCollection, syncItems } from './item-sync.js'

const RATINGS: ItemCollection = {
  label: 'ratings',
  addEndpoint: () => TRAKT_PATHS.ratings,
  removeEndpoint: () => TRAKT_PATHS.ratingsRemove,
}

/**
 * Every rating on the account. Items carry `rating` and `rated_at`, which
 * {@link addRatings} sends back unchanged.
 */
export async function getRatings(ctx: TraktContext): Promise<TraktItem[]> {
  const response = await apiRequest(ctx, 'GET', TRAKT_PATHS.ratings)
  return readJson(response, TraktItemsSchema, 'ratings')
}

export function addRatings(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'add', RATINGS, items)
}

export function removeRatings(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'remove', RATINGS, items)
}
