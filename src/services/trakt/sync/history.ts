import {
  type SyncResult,
  type TraktItem,
  TraktItemsSchema,
} from '@schemas/trakt/trakt.schema.js'
import type {
  HistoryItemType,
  MutationOutcome,
} from '@root/types/trakt.types.js'
import { HISTORY_PAGE_LIMIT, TRAKT_PATHS } from '@utils/trakt/constants.js'
import { apiRequest, readJson, type TraktContext } from '../api/helpers.js'
import { type ItemCollection, syncItems } from './item-sync.js'

const HISTORY: ItemCollection = {
  label: 'history',
  addEndpoint: () => TRAKT_PATHS.history,
  removeEndpoint: () => TRAKT_PATHS.historyRemove,
}

/**
 * Watch history of a single movie, show or episode. Only the first
 * {@link HISTORY_PAGE_LIMIT} plays are returned.
 *
 * @param id - Trakt id, slug or IMDb id of the item
 */
export async function getHistory(
  ctx: TraktContext,
  type: HistoryItemType,
  id: string,
): Promise<TraktItem[]> {
  const response = await apiRequest(
    ctx,
    'GET',
    TRAKT_PATHS.historyGet(type, id, HISTORY_PAGE_LIMIT),
  )
  return readJson(response, TraktItemsSchema, 'history')
}

export function addHistory(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'add', HISTORY, items)
}

export function removeHistory(
  ctx: TraktContext,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'remove', HISTORY, items)
}
