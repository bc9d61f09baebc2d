import {
  type SyncResult,
  SyncResponseSchema,
  type TraktItem,
} from '@schemas/trakt/trakt.schema.js'
import type {
  MutationKind,
  MutationOutcome,
} from '@root/types/trakt.types.js'
import { apiRequest, readJson, type TraktContext } from '../api/helpers.js'
import { mapItemsToSyncBody } from './body-mapper.js'
import { runMutation } from './sync-mode.js'

export interface ItemCollection {
  /** Used in log lines and decode errors, e.g. `watchlist` or a list slug */
  label: string
  /** Resolved only when the call is actually sent */
  addEndpoint: () => string
  removeEndpoint: () => string
}

/**
 * Adds or removes items on one collection, subject to the sync mode.
 */
export async function syncItems(
  ctx: TraktContext,
  kind: MutationKind,
  collection: ItemCollection,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  const verb = kind === 'add' ? 'added' : 'deleted'
  return runMutation(
    ctx,
    {
      kind,
      simulation: `${verb} ${items.length} trakt ${collection.label} item(s)`,
      details: { [collection.label]: items },
    },
    async () => {
      const endpoint =
        kind === 'add' ? collection.addEndpoint() : collection.removeEndpoint()
      const response = await apiRequest(ctx, 'POST', endpoint, {
        payload: mapItemsToSyncBody(items),
      })
      const result = await readJson(
        response,
        SyncResponseSchema,
        `${collection.label} sync response`,
      )
      ctx.log.info(
        { [collection.label]: result },
        `synced trakt ${collection.label}`,
      )
      return result
    },
  )
}
