import {
  type SyncResult,
  type TraktItem,
  TraktItemsSchema,
  type TraktListMetadata,
  TraktListMetadataSchema,
  TraktListsMetadataSchema,
} from '@schemas/trakt/trakt.schema.js'
import type {
  MutationOutcome,
  TraktList,
  TraktListAddBody,
} from '@root/types/trakt.types.js'
import { TRAKT_PATHS } from '@utils/trakt/constants.js'
import { ListNotFoundError } from '@utils/trakt/errors.js'
import { apiRequest, readJson, type TraktContext } from '../api/helpers.js'
import { type ItemCollection, syncItems } from './item-sync.js'
import { runMutation } from './sync-mode.js'

function listCollection(ctx: TraktContext, listId: string): ItemCollection {
  return {
    label: listId,
    addEndpoint: () =>
      TRAKT_PATHS.userListItems(ctx.session.requireUsername(), listId),
    removeEndpoint: () =>
      TRAKT_PATHS.userListItemsRemove(ctx.session.requireUsername(), listId),
  }
}

/**
 * Template for lists created by the client.
 */
export function buildListBody(name: string, now = new Date()): TraktListAddBody {
  return {
    name,
    description: `list auto imported by trakt-sync-client on ${now.toUTCString()}`,
    privacy: 'public',
    display_numbers: false,
    allow_comments: true,
    sort_by: 'rank',
    sort_how: 'asc',
  }
}

/**
 * Fetches the items of one of the signed-in user's lists.
 *
 * @throws {ListNotFoundError} when the list does not exist
 */
export async function getList(
  ctx: TraktContext,
  listId: string,
): Promise<TraktList> {
  const username = ctx.session.requireUsername()
  const endpoint = TRAKT_PATHS.userListItems(username, listId)
  const response = await apiRequest(ctx, 'GET', endpoint, {
    allowNotFound: true,
  })

  if (response.status === 404) {
    await response.body?.cancel()
    throw new ListNotFoundError(
      'GET',
      `${ctx.config.apiBaseUrl}${endpoint}`,
      listId,
    )
  }

  const items = await readJson(response, TraktItemsSchema, `list ${listId}`)
  return { ids: { slug: listId }, isWatchlist: false, items }
}

export function addListItems(
  ctx: TraktContext,
  listId: string,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'add', listCollection(ctx, listId), items)
}

export function removeListItems(
  ctx: TraktContext,
  listId: string,
  items: readonly TraktItem[],
): Promise<MutationOutcome<SyncResult>> {
  return syncItems(ctx, 'remove', listCollection(ctx, listId), items)
}

export async function getListsMetadata(
  ctx: TraktContext,
): Promise<TraktListMetadata[]> {
  const username = ctx.session.requireUsername()
  const response = await apiRequest(ctx, 'GET', TRAKT_PATHS.userLists(username))
  return readJson(response, TraktListsMetadataSchema, 'lists')
}

/**
 * Creates a list under the signed-in user. Counts as an add for the sync mode.
 */
export async function createList(
  ctx: TraktContext,
  listId: string,
  name: string,
): Promise<MutationOutcome<TraktListMetadata>> {
  const body = buildListBody(name)
  return runMutation(
    ctx,
    {
      kind: 'add',
      simulation: `created trakt list ${listId}`,
      details: { list: body },
    },
    async () => {
      const username = ctx.session.requireUsername()
      const response = await apiRequest(
        ctx,
        'POST',
        TRAKT_PATHS.userLists(username),
        { payload: body },
      )
      const list = await readJson(
        response,
        TraktListMetadataSchema,
        `list ${listId} creation`,
      )
      ctx.log.info(`created trakt list ${listId}`)
      return list
    },
  )
}

/**
 * Deletes a list and its items. Counts as a removal for the sync mode.
 */
export async function deleteList(
  ctx: TraktContext,
  listId: string,
): Promise<MutationOutcome<void>> {
  return runMutation(
    ctx,
    { kind: 'remove', simulation: `deleted trakt list ${listId}` },
    async () => {
      const username = ctx.session.requireUsername()
      const response = await apiRequest(
        ctx,
        'DELETE',
        TRAKT_PATHS.userList(username, listId),
      )
      await response.body?.cancel()
      ctx.log.info(`deleted trakt list ${listId}`)
    },
  )
}
