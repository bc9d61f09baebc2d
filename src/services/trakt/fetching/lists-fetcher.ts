import type { TraktList } from '@root/types/trakt.types.js'
import { isListNotFoundError } from '@utils/trakt/errors.js'
import type { Logger } from 'pino'

export type ListGetter = (listId: string) => Promise<TraktList>

/**
 * Fetches several lists concurrently.
 *
 * Lists that no longer exist are left out of the result, which keeps the
 * order of `listIds` otherwise. Any other failure rejects the whole call with
 * the first error seen; requests still in flight run to completion and their
 * results are dropped.
 *
 * @param listIds - Slugs of the lists to fetch
 * @param getList - Fetches a single list, typically bound to a session
 * @param log - Logger instance
 */
export const fetchLists = async (
  listIds: readonly string[],
  getList: ListGetter,
  log: Logger,
): Promise<TraktList[]> => {
  const lists = await Promise.all(
    listIds.map(async (listId) => {
      try {
        return await getList(listId)
      } catch (error) {
        if (isListNotFoundError(error)) {
          log.debug(
            { error },
            'silencing not found error while fetching trakt lists',
          )
          return null
        }
        throw error
      }
    }),
  )

  return lists.filter((list): list is TraktList => list !== null)
}
