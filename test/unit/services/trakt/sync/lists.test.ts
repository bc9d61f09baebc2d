import type { TraktItem } from '@schemas/trakt/trakt.schema.js'
import {
  addListItems,
  buildListBody,
  createList,
  deleteList,
  getList,
  getListsMetadata,
  removeListItems,
} from '@services/trakt/sync/index.js'
import {
  ApiError,
  isApiError,
  ListNotFoundError,
  SessionStateError,
} from '@utils/trakt/errors.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import {
  createTestContext,
  useRecordedHandlers,
} from '../../../../helpers/trakt-context.js'
import { API, syncResponse } from '../../../../mocks/trakt-api-handlers.js'
import { server } from '../../../../setup/msw-setup.js'

const LIST_ITEMS = `${API}/users/test-user/lists/my-list/items`

const movie: TraktItem = {
  type: 'movie',
  movie: { title: 'Test Movie', year: 2021, ids: { trakt: 1 } },
}

const zeroCounts = { movies: 0, shows: 0, seasons: 0, episodes: 0 }

describe('trakt/sync/lists', () => {
  describe('getList', () => {
    it('should return the list items and drop unsupported types', async () => {
      server.use(
        http.get(LIST_ITEMS, () =>
          HttpResponse.json([
            { rank: 1, listed_at: '2024-01-01T00:00:00.000Z', ...movie },
            { rank: 2, type: 'person', person: { name: 'Someone', ids: {} } },
          ]),
        ),
      )
      const ctx = createTestContext()

      const list = await getList(ctx, 'my-list')

      expect(list).toEqual({
        ids: { slug: 'my-list' },
        isWatchlist: false,
        items: [{ rank: 1, listed_at: '2024-01-01T00:00:00.000Z', ...movie }],
      })
    })

    it('should raise a list not found error on 404', async () => {
      server.use(
        http.get(
          `${API}/users/test-user/lists/gone/items`,
          () => new HttpResponse(null, { status: 404 }),
        ),
      )
      const ctx = createTestContext()

      const promise = getList(ctx, 'gone')

      await expect(promise).rejects.toBeInstanceOf(ListNotFoundError)
      await expect(promise).rejects.toMatchObject({
        listId: 'gone',
        status: 404,
        method: 'GET',
        url: `${API}/users/test-user/lists/gone/items`,
      })
      await expect(promise.catch(isApiError)).resolves.toBe(false)
    })

    it('should require a signed-in session', async () => {
      const ctx = createTestContext({ anonymous: true })

      await expect(getList(ctx, 'my-list')).rejects.toBeInstanceOf(
        SessionStateError,
      )
    })
  })

  describe('list items', () => {
    it('should add items and return the decoded result', async () => {
      const bodies: unknown[] = []
      server.use(
        http.post(LIST_ITEMS, async ({ request }) => {
          bodies.push(await request.json())
          return HttpResponse.json(syncResponse({ added: 1 }), { status: 201 })
        }),
      )
      const ctx = createTestContext()

      const outcome = await addListItems(ctx, 'my-list', [movie])

      const result = {
        added: { ...zeroCounts, movies: 1 },
        deleted: zeroCounts,
        existing: zeroCounts,
        notFound: zeroCounts,
      }
      expect(outcome).toEqual({ executed: true, result })
      expect(bodies).toEqual([
        {
          movies: [{ title: 'Test Movie', year: 2021, ids: { trakt: 1 } }],
          shows: [],
          episodes: [],
        },
      ])
      expect(ctx.log.info).toHaveBeenCalledWith(
        { 'my-list': result },
        'synced trakt my-list',
      )
    })

    it('should treat a 404 on a mutation as a generic api error', async () => {
      server.use(
        http.post(
          `${LIST_ITEMS}/remove`,
          () => new HttpResponse(null, { status: 404 }),
        ),
      )
      const ctx = createTestContext()

      const promise = removeListItems(ctx, 'my-list', [movie])

      await expect(promise).rejects.toBeInstanceOf(ApiError)
      await expect(promise).rejects.toMatchObject({
        status: 404,
        details: 'resource not found',
      })
    })

    it('should only log removals in add-only mode', async () => {
      const requests = useRecordedHandlers(
        http.post(`${LIST_ITEMS}/remove`, () =>
          HttpResponse.json(syncResponse({ deleted: 1 })),
        ),
      )
      const ctx = createTestContext({ syncMode: 'add-only' })

      const outcome = await removeListItems(ctx, 'my-list', [movie])

      expect(outcome).toEqual({ executed: false })
      expect(requests).toEqual([])
      expect(ctx.log.info).toHaveBeenCalledWith(
        { 'my-list': [movie] },
        'sync mode add-only would have deleted 1 trakt my-list item(s)',
      )
    })
  })

  describe('simulated mutations', () => {
    it('should not need a signed-in session in dry-run mode', async () => {
      const requests = useRecordedHandlers()
      const ctx = createTestContext({ syncMode: 'dry-run', anonymous: true })

      const outcomes = [
        await addListItems(ctx, 'my-list', [movie]),
        await removeListItems(ctx, 'my-list', [movie]),
        await createList(ctx, 'my-list', 'My List'),
        await deleteList(ctx, 'my-list'),
      ]

      expect(outcomes).toEqual([
        { executed: false },
        { executed: false },
        { executed: false },
        { executed: false },
      ])
      expect(requests).toEqual([])
    })

    it('should still require a session for an executed mutation', async () => {
      const ctx = createTestContext({ anonymous: true })

      await expect(deleteList(ctx, 'my-list')).rejects.toBeInstanceOf(
        SessionStateError,
      )
    })
  })

  describe('getListsMetadata', () => {
    it('should decode the lists of the signed-in user', async () => {
      server.use(
        http.get(`${API}/users/test-user/lists`, () =>
          HttpResponse.json([
            {
              name: 'My List',
              description: null,
              privacy: 'private',
              item_count: 3,
              ids: { trakt: 10, slug: 'my-list' },
            },
          ]),
        ),
      )
      const ctx = createTestContext()

      expect(await getListsMetadata(ctx)).toEqual([
        {
          name: 'My List',
          description: undefined,
          privacy: 'private',
          itemCount: 3,
          ids: { trakt: 10, slug: 'my-list' },
        },
      ])
    })
  })

  describe('buildListBody', () => {
    it('should fill in the list template', () => {
      expect(
        buildListBody('My List', new Date('2024-05-06T07:08:09.000Z')),
      ).toEqual({
        name: 'My List',
        description:
          'list auto imported by trakt-sync-client on Mon, 06 May 2024 07:08:09 GMT',
        privacy: 'public',
        display_numbers: false,
        allow_comments: true,
        sort_by: 'rank',
        sort_how: 'asc',
      })
    })
  })

  describe('createList', () => {
    it('should post the template and decode the created list', async () => {
      const bodies: unknown[] = []
      server.use(
        http.post(`${API}/users/test-user/lists`, async ({ request }) => {
          bodies.push(await request.json())
          return HttpResponse.json(
            {
              name: 'My List',
              privacy: 'public',
              item_count: 0,
              ids: { trakt: 11, slug: 'my-list' },
            },
            { status: 201 },
          )
        }),
      )
      const ctx = createTestContext({ syncMode: 'add-only' })

      const outcome = await createList(ctx, 'my-list', 'My List')

      expect(outcome).toEqual({
        executed: true,
        result: {
          name: 'My List',
          privacy: 'public',
          itemCount: 0,
          ids: { trakt: 11, slug: 'my-list' },
        },
      })
      expect(bodies).toEqual([
        {
          name: 'My List',
          description: expect.stringMatching(
            /^list auto imported by trakt-sync-client on /,
          ),
          privacy: 'public',
          display_numbers: false,
          allow_comments: true,
          sort_by: 'rank',
          sort_how: 'asc',
        },
      ])
    })

    it('should not create lists in dry-run mode', async () => {
      const requests = useRecordedHandlers()
      const ctx = createTestContext({ syncMode: 'dry-run' })

      expect(await createList(ctx, 'my-list', 'My List')).toEqual({
        executed: false,
      })
      expect(requests).toEqual([])
    })
  })

  describe('deleteList', () => {
    it('should delete the list in full mode', async () => {
      const requests = useRecordedHandlers(
        http.delete(
          `${API}/users/test-user/lists/my-list`,
          () => new HttpResponse(null, { status: 204 }),
        ),
      )
      const ctx = createTestContext()

      const outcome = await deleteList(ctx, 'my-list')

      expect(outcome).toEqual({ executed: true, result: undefined })
      expect(requests).toEqual(['DELETE /users/test-user/lists/my-list'])
      expect(ctx.log.info).toHaveBeenCalledWith('deleted trakt list my-list')
    })

    it('should not delete lists in add-only mode', async () => {
      const requests = useRecordedHandlers()
      const ctx = createTestContext({ syncMode: 'add-only' })

      expect(await deleteList(ctx, 'my-list')).toEqual({ executed: false })
      expect(requests).toEqual([])
      expect(ctx.log.info).toHaveBeenCalledWith(
        {},
        'sync mode add-only would have deleted trakt list my-list',
      )
    })
  })
})
