/**
 * Trakt Client
 *
 * Signs in to Trakt the way a browser would, then exposes the watchlist,
 * list, rating and history operations on that session. Mutations are gated
 * by the configured sync mode.
 */

import type { TraktConfigInput } from '@schemas/config/trakt-config.schema.js'
import type {
  SyncResult,
  TraktItem,
  TraktListMetadata,
} from '@schemas/trakt/trakt.schema.js'
import type {
  HistoryItemType,
  MutationOutcome,
  SyncMode,
  TraktList,
} from '@root/types/trakt.types.js'
import { parseConfig } from '@utils/config.js'
import { createLogger, createServiceLogger } from '@utils/logger.js'
import { RequestEngine, type Sleep } from '@utils/trakt/request-engine.js'
import { TraktSession } from '@utils/trakt/session.js'
import type { Logger } from 'pino'
import type { TraktContext } from './trakt/api/helpers.js'
import { hydrateSession } from './trakt/auth/index.js'
import { fetchLists } from './trakt/fetching/index.js'
import {
  addHistory,
  addListItems,
  addRatings,
  addWatchlistItems,
  createList,
  deleteList,
  getHistory,
  getList,
  getListsMetadata,
  getRatings,
  getWatchlist,
  removeHistory,
  removeListItems,
  removeRatings,
  removeWatchlistItems,
} from './trakt/sync/index.js'

export interface TraktClientOptions {
  /** Parent logger; a fresh pino logger is created when omitted */
  log?: Logger
  /** Replaces the Retry-After wait */
  sleep?: Sleep
}

export class TraktClient {
  private constructor(private readonly ctx: TraktContext) {}

  /**
   * Validates the configuration, then signs in. Configuration errors are
   * raised before any request is sent.
   *
   * @throws {ConfigError} when the configuration is invalid
   * @throws {HydrationError} when a sign-in step fails
   */
  static async create(
    config: TraktConfigInput,
    options: TraktClientOptions = {},
  ): Promise<TraktClient> {
    const parsed = parseConfig(config)
    const log = createServiceLogger(options.log ?? createLogger(), 'TRAKT')
    const session = new TraktSession()
    const engine = new RequestEngine({ session, log, sleep: options.sleep })

    const ctx: TraktContext = { engine, session, config: parsed, log }
    await hydrateSession(ctx)
    return new TraktClient(ctx)
  }

  get username(): string {
    return this.ctx.session.requireUsername()
  }

  get syncMode(): SyncMode {
    return this.ctx.config.syncMode
  }

  //
  // Watchlist
  //

  getWatchlist(): Promise<TraktList> {
    return getWatchlist(this.ctx)
  }

  addWatchlistItems(
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return addWatchlistItems(this.ctx, items)
  }

  removeWatchlistItems(
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return removeWatchlistItems(this.ctx, items)
  }

  //
  // Lists
  //

  /** @throws {ListNotFoundError} when the list does not exist */
  getList(listId: string): Promise<TraktList> {
    return getList(this.ctx, listId)
  }

  /**
   * Fetches several lists at once, leaving out the ones that do not exist.
   */
  getLists(listIds: readonly string[]): Promise<TraktList[]> {
    return fetchLists(
      listIds,
      (listId) => getList(this.ctx, listId),
      this.ctx.log,
    )
  }

  getListsMetadata(): Promise<TraktListMetadata[]> {
    return getListsMetadata(this.ctx)
  }

  addListItems(
    listId: string,
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return addListItems(this.ctx, listId, items)
  }

  removeListItems(
    listId: string,
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return removeListItems(this.ctx, listId, items)
  }

  createList(
    listId: string,
    name: string,
  ): Promise<MutationOutcome<TraktListMetadata>> {
    return createList(this.ctx, listId, name)
  }

  deleteList(listId: string): Promise<MutationOutcome<void>> {
    return deleteList(this.ctx, listId)
  }

  //
  // Ratings
  //

  getRatings(): Promise<TraktItem[]> {
    return getRatings(this.ctx)
  }

  addRatings(items: readonly TraktItem[]): Promise<MutationOutcome<SyncResult>> {
    return addRatings(this.ctx, items)
  }

  removeRatings(
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return removeRatings(this.ctx, items)
  }

  //
  // History
  //

  getHistory(type: HistoryItemType, id: string): Promise<TraktItem[]> {
    return getHistory(this.ctx, type, id)
  }

  addHistory(items: readonly TraktItem[]): Promise<MutationOutcome<SyncResult>> {
    return addHistory(this.ctx, items)
  }

  removeHistory(
    items: readonly TraktItem[],
  ): Promise<MutationOutcome<SyncResult>> {
    return removeHistory(this.ctx, items)
  }
}

export const createTraktClient = (
  config: TraktConfigInput,
  options?: TraktClientOptions,
): Promise<TraktClient> => TraktClient.create(config, options)
