export {
  createTraktClient,
  TraktClient,
  type TraktClientOptions,
} from '@services/trakt-client.service.js'
export { fetchLists, type ListGetter } from '@services/trakt/fetching/index.js'
export { mapItemsToSyncBody, shouldExecute } from '@services/trakt/sync/index.js'
export {
  DEFAULT_API_BASE_URL,
  DEFAULT_BROWSER_BASE_URL,
  type TraktConfig,
  type TraktConfigInput,
} from '@schemas/config/trakt-config.schema.js'
export type {
  SyncResult,
  TraktItem,
  TraktItemSpec,
  TraktListMetadata,
} from '@schemas/trakt/trakt.schema.js'
export {
  AUTH_STEPS,
  SYNC_MODES,
  type AuthStepName,
  type HistoryItemType,
  type MutationOutcome,
  type SyncMode,
  type TraktList,
} from '@root/types/trakt.types.js'
export { loadConfig, parseConfig } from '@utils/config.js'
export { createLogger, createServiceLogger } from '@utils/logger.js'
export * from '@utils/trakt/errors.js'
