export { mapItemsToSyncBody } from './body-mapper.js'
export { getHistory, addHistory, removeHistory } from './history.js'
export {
  addListItems,
  buildListBody,
  createList,
  deleteList,
  getList,
  getListsMetadata,
  removeListItems,
} from './lists.js'
export { addRatings, getRatings, removeRatings } from './ratings.js'
export { runMutation, shouldExecute } from './sync-mode.js'
export {
  addWatchlistItems,
  getWatchlist,
  removeWatchlistItems,
} from './watchlist.js'
