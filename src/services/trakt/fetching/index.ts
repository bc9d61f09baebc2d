export { fetchLists, type ListGetter } from './lists-fetcher.js'
