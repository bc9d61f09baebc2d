export { hydrateSession } from './hydrate.js'
export {
  browseActivate,
  browseSignIn,
  exchangeToken,
  requestDeviceCodes,
  submitActivate,
  submitAuthorize,
  submitSignIn,
} from './steps.js'
