export { mangaakuAdapter } from './adapter.js'
export { parseReaderPayload, type ReaderPayloadResult } from './payload.js'
export { SELECTORS } from './selectors.js'
