export { BrowserSession, type BrowserSessionOptions } from './browser-session.js';
export { loadConfig, type HtmlMode, type ScraperConfig } from './config.js';
export * from './errors.js';
export {
  NetworkLog,
  REQUEST_FILTERS,
  type NetworkRequestRecord,
  type NetworkResponseRecord,
  type RequestFilter,
} from './network-log.js';
export { SERVER_NAME, SERVER_VERSION, createScraperServer } from './server.js';
export type * from './types.js';
