/**
 * BI server REST access
 *
 * @module client
 */

export {
  FetchTransport,
  errorForStatus,
  parseRetryAfter,
  type FetchTransportConfig,
  type HttpMethod,
  type HttpRequest,
  type HttpTransport,
} from './http-transport.js';

export {
  DEFAULT_API_VERSION,
  RestClient,
  nextPageNumber,
  parseCredentials,
  parseDurationHms,
  type PageParams,
  type PagedResult,
  type PatCredentials,
  type RawContentItem,
  type RawExtractTask,
  type RawSite,
  type RawUser,
  type RestClientConfig,
  type SignInResult,
} from './rest-client.js';

export { parseTimestamp } from './wire.js';
