/**
 * @libs/datastream-client
 *
 * Datastream Web Service (DSWS) client library.
 *
 * ## Architecture
 *
 * - **TokenManager**: credential-to-token exchange, expiry tracking,
 *   bearer authorization of outbound requests
 * - **DatastreamClient**: authenticated GetData calls for time series and
 *   snapshot (instrument metadata) requests
 * - **Errors**: AuthenticationError, ServiceUnavailableError, DataRequestError
 *
 * ## Usage
 *
 * ```typescript
 * import { DatastreamClient, TokenManager } from '@libs/datastream-client';
 *
 * const tokens = new TokenManager({
 *   credential: { username: 'user', password: 'secret' },
 * });
 * const client = new DatastreamClient(tokens);
 *
 * const prices = await client.getTimeSeries({
 *   instrument: 'VOD',
 *   datatypes: ['P', 'PH', 'PL'],
 *   start: '-30D',
 *   end: '-0D',
 *   frequency: 'D',
 * });
 *
 * const metadata = await client.getStaticData({
 *   instruments: ['VOD', 'BARC'],
 *   datatypes: ['NAME', 'ISIN'],
 * });
 * ```
 *
 * A 401/403 on a data call drops the token and surfaces as
 * AuthenticationError; the next call re-authenticates. Pass
 * `reauthenticateOnUnauthorized: true` to retry once automatically.
 */

export { TokenManager, DEFAULT_TOKEN_URL } from './tokenManager';
export { DatastreamClient, DEFAULT_BASE_URL } from './datastreamClient';
export type { InstrumentTimeSeries } from './datastreamClient';
export { parseDswsDate, parseDswsDateToIso, toIsoDate } from './dates';

export type {
  Clock,
  Credential,
  Token,
  TokenManagerConfig,
  OutboundRequest,
  DatastreamClientConfig,
  Frequency,
  RequestKind,
  TimeSeriesQuery,
  StaticDataQuery,
  DatastreamValue,
  SymbolError,
  SymbolSeries,
  TimeSeriesResult,
  StaticRecord,
  StaticDataResult,
  Logger,
  HttpTransport,
} from './types';

export {
  ApiRequestError,
  AuthenticationError,
  ServiceUnavailableError,
  DataRequestError,
} from './types';
