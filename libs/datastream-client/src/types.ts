/**
 * Datastream Client Types
 *
 * Type definitions for the credential/token flow, DSWS request/response
 * structures and the parsed results handed to callers.
 */

// ============================================================================
// Errors
// ============================================================================

export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/**
 * Credentials were rejected, no credential is available, or the token the
 * caller holds is no longer accepted.
 */
export class AuthenticationError extends ApiRequestError {
  constructor(message: string, status = 0, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'AuthenticationError';
  }
}

/**
 * Network failure, timeout, throttling or a 5xx from the service. Never
 * retried internally.
 */
export class ServiceUnavailableError extends ApiRequestError {
  constructor(message: string, status = 0, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'ServiceUnavailableError';
  }
}

/** Non-2xx or unusable response from a data endpoint while holding a valid token. */
export class DataRequestError extends ApiRequestError {
  constructor(message: string, status: number, responseBody?: string) {
    super(message, status, responseBody);
    this.name = 'DataRequestError';
  }
}

// ============================================================================
// Ambient collaborators
// ============================================================================

export interface Logger {
  debug?(msg: string, meta?: unknown): void;
  info?(msg: string, meta?: unknown): void;
  warn?(msg: string, meta?: unknown): void;
  error?(msg: string, meta?: unknown): void;
}

export interface HttpTransport {
  (url: string, init: RequestInit): Promise<Response>;
}

export type Clock = () => number;

// ============================================================================
// Credential / Token
// ============================================================================

export interface Credential {
  readonly username: string;
  readonly password: string;
}

export interface Token {
  readonly value: string;
  /** Epoch ms at which the service stops accepting the token, when known. */
  readonly expiresAt?: number;
  readonly issuedAt: number;
}

export interface TokenManagerConfig {
  credential?: Credential;
  tokenUrl?: string;
  transport?: HttpTransport;
  timeoutMs?: number;
  /** Treat a token as expired this long before its reported expiry. */
  expirySkewMs?: number;
  now?: Clock;
  logger?: Logger;
}

/** An outbound request before or after bearer authorization. */
export interface OutboundRequest {
  url: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

// ============================================================================
// Data client
// ============================================================================

export interface DatastreamClientConfig {
  baseUrl?: string;
  transport?: HttpTransport;
  timeoutMs?: number;
  logger?: Logger;
  /**
   * Re-authenticate and retry once when a data call is rejected with 401/403.
   * Off by default: the rejection surfaces as AuthenticationError and the
   * caller decides whether to retry.
   */
  reauthenticateOnUnauthorized?: boolean;
}

export type Frequency = 'D' | 'W' | 'M' | 'Q' | 'Y';

/** Kind 1 selects a time series, Kind 0 a snapshot (static) request. */
export type RequestKind = 0 | 1;

export interface TimeSeriesQuery {
  instrument: string;
  datatypes: string[];
  /** Absolute `YYYY-MM-DD` or relative such as `-30D`, `-1Y`. */
  start: string;
  end: string;
  frequency: Frequency;
  kind?: RequestKind;
}

export interface StaticDataQuery {
  instruments: string[];
  datatypes: string[];
}

export type DatastreamValue = number | string | boolean | null;

export interface SymbolError {
  symbol: string;
  datatype: string;
  message: string;
}

export interface SymbolSeries {
  symbol: string;
  currency?: string;
  /** One value array per datatype, aligned with `TimeSeriesResult.dates`. */
  values: Record<string, DatastreamValue[]>;
}

export interface TimeSeriesResult {
  /** ISO `YYYY-MM-DD`, `null` where the service sent an unparseable date. */
  dates: Array<string | null>;
  symbols: SymbolSeries[];
  errors: SymbolError[];
}

export interface StaticRecord {
  symbol: string;
  fields: Record<string, DatastreamValue>;
}

export interface StaticDataResult {
  records: StaticRecord[];
  errors: SymbolError[];
}

// ============================================================================
// DSWS wire types
// ============================================================================

export interface DswsProperty {
  Key: string;
  Value: boolean | string;
}

export interface DswsTokenRequest {
  UserName: string;
  Password: string;
  Properties: DswsProperty[] | null;
}

export interface DswsDataRequest {
  DataTypes: Array<{ Value: string; Properties: DswsProperty[] | null }>;
  Date: {
    Start: string;
    End: string;
    Frequency: string;
    Kind: RequestKind;
  };
  Instrument: {
    Value: string;
    Properties: DswsProperty[] | null;
  };
  Tag: string | null;
}

export interface DswsGetDataRequest {
  DataRequest: DswsDataRequest;
  Properties: DswsProperty[] | null;
  TokenValue: string;
}

/** DSWS value type codes; 0 marks a per-symbol error. */
export const DSWS_VALUE_TYPE_ERROR = 0;
