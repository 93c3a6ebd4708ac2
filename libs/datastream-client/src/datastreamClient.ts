import type {
  DatastreamClientConfig,
  DatastreamValue,
  DswsDataRequest,
  DswsGetDataRequest,
  HttpTransport,
  Logger,
  StaticDataQuery,
  StaticDataResult,
  StaticRecord,
  SymbolError,
  SymbolSeries,
  TimeSeriesQuery,
  TimeSeriesResult,
} from './types';
import {
  AuthenticationError,
  DataRequestError,
  DSWS_VALUE_TYPE_ERROR,
  ServiceUnavailableError,
} from './types';
import { getDataResponseSchema, type DswsGetDataResponse, type DswsSymbolValue } from './schemas';
import { parseDswsDateToIso } from './dates';
import {
  DEFAULT_TIMEOUT_MS,
  defaultTransport,
  executeHttp,
  isTransientStatus,
  isUnauthorizedStatus,
  safeReadBody,
} from './http';
import type { TokenManager } from './tokenManager';

export const DEFAULT_BASE_URL = 'https://product.datastream.com/dswsclient/V1/DSService.svc/rest';

interface GetDataOutcome {
  payload: DswsGetDataResponse;
  status: number;
}

export interface InstrumentTimeSeries {
  instrument: string;
  result: TimeSeriesResult;
}

/**
 * Datastream Client
 *
 * Issues authenticated GetData calls for time series and snapshot
 * (instrument metadata) requests. Tokens come from the injected
 * TokenManager; each call asks it for a valid token first.
 */
export class DatastreamClient {
  private readonly baseUrl: string;
  private readonly transport: HttpTransport;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly reauthenticateOnUnauthorized: boolean;

  constructor(
    private readonly tokens: TokenManager,
    config: DatastreamClientConfig = {},
  ) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.transport = config.transport ?? defaultTransport;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger;
    this.reauthenticateOnUnauthorized = config.reauthenticateOnUnauthorized ?? false;
  }

  // ==========================================================================
  // Time series
  // ==========================================================================

  /**
   * Fetch a time series for one instrument (or a Datastream list expression).
   *
   * @returns Parsed dates with one value array per symbol and datatype;
   *   per-symbol service errors are collected in `errors`
   */
  async getTimeSeries(query: TimeSeriesQuery): Promise<TimeSeriesResult> {
    const { instrument, datatypes, start, end, frequency, kind = 1 } = query;

    if (!instrument.trim()) {
      throw new Error('instrument is required for getTimeSeries');
    }
    if (datatypes.length === 0) {
      throw new Error('at least one datatype is required for getTimeSeries');
    }

    const { payload, status } = await this.postGetData({
      DataTypes: datatypes.map((value) => ({ Value: value, Properties: null })),
      Date: { Start: start, End: end, Frequency: frequency, Kind: kind },
      Instrument: { Value: instrument, Properties: null },
      Tag: null,
    });

    const rawDates = payload.DataResponse.Dates;
    if (!rawDates || rawDates.length === 0) {
      throw new DataRequestError(
        `No dates returned for ${instrument}; possibly no data available`,
        status,
      );
    }

    const dates = rawDates.map((raw) => parseDswsDateToIso(raw));
    const symbols = new Map<string, SymbolSeries>();
    const errors: SymbolError[] = [];

    for (const dataTypeValue of payload.DataResponse.DataTypeValues ?? []) {
      for (const symbolValue of dataTypeValue.SymbolValues ?? []) {
        if (symbolValue.Type === DSWS_VALUE_TYPE_ERROR) {
          errors.push(toSymbolError(symbolValue, dataTypeValue.DataType));
          continue;
        }

        let series = symbols.get(symbolValue.Symbol);
        if (!series) {
          series = { symbol: symbolValue.Symbol, values: {} };
          const currency = symbolValue.Currency?.trim();
          if (currency) {
            series.currency = currency;
          }
          symbols.set(symbolValue.Symbol, series);
        }
        series.values[dataTypeValue.DataType] = alignValues(symbolValue.Value, dates.length);
      }
    }

    if (errors.length > 0) {
      this.logger?.warn?.(`[DatastreamClient] ${errors.length} datatype error(s) for ${instrument}`, {
        errors,
      });
    }

    return { dates, symbols: [...symbols.values()], errors };
  }

  /**
   * Fetch time series for several instruments, one request at a time.
   * The first failure stops the iteration and propagates.
   */
  async getTimeSeriesForInstruments(
    instruments: string[],
    query: Omit<TimeSeriesQuery, 'instrument'>,
  ): Promise<InstrumentTimeSeries[]> {
    const results: InstrumentTimeSeries[] = [];
    for (const instrument of instruments) {
      this.logger?.info?.(`[DatastreamClient] Fetching ${query.datatypes.join(',')} for ${instrument}`);
      const result = await this.getTimeSeries({ ...query, instrument });
      results.push({ instrument, result });
    }
    return results;
  }

  // ==========================================================================
  // Snapshot (instrument metadata)
  // ==========================================================================

  /**
   * Fetch static fields (name, ISIN, currency, ...) for a list of instruments
   * in a single snapshot request.
   */
  async getStaticData(query: StaticDataQuery): Promise<StaticDataResult> {
    const instruments = query.instruments.map((item) => item.trim()).filter(Boolean);
    if (instruments.length === 0) {
      throw new Error('at least one instrument is required for getStaticData');
    }
    if (query.datatypes.length === 0) {
      throw new Error('at least one datatype is required for getStaticData');
    }

    const { payload } = await this.postGetData({
      DataTypes: query.datatypes.map((value) => ({ Value: value, Properties: null })),
      Date: { Start: '', End: '', Frequency: '', Kind: 0 },
      Instrument: {
        Value: instruments.join(','),
        Properties: instruments.length > 1 ? [{ Key: 'IsList', Value: true }] : null,
      },
      Tag: null,
    });

    const records = new Map<string, StaticRecord>();
    const errors: SymbolError[] = [];

    for (const dataTypeValue of payload.DataResponse.DataTypeValues ?? []) {
      for (const symbolValue of dataTypeValue.SymbolValues ?? []) {
        if (symbolValue.Type === DSWS_VALUE_TYPE_ERROR) {
          errors.push(toSymbolError(symbolValue, dataTypeValue.DataType));
          continue;
        }
        let record = records.get(symbolValue.Symbol);
        if (!record) {
          record = { symbol: symbolValue.Symbol, fields: {} };
          records.set(symbolValue.Symbol, record);
        }
        record.fields[dataTypeValue.DataType] = firstValue(symbolValue.Value);
      }
    }

    return { records: [...records.values()], errors };
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async postGetData(
    dataRequest: DswsDataRequest,
    retriedAfterUnauthorized = false,
  ): Promise<GetDataOutcome> {
    const token = await this.tokens.getValidToken();
    const body: DswsGetDataRequest = {
      DataRequest: dataRequest,
      Properties: null,
      TokenValue: token.value,
    };
    const request = this.tokens.authorize({
      url: `${this.baseUrl}/GetData`,
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(body),
    });

    const response = await executeHttp(
      this.transport,
      request.url,
      { method: request.method, headers: request.headers, body: request.body },
      this.timeoutMs,
    );
    const text = await safeReadBody(response);

    if (!response.ok) {
      if (isUnauthorizedStatus(response.status)) {
        this.tokens.invalidate(token);
        if (this.reauthenticateOnUnauthorized && !retriedAfterUnauthorized) {
          this.logger?.warn?.(
            `[DatastreamClient] Token rejected with status ${response.status}; re-authenticating once`,
          );
          return this.postGetData(dataRequest, true);
        }
        throw new AuthenticationError(
          `Access token rejected with status ${response.status}`,
          response.status,
          text,
        );
      }
      if (isTransientStatus(response.status)) {
        throw new ServiceUnavailableError(
          `GetData failed with status ${response.status}`,
          response.status,
          text,
        );
      }
      throw new DataRequestError(
        `GetData failed with status ${response.status}`,
        response.status,
        text,
      );
    }

    return { payload: parseGetData(text, response.status), status: response.status };
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

function parseGetData(text: string | undefined, status: number): DswsGetDataResponse {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text ?? '');
  } catch {
    throw new DataRequestError('GetData returned a non-JSON body', status, text);
  }
  const result = getDataResponseSchema.safeParse(decoded);
  if (!result.success) {
    throw new DataRequestError('GetData returned an unexpected payload', status, text);
  }
  return result.data;
}

function toSymbolError(symbolValue: DswsSymbolValue, datatype: string): SymbolError {
  const message = Array.isArray(symbolValue.Value)
    ? symbolValue.Value.map(String).join('; ')
    : String(symbolValue.Value);
  return { symbol: symbolValue.Symbol, datatype, message };
}

/** Pad with `null` or truncate so the series lines up with the date axis. */
function alignValues(value: DswsSymbolValue['Value'], length: number): DatastreamValue[] {
  const values = Array.isArray(value) ? value : [value];
  return Array.from({ length }, (_, idx) => values[idx] ?? null);
}

function firstValue(value: DswsSymbolValue['Value']): DatastreamValue {
  if (Array.isArray(value)) {
    return value[0] ?? null;
  }
  return value;
}
