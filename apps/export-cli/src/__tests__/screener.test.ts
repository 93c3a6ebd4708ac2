/**
 * Screen runner tests
 *
 * Drives a compiled preset through a real DatastreamClient backed by an
 * in-process DSWS stand-in, so the request plan and the evaluation are
 * checked together.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { DatastreamClient, TokenManager } from '@libs/datastream-client';
import type { DatastreamValue } from '@libs/datastream-client';
import { compilePreset, parsePresetFile, planRequests, requestFor, runScreen, screenToTable } from '../screen';
import type { KpiFilter } from '../screen';
import { kpiFilterSchema } from '../screen/presets';

const BASE_URL = 'https://dsws.test/rest';
const QUARTER_ENDS = [Date.UTC(2023, 5, 30), Date.UTC(2023, 8, 30), Date.UTC(2023, 11, 31)];

const jsonResponse = (data: unknown, status = 200) =>
  new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const dswsDate = (ms: number) => `/Date(${ms}+0000)/`;

interface GetDataBody {
  DataRequest: {
    DataTypes: Array<{ Value: string }>;
    Date: { Start: string; End: string; Frequency: string; Kind: number };
    Instrument: { Value: string };
  };
}

const filter = (input: Record<string, unknown>): KpiFilter => kpiFilterSchema.parse(input);

describe('screen runner', () => {
  describe('request planning', () => {
    it('should turn a trailing window into a relative DSWS range', () => {
      expect(requestFor(filter({ kpi: 'WC01001', method: 'Relative', value: 5, lastN: 4 }))).toEqual({
        key: 'Q|-3Q|-0D',
        start: '-3Q',
        end: '-0D',
        frequency: 'Q',
      });
      expect(requestFor(filter({ kpi: 'WC01751', method: 'Trend', n: 3, frequency: 'Yearly' }))).toMatchObject({
        start: '-2Y',
        frequency: 'Y',
      });
      expect(requestFor(filter({ kpi: 'PE', method: 'Absolute', operator: '<', value: 15 }))).toMatchObject({
        start: '-0Q',
        end: '-0D',
      });
    });

    it('should pass an explicit range through', () => {
      expect(
        requestFor(
          filter({
            kpi: 'PE',
            method: 'Absolute',
            operator: '<',
            value: 15,
            frequency: 'Yearly',
            start: '2020-01-01',
            end: '2023-12-31',
          }),
        ),
      ).toEqual({ key: 'Y|2020-01-01|2023-12-31', start: '2020-01-01', end: '2023-12-31', frequency: 'Y' });
    });

    it('should share one request between filters with the same window', () => {
      const requests = planRequests([
        filter({ kpi: 'WC01001', method: 'Relative', value: 5, lastN: 4 }),
        filter({ kpi: 'WC01751', method: 'Absolute', operator: '>', value: 0, lastN: 4 }),
        filter({ kpi: 'WC01001', method: 'Direction', lastN: 4 }),
        filter({ kpi: 'PE', method: 'Absolute', operator: '<', value: 15 }),
      ]);

      expect(requests).toEqual([
        { key: 'Q|-3Q|-0D', start: '-3Q', end: '-0D', frequency: 'Q', kpis: ['WC01001', 'WC01751'] },
        { key: 'Q|-0Q|-0D', start: '-0Q', end: '-0D', frequency: 'Q', kpis: ['PE'] },
      ]);
    });
  });

  describe('runScreen', () => {
    let kpiValues: Record<string, Record<string, DatastreamValue[]>>;
    let transport: Mock<(url: string, init: RequestInit) => Promise<Response>>;
    let client: DatastreamClient;

    const requested = () =>
      transport.mock.calls
        .filter(([url]) => url.endsWith('/GetData'))
        .map(([, init]) => {
          const body: GetDataBody = JSON.parse(String(init.body));
          return `${body.DataRequest.Instrument.Value} ${body.DataRequest.Date.Start}`;
        });

    /** Snapshot requests answer GEOGN; time series answer from `kpiValues`. */
    function answer(body: GetDataBody): Response {
      const { DataTypes, Date: range, Instrument } = body.DataRequest;
      if (range.Kind === 0) {
        const countries: Record<string, string> = {
          AAA: 'UNITED KINGDOM',
          BBB: 'United Kingdom',
          CCC: 'FRANCE',
          DDD: 'UNITED KINGDOM',
        };
        return jsonResponse({
          DataResponse: {
            DataTypeValues: [
              {
                DataType: 'GEOGN',
                SymbolValues: Instrument.Value.split(',').map((symbol) => ({
                  Symbol: symbol,
                  Type: 6,
                  Value: countries[symbol] ?? null,
                })),
              },
            ],
          },
        });
      }
      const datatype = DataTypes[0]?.Value ?? '';
      const values = kpiValues[Instrument.Value]?.[datatype] ?? [];
      const symbolValue =
        values.length === 0
          ? { Symbol: Instrument.Value, Type: 0, Value: '$$"ER", E100, NO DATA AVAILABLE' }
          : { Symbol: Instrument.Value, Type: 10, Value: values };
      return jsonResponse({
        DataResponse: {
          Dates: QUARTER_ENDS.slice(-Math.max(values.length, 1)).map(dswsDate),
          DataTypeValues: [{ DataType: datatype, SymbolValues: [symbolValue] }],
        },
      });
    }

    beforeEach(() => {
      kpiValues = {
        AAA: { WC01001: [100, 110, 121], WC08301: [8] },
        BBB: { WC01001: [100, 102, 104], WC08301: [12] },
        CCC: { WC01001: [100, 200, 400], WC08301: [50] },
        DDD: { WC01001: [100, 90, 80] },
      };
      transport = vi.fn(async (url: string, init: RequestInit) => {
        if (url.endsWith('/GetToken')) {
          return jsonResponse({ TokenValue: 'abc123', TokenExpiry: null });
        }
        const body: GetDataBody = JSON.parse(String(init.body));
        return answer(body);
      });
      const tokens = new TokenManager({
        credential: { username: 'test-user', password: 'test-secret' },
        tokenUrl: `${BASE_URL}/GetToken`,
        transport,
      });
      client = new DatastreamClient(tokens, { baseUrl: BASE_URL, transport });
    });

    const growthOrValue = () =>
      compilePreset(
        parsePresetFile(
          JSON.stringify({
            mixed: {
              filters: [
                { kpi: 'WC01001', method: 'Relative', value: 5, lastN: 3 },
                { kpi: 'WC08301', method: 'Absolute', operator: '>', value: 10 },
              ],
              tree: { type: 'OR', children: [0, 1] },
              metadata: { GEOGN: ['UNITED KINGDOM'] },
            },
          }),
        ),
        'mixed',
      );

    it('should screen metadata first and fetch each window for the remaining instruments', async () => {
      const logger = { debug: vi.fn(), info: vi.fn() };

      const outcome = await runScreen(client, ['AAA', 'BBB', 'CCC', 'DDD'], growthOrValue(), logger);

      expect(requested()).toEqual([
        'AAA,BBB,CCC,DDD ',
        'AAA -2Q',
        'BBB -2Q',
        'DDD -2Q',
        'AAA -0Q',
        'BBB -0Q',
        'DDD -0Q',
      ]);
      expect(outcome).toEqual({
        preset: 'mixed',
        matches: ['AAA', 'BBB'],
        latest: {
          AAA: { WC01001: 121, WC08301: 8 },
          BBB: { WC01001: 104, WC08301: 12 },
        },
        kpis: ['WC01001', 'WC08301'],
        errors: [{ symbol: 'DDD', datatype: 'WC08301', message: '$$"ER", E100, NO DATA AVAILABLE' }],
      });
      expect(logger.debug).toHaveBeenCalledWith('[Screen] 3 of 4 instrument(s) pass metadata criteria');
      expect(logger.info).toHaveBeenCalledWith('[Screen] 2 of 4 instrument(s) passed preset "mixed"');
    });

    it('should pass every instrument without requests when the preset has no criteria', async () => {
      const screen = compilePreset(parsePresetFile('{"all": {}}'), 'all');

      const outcome = await runScreen(client, ['AAA', 'CCC'], screen);

      expect(transport).not.toHaveBeenCalled();
      expect(outcome.matches).toEqual(['AAA', 'CCC']);
      expect(outcome.latest).toEqual({ AAA: {}, CCC: {} });
    });

    it('should skip KPI requests when no instrument passes the metadata criteria', async () => {
      const screen = compilePreset(
        parsePresetFile(
          JSON.stringify({
            de: { filters: [{ kpi: 'WC08301', method: 'Absolute', operator: '>', value: 0 }], metadata: { GEOGN: ['GERMANY'] } },
          }),
        ),
        'de',
      );

      const outcome = await runScreen(client, ['AAA', 'CCC'], screen);

      expect(requested()).toEqual(['AAA,CCC ']);
      expect(outcome.matches).toEqual([]);
    });
  });

  describe('screenToTable', () => {
    it('should write one row per match with the latest KPI values', () => {
      const table = screenToTable({
        preset: 'mixed',
        matches: ['AAA', 'BBB'],
        latest: { AAA: { WC01001: 121, WC08301: 8 }, BBB: { WC01001: 104 } },
        kpis: ['WC01001', 'WC08301'],
        errors: [],
      });

      expect(table).toEqual({
        name: 'matches',
        columns: ['symbol', 'WC01001', 'WC08301'],
        rows: [
          { symbol: 'AAA', WC01001: 121, WC08301: 8 },
          { symbol: 'BBB', WC01001: 104, WC08301: null },
        ],
      });
    });
  });
});
