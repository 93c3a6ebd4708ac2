import { describe, it, expect } from 'vitest';
import type { InstrumentTimeSeries } from '@libs/datastream-client';
import { ColumnClashError, errorsToTable, staticDataToTable, timeSeriesToTable, uniqueDataColumns } from '../export';

describe('table builders', () => {
  it('should flatten time series into one row per symbol and date', () => {
    const results: InstrumentTimeSeries[] = [
      {
        instrument: 'VOD',
        result: {
          dates: ['2024-01-01', '2024-01-02'],
          symbols: [{ symbol: 'VOD', currency: 'E', values: { P: [71.5, 72.1], PH: [73, null] } }],
          errors: [],
        },
      },
      {
        instrument: 'BARC',
        result: {
          dates: ['2024-01-01', null],
          symbols: [{ symbol: 'BARC', values: { P: [150.2, 151] } }],
          errors: [{ symbol: 'BARC', datatype: 'PH', message: '$$"ER", E100, INVALID CODE OR EXPRESSION ENTERED' }],
        },
      },
    ];

    const table = timeSeriesToTable(results, ['P', 'PH']);

    expect(table.name).toBe('timeseries');
    expect(table.columns).toEqual(['symbol', 'currency', 'date', 'P', 'PH']);
    expect(table.rows).toEqual([
      { symbol: 'VOD', currency: 'E', date: '2024-01-01', P: 71.5, PH: 73 },
      { symbol: 'VOD', currency: 'E', date: '2024-01-02', P: 72.1, PH: null },
      { symbol: 'BARC', currency: null, date: '2024-01-01', P: 150.2, PH: null },
      { symbol: 'BARC', currency: null, date: null, P: 151, PH: null },
    ]);
  });

  it('should build one metadata row per symbol', () => {
    const table = staticDataToTable(
      {
        records: [
          { symbol: 'VOD', fields: { NAME: 'VODAFONE GROUP', ISIN: 'GB00BH4HKS39' } },
          { symbol: 'BARC', fields: { NAME: 'BARCLAYS' } },
        ],
        errors: [],
      },
      ['NAME', 'ISIN'],
    );

    expect(table).toEqual({
      name: 'metadata',
      columns: ['symbol', 'NAME', 'ISIN'],
      rows: [
        { symbol: 'VOD', NAME: 'VODAFONE GROUP', ISIN: 'GB00BH4HKS39' },
        { symbol: 'BARC', NAME: 'BARCLAYS', ISIN: null },
      ],
    });
  });

  it('should list per-symbol errors', () => {
    const table = errorsToTable([{ symbol: 'XXX', datatype: 'P', message: 'INVALID CODE' }], 'problems');

    expect(table).toEqual({
      name: 'problems',
      columns: ['symbol', 'datatype', 'message'],
      rows: [{ symbol: 'XXX', datatype: 'P', message: 'INVALID CODE' }],
    });
  });

  it('should write one column per distinct datatype', () => {
    const table = staticDataToTable(
      { records: [{ symbol: 'VOD', fields: { NAME: 'VODAFONE GROUP' } }], errors: [] },
      ['NAME', 'NAME'],
    );

    expect(table.columns).toEqual(['symbol', 'NAME']);
    expect(table.rows).toEqual([{ symbol: 'VOD', NAME: 'VODAFONE GROUP' }]);
  });

  it('should refuse a datatype named like a fixed column', () => {
    expect(uniqueDataColumns(['P', 'PH', 'P'])).toEqual(['P', 'PH']);
    expect(() => timeSeriesToTable([], ['P', 'currency'])).toThrow(
      new ColumnClashError('currency'),
    );
    expect(() => uniqueDataColumns(['date'])).toThrow('Datatype "date" clashes with a fixed column');
  });
});
