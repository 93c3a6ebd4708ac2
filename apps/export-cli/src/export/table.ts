import type {
  DatastreamValue,
  InstrumentTimeSeries,
  StaticDataResult,
  SymbolError,
} from '@libs/datastream-client';

export type CellValue = DatastreamValue;

/** Columns the table builders write themselves; datatypes may not reuse them. */
export const FIXED_COLUMNS = ['symbol', 'currency', 'date'] as const;

export class ColumnClashError extends Error {
  constructor(public readonly column: string) {
    super(`Datatype "${column}" clashes with a fixed column`);
    this.name = 'ColumnClashError';
  }
}

/** A named sheet: column order plus rows keyed by column name. */
export interface ExportTable {
  name: string;
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

/**
 * One row per (symbol, date) across every instrument, with a column per
 * datatype. Missing values are `null`.
 */
export function timeSeriesToTable(
  results: InstrumentTimeSeries[],
  datatypes: string[],
  name = 'timeseries',
): ExportTable {
  const dataColumns = uniqueDataColumns(datatypes);
  const rows: ExportTable['rows'] = [];

  for (const { result } of results) {
    for (const series of result.symbols) {
      result.dates.forEach((date, idx) => {
        const row: Record<string, CellValue> = {
          symbol: series.symbol,
          currency: series.currency ?? null,
          date,
        };
        for (const datatype of dataColumns) {
          row[datatype] = series.values[datatype]?.[idx] ?? null;
        }
        rows.push(row);
      });
    }
  }

  return { name, columns: ['symbol', 'currency', 'date', ...dataColumns], rows };
}

export function staticDataToTable(
  result: StaticDataResult,
  datatypes: string[],
  name = 'metadata',
): ExportTable {
  const dataColumns = uniqueDataColumns(datatypes);
  const rows = result.records.map((record) => {
    const row: Record<string, CellValue> = { symbol: record.symbol };
    for (const datatype of dataColumns) {
      row[datatype] = record.fields[datatype] ?? null;
    }
    return row;
  });
  return { name, columns: ['symbol', ...dataColumns], rows };
}

export function errorsToTable(errors: SymbolError[], name = 'errors'): ExportTable {
  return {
    name,
    columns: ['symbol', 'datatype', 'message'],
    rows: errors.map((error) => ({
      symbol: error.symbol,
      datatype: error.datatype,
      message: error.message,
    })),
  };
}

/** Datatypes in first-seen order, refusing any that would overwrite a fixed column. */
export function uniqueDataColumns(datatypes: string[]): string[] {
  const reserved = new Set<string>(FIXED_COLUMNS);
  const clash = datatypes.find((datatype) => reserved.has(datatype));
  if (clash !== undefined) {
    throw new ColumnClashError(clash);
  }
  return [...new Set(datatypes)];
}
