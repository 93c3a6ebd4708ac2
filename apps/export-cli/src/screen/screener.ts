import type {
  DatastreamClient,
  DatastreamValue,
  Frequency,
  InstrumentTimeSeries,
  Logger,
  SymbolError,
} from '@libs/datastream-client';
import { uniqueDataColumns } from '../export/table';
import type { CellValue, ExportTable } from '../export/table';
import { evaluateLogicTree, matchesMetadata, windowSize } from './evaluate';
import type { KpiPoint } from './evaluate';
import type { CompiledScreen, KpiFilter } from './presets';

export interface ScreenOutcome {
  preset: string;
  /** Instruments that passed, in input order. */
  matches: string[];
  /** Latest value of each screened KPI for every matching instrument. */
  latest: Record<string, Record<string, DatastreamValue>>;
  kpis: string[];
  errors: SymbolError[];
}

/** One GetData window shared by every filter that asks for it. */
interface WindowRequest {
  key: string;
  start: string;
  end: string;
  frequency: Frequency;
  kpis: string[];
}

/**
 * Run a compiled screen over `instruments`.
 *
 * Metadata criteria are checked first with one snapshot request. The
 * remaining instruments are fetched once per distinct KPI window, each
 * window covering all of its KPIs, and then run through the logic tree.
 */
export async function runScreen(
  client: DatastreamClient,
  instruments: string[],
  screen: CompiledScreen,
  logger?: Logger,
): Promise<ScreenOutcome> {
  const errors: SymbolError[] = [];
  let candidates = instruments;

  const metadataFields = Object.keys(screen.metadata);
  if (metadataFields.length > 0) {
    const snapshot = await client.getStaticData({ instruments, datatypes: metadataFields });
    errors.push(...snapshot.errors);
    const fieldsBySymbol = new Map(snapshot.records.map((record) => [record.symbol, record.fields] as const));
    candidates = instruments.filter((instrument) =>
      matchesMetadata(fieldsBySymbol.get(instrument), screen.metadata),
    );
    logger?.debug?.(`[Screen] ${candidates.length} of ${instruments.length} instrument(s) pass metadata criteria`);
  }

  const kpis = [...new Set(screen.filters.map((filter) => filter.kpi))];
  const series = new Map<string, Map<string, InstrumentTimeSeries>>();

  if (screen.tree !== null && candidates.length > 0) {
    for (const request of planRequests(screen.filters)) {
      const results = await client.getTimeSeriesForInstruments(candidates, {
        datatypes: request.kpis,
        start: request.start,
        end: request.end,
        frequency: request.frequency,
      });
      errors.push(...results.flatMap(({ result }) => result.errors));
      series.set(request.key, new Map(results.map((item) => [item.instrument, item] as const)));
    }
  }

  const tree = screen.tree;
  const matches = candidates.filter(
    (instrument) =>
      tree === null ||
      evaluateLogicTree(tree, screen.filters, (filter) =>
        pointsFor(series.get(requestFor(filter).key)?.get(instrument), instrument, filter.kpi),
      ),
  );

  const latest: ScreenOutcome['latest'] = {};
  for (const instrument of matches) {
    const values: Record<string, DatastreamValue> = {};
    for (const filter of screen.filters) {
      if (values[filter.kpi] === undefined) {
        const points = pointsFor(series.get(requestFor(filter).key)?.get(instrument), instrument, filter.kpi);
        values[filter.kpi] = points[points.length - 1]?.value ?? null;
      }
    }
    latest[instrument] = values;
  }

  logger?.info?.(
    `[Screen] ${matches.length} of ${instruments.length} instrument(s) passed preset "${screen.name}"`,
  );

  return { preset: screen.name, matches, latest, kpis, errors };
}

/** One row per matching instrument, with the latest value of each KPI. */
export function screenToTable(outcome: ScreenOutcome, name = 'matches'): ExportTable {
  const kpiColumns = uniqueDataColumns(outcome.kpis);
  const rows = outcome.matches.map((symbol) => {
    const row: Record<string, CellValue> = { symbol };
    for (const kpi of kpiColumns) {
      row[kpi] = outcome.latest[symbol]?.[kpi] ?? null;
    }
    return row;
  });
  return { name, columns: ['symbol', ...kpiColumns], rows };
}

// ============================================================================
// Request planning
// ============================================================================

export function requestFor(filter: KpiFilter): Omit<WindowRequest, 'kpis'> {
  const frequency: Frequency = filter.frequency === 'Yearly' ? 'Y' : 'Q';
  const size = windowSize(filter);
  const start = size === undefined ? (filter.start ?? '') : `-${size - 1}${frequency}`;
  const end = size === undefined ? (filter.end ?? '') : '-0D';
  return { key: `${frequency}|${start}|${end}`, start, end, frequency };
}

export function planRequests(filters: KpiFilter[]): WindowRequest[] {
  const requests = new Map<string, WindowRequest>();
  for (const filter of filters) {
    const window = requestFor(filter);
    const existing = requests.get(window.key);
    if (!existing) {
      requests.set(window.key, { ...window, kpis: [filter.kpi] });
    } else if (!existing.kpis.includes(filter.kpi)) {
      existing.kpis.push(filter.kpi);
    }
  }
  return [...requests.values()];
}

function pointsFor(item: InstrumentTimeSeries | undefined, instrument: string, kpi: string): KpiPoint[] {
  if (!item) {
    return [];
  }
  const { dates, symbols } = item.result;
  const match = symbols.find((candidate) => candidate.symbol === instrument) ?? symbols[0];
  const values = match?.values[kpi];
  if (!values) {
    return [];
  }
  return dates.map((date, idx) => ({ date, value: values[idx] ?? null }));
}
