import type { DatastreamValue } from '@libs/datastream-client';
import type { ComparisonOperator, KpiFilter, LogicNode } from './presets';

/** One period of a KPI series for one instrument, oldest first. */
export interface KpiPoint {
  date: string | null;
  value: DatastreamValue;
}

/**
 * Number of trailing periods a filter looks at, or `undefined` when it uses an
 * explicit start/end range and takes every period returned for it.
 */
export function windowSize(filter: KpiFilter): number | undefined {
  if (filter.method === 'Trend') {
    return filter.n;
  }
  if (filter.lastN !== undefined) {
    return filter.lastN;
  }
  return filter.start !== undefined ? undefined : 1;
}

export function selectWindow(filter: KpiFilter, points: KpiPoint[]): KpiPoint[] {
  const size = windowSize(filter);
  return size === undefined ? points : points.slice(-size);
}

/**
 * Evaluate one KPI filter against an instrument's series. An empty window or
 * any missing value in it fails the filter.
 */
export function evaluateKpiFilter(filter: KpiFilter, points: KpiPoint[]): boolean {
  const values: number[] = [];
  for (const point of selectWindow(filter, points)) {
    if (typeof point.value !== 'number' || !Number.isFinite(point.value)) {
      return false;
    }
    values.push(point.value);
  }
  if (values.length === 0) {
    return false;
  }

  switch (filter.method) {
    case 'Absolute':
      return values.every((value) => compare(value, filter.operator, filter.value));

    case 'Relative': {
      if (values.length < 2) {
        return false;
      }
      for (let i = 1; i < values.length; i += 1) {
        const prev = values[i - 1] ?? 0;
        const curr = values[i] ?? 0;
        if (prev === 0) {
          return false;
        }
        const pctChange = ((curr - prev) / Math.abs(prev)) * 100;
        if (!compare(pctChange, filter.operator, filter.value)) {
          return false;
        }
      }
      return true;
    }

    case 'Direction': {
      if (values.length < 2) {
        return false;
      }
      const first = values[0] ?? 0;
      const last = values[values.length - 1] ?? 0;
      if (filter.direction === 'positive') return last > first;
      if (filter.direction === 'negative') return last < first;
      return true;
    }

    case 'Trend':
      if (values.length < filter.n) {
        return false;
      }
      return evaluateTrend(values, filter.trend, filter.m);
  }
}

/**
 * Walk an AND/OR tree. Leaves are filter indices; `seriesFor` supplies the
 * instrument's series for the leaf's filter. Unknown indices fail.
 */
export function evaluateLogicTree(
  tree: LogicNode,
  filters: KpiFilter[],
  seriesFor: (filter: KpiFilter) => KpiPoint[],
): boolean {
  if (typeof tree === 'number') {
    const filter = filters[tree];
    return filter !== undefined && evaluateKpiFilter(filter, seriesFor(filter));
  }
  const evaluate = (child: LogicNode) => evaluateLogicTree(child, filters, seriesFor);
  return tree.type === 'AND' ? tree.children.every(evaluate) : tree.children.some(evaluate);
}

/**
 * True when every criterion field of `fields` holds one of the accepted
 * values (trimmed, case-insensitive). A missing field fails.
 */
export function matchesMetadata(
  fields: Record<string, DatastreamValue> | undefined,
  criteria: Record<string, string[]>,
): boolean {
  return Object.entries(criteria).every(([field, accepted]) => {
    const value = fields?.[field];
    if (value === undefined || value === null) {
      return false;
    }
    const normalized = String(value).trim().toUpperCase();
    return accepted.some((candidate) => candidate.trim().toUpperCase() === normalized);
  });
}

export function compare(left: number, operator: ComparisonOperator, right: number): boolean {
  switch (operator) {
    case '>':
      return left > right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '=':
      return left === right;
  }
}

// ============================================================================
// Trends
// ============================================================================

function evaluateTrend(
  values: number[],
  trend: Extract<KpiFilter, { method: 'Trend' }>['trend'],
  runLength: number | undefined,
): boolean {
  switch (trend) {
    case 'Positive':
      return isStrictly(values, 'up');
    case 'Negative':
      return isStrictly(values, 'down');
    case 'Positive-to-Negative':
      return runLength !== undefined
        ? hasReversal(values, runLength, 'up')
        : values.some((value, i) => i + 1 < values.length && value > 0 && (values[i + 1] ?? 0) <= 0);
    case 'Negative-to-Positive':
      return runLength !== undefined
        ? hasReversal(values, runLength, 'down')
        : values.some((value, i) => i + 1 < values.length && value < 0 && (values[i + 1] ?? 0) >= 0);
  }
}

function isStrictly(values: number[], direction: 'up' | 'down'): boolean {
  for (let i = 1; i < values.length; i += 1) {
    const prev = values[i - 1] ?? 0;
    const curr = values[i] ?? 0;
    if (direction === 'up' ? curr <= prev : curr >= prev) {
      return false;
    }
  }
  return true;
}

/**
 * A run of `runLength` periods moving in `direction`, followed by a period
 * moving the other way.
 */
function hasReversal(values: number[], runLength: number, direction: 'up' | 'down'): boolean {
  for (let i = 0; i + runLength < values.length; i += 1) {
    const before = values[i + runLength - 1] ?? 0;
    const after = values[i + runLength] ?? 0;
    const reverses = direction === 'up' ? after < before : after > before;
    if (reverses && isStrictly(values.slice(i, i + runLength), direction)) {
      return true;
    }
  }
  return false;
}
