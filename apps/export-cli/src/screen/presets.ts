import { z } from 'zod';
import { FIXED_COLUMNS } from '../export/table';

/**
 * Screening presets
 *
 * A presets file is a JSON object of named presets. Each preset is either a
 * list of groups (KPIs with one or more methods, combined per group and across
 * groups) or a flat list of filters with an explicit logic tree over their
 * indices. Both forms compile to the same `CompiledScreen`.
 *
 * ```json
 * {
 *   "growth": {
 *     "groupOperator": "AND",
 *     "groups": [
 *       {
 *         "operator": "OR",
 *         "kpis": [
 *           { "kpi": "WC01001", "methods": [{ "method": "Relative", "operator": ">=", "value": 5, "lastN": 4 }] },
 *           { "kpi": "WC01751", "methods": [{ "method": "Trend", "trend": "Positive", "n": 3 }] }
 *         ]
 *       }
 *     ],
 *     "metadata": { "GEOGN": ["UNITED KINGDOM"] }
 *   }
 * }
 * ```
 */

export class PresetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PresetError';
  }
}

// ============================================================================
// Schemas
// ============================================================================

export const COMPARISON_OPERATORS = ['>', '>=', '<', '<=', '='] as const;
export const TREND_TYPES = ['Positive', 'Negative', 'Positive-to-Negative', 'Negative-to-Positive'] as const;

const logicOperatorSchema = z.enum(['AND', 'OR']);
const comparisonSchema = z.enum(COMPARISON_OPERATORS);

/**
 * Time window of a method. `lastN` takes the latest N periods; `start`/`end`
 * give an explicit DSWS date range instead. Neither means the latest period.
 */
const windowShape = {
  frequency: z.enum(['Yearly', 'Quarterly']).default('Quarterly'),
  lastN: z.number().int().positive().optional(),
  start: z.string().min(1).optional(),
  end: z.string().min(1).optional(),
};

const absoluteMethodSchema = z.object({
  ...windowShape,
  method: z.literal('Absolute'),
  operator: comparisonSchema,
  value: z.number(),
});

/** Percentage change between every pair of consecutive periods. */
const relativeMethodSchema = z.object({
  ...windowShape,
  method: z.literal('Relative'),
  operator: comparisonSchema.default('>='),
  value: z.number(),
});

/** Compares the first and last value of the window. */
const directionMethodSchema = z.object({
  ...windowShape,
  method: z.literal('Direction'),
  direction: z.enum(['positive', 'negative', 'either']).default('either'),
});

/** Looks at the latest `n` periods; `m` is the run length before a reversal. */
const trendMethodSchema = z.object({
  ...windowShape,
  method: z.literal('Trend'),
  trend: z.enum(TREND_TYPES).default('Positive'),
  n: z.number().int().min(2),
  m: z.number().int().positive().optional(),
});

export const methodSchema = z
  .discriminatedUnion('method', [
    absoluteMethodSchema,
    relativeMethodSchema,
    directionMethodSchema,
    trendMethodSchema,
  ])
  .superRefine((method, ctx) => {
    if ((method.start === undefined) !== (method.end === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'start and end must be given together' });
    }
    if (method.lastN !== undefined && method.start !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'use either lastN or start/end, not both' });
    }
  });

export type KpiMethod = z.infer<typeof methodSchema>;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];
export type LogicOperator = z.infer<typeof logicOperatorSchema>;

export type KpiFilter = KpiMethod & { kpi: string };

export const kpiFilterSchema = z
  .object({ kpi: z.string().min(1) })
  .and(methodSchema);

export type LogicNode = number | { type: LogicOperator; children: LogicNode[] };

export const logicNodeSchema: z.ZodType<LogicNode> = z.lazy(() =>
  z.union([
    z.number().int().nonnegative(),
    z.object({ type: logicOperatorSchema, children: z.array(logicNodeSchema).min(1) }),
  ]),
);

const groupSchema = z.object({
  operator: logicOperatorSchema.default('AND'),
  kpis: z.array(
    z.object({
      kpi: z.string().min(1),
      methodOperator: logicOperatorSchema.default('AND'),
      methods: z.array(methodSchema).min(1),
    }),
  ),
});

export const presetSchema = z
  .object({
    description: z.string().optional(),
    createdAt: z.string().optional(),
    groupOperator: logicOperatorSchema.default('AND'),
    groups: z.array(groupSchema).optional(),
    filters: z.array(kpiFilterSchema).optional(),
    tree: logicNodeSchema.optional(),
    /** Static field -> accepted values, checked with a snapshot request. */
    metadata: z.record(z.array(z.string()).min(1)).optional(),
  })
  .superRefine((preset, ctx) => {
    if (preset.groups !== undefined && preset.filters !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'use either groups or filters, not both' });
    }
    if (preset.tree !== undefined && preset.filters === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tree'], message: 'tree needs filters' });
    }
  });

export type Preset = z.infer<typeof presetSchema>;

export const presetFileSchema = z.record(presetSchema);

export type PresetFile = z.infer<typeof presetFileSchema>;

export interface CompiledScreen {
  name: string;
  /** Leaves of the tree, addressed by index. */
  filters: KpiFilter[];
  /** `null` when the preset has no KPI filters: every instrument passes. */
  tree: LogicNode | null;
  metadata: Record<string, string[]>;
}

// ============================================================================
// Loading
// ============================================================================

export function parsePresetFile(text: string, source = 'presets file'): PresetFile {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    throw new PresetError(`${source} is not valid JSON`);
  }
  const result = presetFileSchema.safeParse(decoded);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new PresetError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/** Pick a preset by name and compile it into filters plus a logic tree. */
export function compilePreset(presets: PresetFile, name: string): CompiledScreen {
  const preset = presets[name];
  if (!preset) {
    const known = Object.keys(presets);
    throw new PresetError(
      `Unknown preset "${name}"${known.length > 0 ? `; available: ${known.join(', ')}` : ''}`,
    );
  }

  const metadata = preset.metadata ?? {};

  if (preset.filters !== undefined) {
    const filters = preset.filters;
    const tree = preset.tree ?? combine('AND', filters.map((_, idx) => idx));
    if (tree !== null) {
      const missing = missingLeaves(tree, filters.length);
      if (missing.length > 0) {
        throw new PresetError(
          `Preset "${name}" refers to missing filter index ${missing.join(', ')} (it has ${filters.length})`,
        );
      }
    }
    return checkKpiNames({ name, filters, tree, metadata });
  }

  const filters: KpiFilter[] = [];
  const groupNodes: LogicNode[] = [];

  for (const group of preset.groups ?? []) {
    const kpiNodes: LogicNode[] = [];
    for (const entry of group.kpis) {
      const leaves = entry.methods.map((method) => filters.push({ ...method, kpi: entry.kpi }) - 1);
      const node = combine(entry.methodOperator, leaves);
      if (node !== null) {
        kpiNodes.push(node);
      }
    }
    const node = combine(group.operator, kpiNodes);
    if (node !== null) {
      groupNodes.push(node);
    }
  }

  return checkKpiNames({ name, filters, tree: combine(preset.groupOperator, groupNodes), metadata });
}

/** Leaf indices in `tree` with no matching filter. Empty when the tree is valid. */
export function missingLeaves(tree: LogicNode, filterCount: number): number[] {
  if (typeof tree === 'number') {
    return tree < filterCount ? [] : [tree];
  }
  return tree.children.flatMap((child) => missingLeaves(child, filterCount));
}

function checkKpiNames(screen: CompiledScreen): CompiledScreen {
  const reserved = new Set<string>(FIXED_COLUMNS);
  const clash = screen.filters.find((filter) => reserved.has(filter.kpi));
  if (clash) {
    throw new PresetError(`Preset "${screen.name}" uses reserved column name "${clash.kpi}" as a KPI`);
  }
  return screen;
}

function combine(type: LogicOperator, children: LogicNode[]): LogicNode | null {
  if (children.length === 0) {
    return null;
  }
  if (children.length === 1) {
    return children[0];
  }
  return { type, children };
}
