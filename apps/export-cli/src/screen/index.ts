export {
  PresetError,
  COMPARISON_OPERATORS,
  TREND_TYPES,
  compilePreset,
  missingLeaves,
  parsePresetFile,
  presetFileSchema,
} from './presets';
export type {
  CompiledScreen,
  ComparisonOperator,
  KpiFilter,
  KpiMethod,
  LogicNode,
  LogicOperator,
  Preset,
  PresetFile,
} from './presets';
export { compare, evaluateKpiFilter, evaluateLogicTree, matchesMetadata, selectWindow, windowSize } from './evaluate';
export type { KpiPoint } from './evaluate';
export { planRequests, requestFor, runScreen, screenToTable } from './screener';
export type { ScreenOutcome } from './screener';
