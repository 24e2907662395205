/**
 * Install Chart Tool
 *
 * Exports the tool implementation, schema and presets for co-located access
 */

export { installChart, waitForPods } from './tool';
export type { InstallDeps, InstallOutcome, WaitCondition } from './tool';
export {
  chartReleaseSchema,
  waitConditionSchema,
  type ChartRelease,
  type ChartReleaseInput,
} from './schema';
export { helmScalar, toNestedValues, valuesMatch, parseSetFlags, type HelmScalar } from './values';
export {
  keplerRelease,
  CHART_PRESETS,
  isChartPreset,
  type ChartPresetName,
  type ChartPresetOptions,
} from './presets';
