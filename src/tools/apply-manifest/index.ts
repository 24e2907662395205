/**
 * Apply Manifest Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export {
  applyManifest,
  applyAll,
  resolveTargetStore,
  coversDesired,
  isUpToDate,
  SERVER_MANAGED_LABELS,
} from './tool';
export type { ApplyAction, ApplyOutcome, ApplyDeps } from './tool';
export { applyManifestsSchema, manifestPresetSchema, type ApplyManifestsParams } from './schema';
