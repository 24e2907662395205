/**
 * Manifest Store
 * Typed construction, validation, loading and built-in presets
 */

export { ManifestStore } from './store';
export { loadManifestFile, loadManifestStore, parseManifests } from './loader';
export { parseManifest, collectManifestViolations } from './schemas';
export {
  networkPolicy,
  serviceMonitor,
  service,
  toKubeObject,
  namespacePeer,
  cidrPeer,
  podPeer,
  tcp,
  type ManifestMeta,
} from './builders';
export { selectorRules, isAllowAll, findPermissiveRules, type PermissiveRule } from './policy';
export { selectorMatches, formatSelector } from './selectors';
export {
  keplerAccessManifests,
  monitoringAccessManifests,
  MANIFEST_PRESETS,
  isManifestPreset,
  presetStore,
  type ManifestPresetName,
  type PresetOptions,
} from './catalog';
