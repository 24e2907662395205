/**
 * Helm infrastructure - helm CLI wrapper
 */

export {
  type HelmClient,
  type HelmClientOptions,
  type HelmRelease,
  type InstalledRelease,
  type UpgradeInstallRequest,
  createHelmClient,
  classifyHelmFailure,
  parseReleaseJson,
  setArgs,
  escapeSetValue,
} from './client';
