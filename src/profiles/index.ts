/**
 * Machine Profile Registry
 */

export { ProfileRegistry, type LoadOptions } from './registry';
export {
  ProfileRecordSchema,
  fromRecord,
  toRecord,
  collectRecordViolations,
  type ProfileRecord,
} from './schema';
export { deriveStressParameters, createProfile, memoryPercentFor, PROFILE_DEFAULTS } from './derive';
export { detectHostHardware, parseLscpu, parseFreeGigabytes, type LscpuInfo } from './detect';
