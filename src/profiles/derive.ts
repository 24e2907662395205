/**
 * Stress parameters from hardware topology
 */

import { ValidationError } from '../errors';
import type {
  HostHardware,
  MachineProfile,
  StressParameters,
} from '../domain/types/profile';
import { collectRecordViolations, toRecord } from './schema';

export const PROFILE_DEFAULTS = {
  cpuMethod: 'matrixprod',
  cpuModel: 'Unknown',
  cpuBaseMHz: 2000,
  cpuMaxMHz: 3000,
} as const;

/**
 * Memory tiers: large-memory hosts can give stress workers a bigger share
 */
export function memoryPercentFor(memoryGB?: number): number {
  if (memoryGB === undefined) return 70;
  if (memoryGB >= 500) return 80;
  if (memoryGB >= 300) return 75;
  return 70;
}

export function deriveStressParameters(
  hardware: Pick<HostHardware, 'cpuThreads' | 'cpuCores' | 'memoryGB'>,
): StressParameters {
  return {
    stressCpuThreads: hardware.cpuThreads,
    stressVmWorkers: Math.floor(hardware.cpuCores / 2),
    stressVmMemoryPercent: memoryPercentFor(hardware.memoryGB),
    cpuMethod: PROFILE_DEFAULTS.cpuMethod,
  };
}

/**
 * Build a validated profile for a host. CPU frequencies fall back to
 * 2000/3000 MHz when lscpu does not report them.
 */
export function createProfile(
  clusterName: string,
  site: string,
  hardware: HostHardware,
): MachineProfile {
  const profile: MachineProfile = {
    clusterName,
    site,
    cpuThreads: hardware.cpuThreads,
    cpuCores: hardware.cpuCores,
    sockets: hardware.sockets,
    threadsPerCore: hardware.threadsPerCore,
    cpuModel: hardware.cpuModel ?? PROFILE_DEFAULTS.cpuModel,
    cpuBaseMHz: hardware.cpuMinMHz ?? PROFILE_DEFAULTS.cpuBaseMHz,
    cpuMaxMHz: hardware.cpuMaxMHz ?? PROFILE_DEFAULTS.cpuMaxMHz,
    ...deriveStressParameters(hardware),
  };
  if (hardware.memoryGB !== undefined) {
    profile.memoryGB = hardware.memoryGB;
  }

  const violations = collectRecordViolations(clusterName, toRecord(profile));
  if (violations.length > 0) {
    throw new ValidationError(`Derived profile ${clusterName} is invalid`, violations);
  }
  return profile;
}
