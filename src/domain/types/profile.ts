/**
 * Machine profile types - hardware topology plus stress-test parameters
 */

export const CPU_METHODS = ['matrixprod', 'fft', 'fibonacci', 'all'] as const;

export type CpuMethod = (typeof CPU_METHODS)[number];

export interface StressParameters {
  stressCpuThreads: number;
  stressVmWorkers: number;
  /** Share of memory given to stress VM workers, in (0, 100] */
  stressVmMemoryPercent: number;
  cpuMethod: CpuMethod;
}

export interface MachineProfile extends StressParameters {
  clusterName: string;
  site?: string;
  cpuThreads: number;
  cpuCores?: number;
  sockets?: number;
  threadsPerCore?: number;
  memoryGB?: number;
  cpuModel?: string;
  cpuBaseMHz?: number;
  cpuMaxMHz?: number;
}

/**
 * Topology read from the host (lscpu, free)
 */
export interface HostHardware {
  cpuThreads: number;
  cpuCores: number;
  sockets: number;
  threadsPerCore: number;
  memoryGB?: number;
  cpuModel?: string;
  cpuMinMHz?: number;
  cpuMaxMHz?: number;
}
