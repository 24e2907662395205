/**
 * Persisted machine profile format: a JSON object of cluster name -> record,
 * snake_case keys, memory share as a "70%" string
 */

import { z } from 'zod';
import type { Violation } from '../errors';
import { CPU_METHODS, type MachineProfile } from '../domain/types/profile';

const count = z.number().int().positive();

const PERCENT = /^\d+(\.\d+)?%$/;

export const ProfileRecordSchema = z
  .object({
    cluster: z.string().min(1),
    site: z.string().min(1).optional(),
    cpu_threads: count,
    cpu_cores: count.optional(),
    sockets: count.optional(),
    threads_per_core: count.optional(),
    memory_gb: z.number().int().nonnegative().optional(),
    cpu_model: z.string().optional(),
    cpu_base_mhz: count.optional(),
    cpu_max_mhz: count.optional(),
    stress_cpu_threads: count,
    // cores / 2 rounds down to 0 on single-core hosts
    stress_vm_workers: z.number().int().nonnegative(),
    stress_vm_memory: z.string().regex(PERCENT, 'must be a percentage such as "70%"'),
    cpu_method: z.enum(CPU_METHODS),
  })
  .superRefine((record, ctx) => {
    if (record.stress_cpu_threads > record.cpu_threads) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stress_cpu_threads'],
        message: `must not exceed cpu_threads (${record.cpu_threads})`,
      });
    }
    if (
      record.cpu_cores !== undefined &&
      record.threads_per_core !== undefined &&
      record.cpu_cores * record.threads_per_core !== record.cpu_threads
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cpu_threads'],
        message:
          'must equal cpu_cores x threads_per_core ' +
          `(${record.cpu_cores * record.threads_per_core})`,
      });
    }
    const percent = Number.parseFloat(record.stress_vm_memory);
    if (PERCENT.test(record.stress_vm_memory) && !(percent > 0 && percent <= 100)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stress_vm_memory'],
        message: 'must be within (0%, 100%]',
      });
    }
    if (
      record.cpu_base_mhz !== undefined &&
      record.cpu_max_mhz !== undefined &&
      record.cpu_base_mhz > record.cpu_max_mhz
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cpu_base_mhz'],
        message: `must not exceed cpu_max_mhz (${record.cpu_max_mhz})`,
      });
    }
  });

export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;

export function fromRecord(record: ProfileRecord): MachineProfile {
  const profile: MachineProfile = {
    clusterName: record.cluster,
    cpuThreads: record.cpu_threads,
    stressCpuThreads: record.stress_cpu_threads,
    stressVmWorkers: record.stress_vm_workers,
    stressVmMemoryPercent: Number.parseFloat(record.stress_vm_memory),
    cpuMethod: record.cpu_method,
  };
  if (record.site !== undefined) profile.site = record.site;
  if (record.cpu_cores !== undefined) profile.cpuCores = record.cpu_cores;
  if (record.sockets !== undefined) profile.sockets = record.sockets;
  if (record.threads_per_core !== undefined) profile.threadsPerCore = record.threads_per_core;
  if (record.memory_gb !== undefined) profile.memoryGB = record.memory_gb;
  if (record.cpu_model !== undefined) profile.cpuModel = record.cpu_model;
  if (record.cpu_base_mhz !== undefined) profile.cpuBaseMHz = record.cpu_base_mhz;
  if (record.cpu_max_mhz !== undefined) profile.cpuMaxMHz = record.cpu_max_mhz;
  return profile;
}

/**
 * Persisted form, keys in file order; optional fields appear only when set
 */
export function toRecord(profile: MachineProfile): ProfileRecord {
  return {
    cluster: profile.clusterName,
    ...(profile.site !== undefined && { site: profile.site }),
    cpu_threads: profile.cpuThreads,
    ...(profile.cpuCores !== undefined && { cpu_cores: profile.cpuCores }),
    ...(profile.sockets !== undefined && { sockets: profile.sockets }),
    ...(profile.threadsPerCore !== undefined && { threads_per_core: profile.threadsPerCore }),
    ...(profile.memoryGB !== undefined && { memory_gb: profile.memoryGB }),
    ...(profile.cpuModel !== undefined && { cpu_model: profile.cpuModel }),
    ...(profile.cpuBaseMHz !== undefined && { cpu_base_mhz: profile.cpuBaseMHz }),
    ...(profile.cpuMaxMHz !== undefined && { cpu_max_mhz: profile.cpuMaxMHz }),
    stress_cpu_threads: profile.stressCpuThreads,
    stress_vm_workers: profile.stressVmWorkers,
    stress_vm_memory: `${profile.stressVmMemoryPercent}%`,
    cpu_method: profile.cpuMethod,
  };
}

/**
 * Every violation of one raw record, with fields prefixed by `key`
 */
export function collectRecordViolations(key: string, raw: unknown): Violation[] {
  const parsed = ProfileRecordSchema.safeParse(raw);
  const violations: Violation[] = parsed.success
    ? []
    : parsed.error.issues.map((issue) => ({
        field: [key, ...issue.path].join('.'),
        message: issue.message,
      }));

  const cluster =
    typeof raw === 'object' && raw !== null && 'cluster' in raw ? raw.cluster : undefined;
  if (typeof cluster === 'string' && cluster !== key) {
    violations.push({ field: `${key}.cluster`, message: `must equal the profile key "${key}"` });
  }
  return violations;
}
