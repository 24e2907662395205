/**
 * Host hardware detection from `lscpu` and `free -g`
 */

import { DependencyMissingError, InternalError, ValidationError, type Violation } from '../errors';
import type { HostHardware } from '../domain/types/profile';
import type { CommandRunner } from '../infrastructure/command-executor';

export interface LscpuInfo {
  cpuThreads: number;
  threadsPerCore: number;
  coresPerSocket: number;
  sockets: number;
  cpuModel?: string;
  cpuMinMHz?: number;
  cpuMaxMHz?: number;
}

function parseFields(output: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of output.split('\n')) {
    const index = line.indexOf(':');
    if (index <= 0) continue;
    const key = line.slice(0, index).trim();
    // first occurrence wins
    if (!fields.has(key)) {
      fields.set(key, line.slice(index + 1).trim());
    }
  }
  return fields;
}

/**
 * Parse `lscpu` output. Frequencies are truncated to whole MHz.
 */
export function parseLscpu(output: string): LscpuInfo {
  const fields = parseFields(output);
  const violations: Violation[] = [];

  const integer = (key: string): number => {
    const value = Number.parseInt(fields.get(key) ?? '', 10);
    if (Number.isNaN(value)) {
      violations.push({ field: key, message: 'missing or not an integer in lscpu output' });
    }
    return value;
  };
  const mhz = (key: string): number | undefined => {
    const value = Number.parseFloat(fields.get(key) ?? '');
    return Number.isNaN(value) ? undefined : Math.trunc(value);
  };

  const info: LscpuInfo = {
    cpuThreads: integer('CPU(s)'),
    threadsPerCore: integer('Thread(s) per core'),
    coresPerSocket: integer('Core(s) per socket'),
    sockets: integer('Socket(s)'),
  };
  if (violations.length > 0) {
    throw new ValidationError('Unexpected lscpu output', violations);
  }

  const model = fields.get('Model name');
  if (model) info.cpuModel = model;
  const min = mhz('CPU min MHz');
  if (min !== undefined) info.cpuMinMHz = min;
  const max = mhz('CPU max MHz');
  if (max !== undefined) info.cpuMaxMHz = max;
  return info;
}

/**
 * Total memory in GB from the `Mem:` row of `free -g`
 */
export function parseFreeGigabytes(output: string): number {
  const row = output.split('\n').find((line) => line.trim().startsWith('Mem:'));
  const total = Number.parseInt(row?.trim().split(/\s+/)[1] ?? '', 10);
  if (Number.isNaN(total)) {
    throw new ValidationError('Unexpected free output', [
      { field: 'Mem', message: 'missing total memory column' },
    ]);
  }
  return total;
}

async function runTool(runner: CommandRunner, command: string, args: string[]): Promise<string> {
  if (!(await runner.isAvailable(command))) {
    throw new DependencyMissingError(`${command} not found on PATH`, command);
  }
  const result = await runner.execute(command, args);
  if (result.exitCode !== 0) {
    throw new InternalError(
      `${[command, ...args].join(' ')} exited with ${result.exitCode}: ${result.stderr}`,
    );
  }
  return result.stdout;
}

export async function detectHostHardware(runner: CommandRunner): Promise<HostHardware> {
  const cpu = parseLscpu(await runTool(runner, 'lscpu', []));
  const memoryGB = parseFreeGigabytes(await runTool(runner, 'free', ['-g']));

  const hardware: HostHardware = {
    cpuThreads: cpu.cpuThreads,
    cpuCores: cpu.coresPerSocket * cpu.sockets,
    sockets: cpu.sockets,
    threadsPerCore: cpu.threadsPerCore,
    memoryGB,
  };
  if (cpu.cpuModel !== undefined) hardware.cpuModel = cpu.cpuModel;
  if (cpu.cpuMinMHz !== undefined) hardware.cpuMinMHz = cpu.cpuMinMHz;
  if (cpu.cpuMaxMHz !== undefined) hardware.cpuMaxMHz = cpu.cpuMaxMHz;
  return hardware;
}
