import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProfileRegistry, createProfile, toRecord } from '../../../src/profiles';
import { ErrorCodes, NotFoundError, ValidationError } from '../../../src/errors';

const BUNDLED = join(__dirname, '../../../configs/machine_profiles.json');

const record = (cluster: string, overrides: Record<string, unknown> = {}): unknown => ({
  cluster,
  cpu_threads: 4,
  stress_cpu_threads: 4,
  stress_vm_workers: 1,
  stress_vm_memory: '70%',
  cpu_method: 'matrixprod',
  ...overrides,
});

function violationsOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error instanceof ValidationError ? error.violations : error;
  }
  return undefined;
}

describe('ProfileRegistry', () => {
  describe('bundled profiles', () => {
    it('should load every bundled profile', async () => {
      const registry = await ProfileRegistry.load(BUNDLED);

      expect(registry.names()).toEqual(['gros', 'paravance', 'troll']);
      expect(registry.get('paravance')).toMatchObject({
        clusterName: 'paravance',
        site: 'rennes',
        cpuThreads: 32,
        cpuCores: 16,
        stressVmWorkers: 8,
        stressVmMemoryPercent: 70,
        cpuMethod: 'matrixprod',
      });
    });

    it('should name the known profiles when one is missing', async () => {
      const registry = await ProfileRegistry.load(BUNDLED);

      expect(() => registry.get('grisou')).toThrow(
        'No machine profile named grisou (known: gros, paravance, troll)',
      );
    });
  });

  describe('fromRecords', () => {
    it('should report the violations of every profile together', () => {
      const violations = violationsOf(() =>
        ProfileRegistry.fromRecords({
          small: record('small', { stress_cpu_threads: 8 }),
          renamed: record('other'),
          fine: record('fine'),
        }),
      );

      expect(violations).toEqual([
        { field: 'small.stress_cpu_threads', message: 'must not exceed cpu_threads (4)' },
        { field: 'renamed.cluster', message: 'must equal the profile key "renamed"' },
      ]);
    });

    it('should check the thread topology and memory share', () => {
      const violations = violationsOf(() =>
        ProfileRegistry.fromRecords({
          odd: record('odd', { cpu_cores: 4, threads_per_core: 2, stress_vm_memory: '150%' }),
        }),
      );

      expect(violations).toEqual([
        { field: 'odd.cpu_threads', message: 'must equal cpu_cores x threads_per_core (8)' },
        { field: 'odd.stress_vm_memory', message: 'must be within (0%, 100%]' },
      ]);
    });

    it('should report missing fields', () => {
      const violations = violationsOf(() =>
        ProfileRegistry.fromRecords({ bare: { cluster: 'bare' } }),
      );

      expect(violations).toContainEqual({ field: 'bare.cpu_threads', message: 'Required' });
      expect(violations).toContainEqual({ field: 'bare.cpu_method', message: 'Required' });
    });

    it('should accept zero VM workers', () => {
      const registry = ProfileRegistry.fromRecords({
        tiny: record('tiny', { cpu_threads: 1, stress_cpu_threads: 1, stress_vm_workers: 0 }),
      });

      expect(registry.get('tiny').stressVmWorkers).toBe(0);
    });

    it('should reject a document that is not an object', () => {
      expect(violationsOf(() => ProfileRegistry.fromRecords([record('a')]))).toEqual([
        { field: '(root)', message: 'expected an object' },
      ]);
    });
  });

  describe('withProfile', () => {
    const profile = createProfile('nova', 'lyon', {
      cpuThreads: 32,
      cpuCores: 16,
      sockets: 2,
      threadsPerCore: 2,
      memoryGB: 64,
    });

    it('should return a new registry with the profile appended', () => {
      const before = ProfileRegistry.fromRecords({ fine: record('fine') });

      const after = before.withProfile(profile);

      expect(after.names()).toEqual(['fine', 'nova']);
      expect(before.size).toBe(1);
    });

    it('should never replace an existing profile', () => {
      const registry = ProfileRegistry.empty().withProfile(profile);

      expect(() => registry.withProfile(profile)).toThrow('Machine profile nova already exists');
    });
  });

  describe('persistence', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'profiles-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should write the snake_case form and read it back', async () => {
      const path = join(dir, 'nested', 'profiles.json');
      const profile = createProfile('nova', 'lyon', {
        cpuThreads: 8,
        cpuCores: 4,
        sockets: 1,
        threadsPerCore: 2,
        memoryGB: 16,
        cpuModel: 'Test CPU',
      });

      await ProfileRegistry.empty().withProfile(profile).save(path);
      const reloaded = await ProfileRegistry.load(path);
      const written = await readFile(path, 'utf-8');

      expect(reloaded.get('nova')).toEqual(profile);
      expect(written.endsWith('}\n')).toBe(true);
      expect(JSON.parse(written)).toEqual({ nova: toRecord(profile) });
    });

    it('should start empty from a missing file when allowed', async () => {
      const registry = await ProfileRegistry.load(join(dir, 'absent.json'), {
        allowMissing: true,
      });

      expect(registry.size).toBe(0);
    });

    it('should fail on a missing file otherwise', async () => {
      await expect(ProfileRegistry.load(join(dir, 'absent.json'))).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });

    it('should fail on a file that is not JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ "gros": ', 'utf-8');

      await expect(ProfileRegistry.load(path)).rejects.toMatchObject({
        code: ErrorCodes.VALIDATION_FAILED,
        message: `${path} is not valid JSON`,
      });
    });
  });
});
