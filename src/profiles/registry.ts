/**
 * Machine Profile Registry
 *
 * Immutable set of named profiles. Adding a profile yields a new registry;
 * existing entries are never replaced.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { NotFoundError, ValidationError, getErrorMessage, type Violation } from '../errors';
import type { MachineProfile } from '../domain/types/profile';
import {
  ProfileRecordSchema,
  collectRecordViolations,
  fromRecord,
  toRecord,
  type ProfileRecord,
} from './schema';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface LoadOptions {
  /** Start from an empty registry when the file does not exist */
  allowMissing?: boolean;
}

export class ProfileRegistry {
  private readonly profiles: ReadonlyMap<string, MachineProfile>;

  private constructor(profiles: Map<string, MachineProfile>) {
    this.profiles = profiles;
  }

  static empty(): ProfileRegistry {
    return new ProfileRegistry(new Map());
  }

  /**
   * Validate a parsed profiles document, reporting every violation of every
   * profile at once
   */
  static fromRecords(data: unknown, source = 'profiles'): ProfileRegistry {
    if (!isRecord(data)) {
      throw new ValidationError(`${source} must be a JSON object of cluster name to profile`, [
        { field: '(root)', message: 'expected an object' },
      ]);
    }

    const violations: Violation[] = [];
    const profiles = new Map<string, MachineProfile>();

    for (const [key, raw] of Object.entries(data)) {
      const found = collectRecordViolations(key, raw);
      if (found.length > 0) {
        violations.push(...found);
        continue;
      }
      const parsed = ProfileRecordSchema.safeParse(raw);
      if (parsed.success) {
        profiles.set(key, fromRecord(parsed.data));
      }
    }

    if (violations.length > 0) {
      throw new ValidationError(`${source} contains invalid profiles`, violations);
    }
    return new ProfileRegistry(profiles);
  }

  static async load(path: string, options: LoadOptions = {}): Promise<ProfileRegistry> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (options.allowMissing && isRecord(error) && error.code === 'ENOENT') {
        return ProfileRegistry.empty();
      }
      throw new NotFoundError(`Cannot read profiles file ${path}: ${getErrorMessage(error)}`, path);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ValidationError(`${path} is not valid JSON`, [
        { field: path, message: getErrorMessage(error) },
      ]);
    }
    return ProfileRegistry.fromRecords(data, path);
  }

  get(name: string): MachineProfile {
    const profile = this.profiles.get(name);
    if (!profile) {
      const known = [...this.profiles.keys()].join(', ') || 'none';
      throw new NotFoundError(`No machine profile named ${name} (known: ${known})`, name);
    }
    return profile;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }

  get size(): number {
    return this.profiles.size;
  }

  /**
   * New registry with `profile` appended; its name must be unused
   */
  withProfile(profile: MachineProfile): ProfileRegistry {
    const name = profile.clusterName;
    if (this.profiles.has(name)) {
      throw new ValidationError(`Machine profile ${name} already exists`, [
        { field: name, message: 'profiles are append-only; choose another cluster name' },
      ]);
    }
    const violations = collectRecordViolations(name, toRecord(profile));
    if (violations.length > 0) {
      throw new ValidationError(`Machine profile ${name} is invalid`, violations);
    }

    const next = new Map(this.profiles);
    next.set(name, profile);
    return new ProfileRegistry(next);
  }

  serialize(): Record<string, ProfileRecord> {
    const out: Record<string, ProfileRecord> = {};
    for (const [name, profile] of this.profiles) {
      out[name] = toRecord(profile);
    }
    return out;
  }

  async save(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(this.serialize(), null, 2)}\n`, 'utf-8');
  }
}
