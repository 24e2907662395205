/**
 * Manifest Store - target-state documents keyed by (namespace, kind, name)
 */

import { ValidationError } from '../errors';
import { describeRef, refKey, type Manifest, type ObjectRef } from '../domain/types/manifest';
import { toKubeObject } from './builders';
import { parseManifest } from './schemas';

export class ManifestStore {
  private readonly manifests = new Map<string, Manifest>();

  constructor(manifests: Manifest[] = []) {
    for (const manifest of manifests) {
      this.add(manifest);
    }
  }

  /**
   * Validate and store a manifest. Keys are unique within a store.
   */
  add(manifest: Manifest): this {
    const key = refKey(manifest);
    if (this.manifests.has(key)) {
      throw new ValidationError(`Duplicate manifest ${describeRef(manifest)}`, [
        { field: key, message: 'manifest identity must be unique within a target set' },
      ]);
    }

    // Round-trip through the wire schema so typed builders get the same checks as files
    const validated = parseManifest(toKubeObject(manifest), describeRef(manifest));
    this.manifests.set(key, validated);
    return this;
  }

  get(ref: ObjectRef): Manifest | undefined {
    return this.manifests.get(refKey(ref));
  }

  has(ref: ObjectRef): boolean {
    return this.manifests.has(refKey(ref));
  }

  /**
   * Manifests in insertion order
   */
  list(): Manifest[] {
    return [...this.manifests.values()];
  }

  get size(): number {
    return this.manifests.size;
  }
}
