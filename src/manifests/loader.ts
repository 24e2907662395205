/**
 * Manifest file loading (YAML or JSON, multi-document)
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import { NotFoundError, ValidationError, getErrorMessage, type Violation } from '../errors';
import type { Manifest } from '../domain/types/manifest';
import { parseManifest } from './schemas';
import { ManifestStore } from './store';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand `kind: List` documents into their items
 */
function expandDocuments(documents: unknown[]): unknown[] {
  return documents.flatMap((doc) => {
    if (isRecord(doc) && doc.kind === 'List' && Array.isArray(doc.items)) {
      return doc.items;
    }
    return [doc];
  });
}

/**
 * Parse manifest documents from text. Every document is checked before failing.
 */
export function parseManifests(content: string, source = 'input'): Manifest[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (error) {
    throw ValidationError.invalidSpec(`${source} is not valid YAML`, [
      { field: source, message: getErrorMessage(error) },
    ]);
  }

  const manifests: Manifest[] = [];
  const violations: Violation[] = [];

  expandDocuments(documents)
    .filter((doc) => doc !== null && doc !== undefined)
    .forEach((doc, index) => {
      try {
        manifests.push(parseManifest(doc, `${source}#${index}`));
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        violations.push(...error.violations);
      }
    });

  if (violations.length > 0) {
    throw ValidationError.invalidSpec(`${source} contains invalid manifests`, violations);
  }
  if (manifests.length === 0) {
    throw ValidationError.invalidSpec(`${source} contains no manifests`, [
      { field: source, message: 'expected at least one document' },
    ]);
  }
  return manifests;
}

export async function loadManifestFile(path: string): Promise<Manifest[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new NotFoundError(`Cannot read manifest file ${path}: ${getErrorMessage(error)}`, path);
  }
  return parseManifests(content, path);
}

/**
 * Load a file straight into a store (duplicate identities are rejected)
 */
export async function loadManifestStore(path: string): Promise<ManifestStore> {
  return new ManifestStore(await loadManifestFile(path));
}
