import { debug } from '../debug.js';
import type { ResourceKind, ResourceRecord } from './types.js';

export interface IdentityParts {
  kind: ResourceKind;
  namespace?: string;
  name: string;
}

export const identityKey = (parts: IdentityParts): string =>
  `${parts.kind}/${parts.namespace ?? ''}/${parts.name}`;

export interface IdentityIndex {
  records: Map<string, ResourceRecord>;
  collisions: string[];
}

/**
 * Indexes records by `(kind, namespace, name)`. A duplicate key is a collection
 * defect: the last record seen replaces the earlier one and the key is reported.
 */
export const indexByIdentity = (records: readonly ResourceRecord[]): IdentityIndex => {
  const map = new Map<string, ResourceRecord>();
  const collisions: string[] = [];

  for (const record of records) {
    const key = identityKey(record);
    if (map.has(key) && !collisions.includes(key)) {
      collisions.push(key);
    }
    map.set(key, record);
  }

  debug('indexByIdentity', { records: records.length, keys: map.size, collisions: collisions.length });
  return { records: map, collisions };
};
