import { compareChanges } from './diff.js';
import { SEVERITY_ORDER, type ChangeRecord, type ResourceKind, type Severity } from './types.js';

/** Label used for cluster-scoped changes in namespace groupings. */
export const CLUSTER_SCOPE = '(cluster)';

export interface KindGroup {
  kind: ResourceKind;
  changes: ChangeRecord[];
}

export interface NamespaceGroup {
  namespace: string;
  count: number;
  kinds: KindGroup[];
}

export interface SeverityGroup {
  severity: Severity;
  count: number;
  namespaces: NamespaceGroup[];
}

export const groupBy = <T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> => {
  const map = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const bucket = map.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      map.set(key, [item]);
    }
  }
  return map;
};

const byKey = <K extends string>(a: [K, unknown], b: [K, unknown]): number => a[0].localeCompare(b[0]);

const groupKinds = (changes: readonly ChangeRecord[]): KindGroup[] =>
  [...groupBy(changes, (c) => c.kind).entries()]
    .sort(byKey)
    .map(([kind, items]) => ({ kind, changes: [...items].sort(compareChanges) }));

export const groupByNamespace = (changes: readonly ChangeRecord[]): NamespaceGroup[] =>
  [...groupBy(changes, (c) => c.namespace ?? CLUSTER_SCOPE).entries()]
    .sort(byKey)
    .map(([namespace, items]) => ({ namespace, count: items.length, kinds: groupKinds(items) }));

/**
 * Severity → namespace → kind view of a change list. Builds new arrays only;
 * the input list is left as it was.
 */
export const groupChanges = (changes: readonly ChangeRecord[]): SeverityGroup[] => {
  const bySeverity = groupBy(changes, (c) => c.severity);
  return SEVERITY_ORDER.filter((severity) => bySeverity.has(severity)).map((severity) => {
    const items = bySeverity.get(severity) ?? [];
    return { severity, count: items.length, namespaces: groupByNamespace(items) };
  });
};
