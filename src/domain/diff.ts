import { debug, warn } from '../debug.js';
import { compareRecords, summarizeRecord } from './compare.js';
import { indexByIdentity } from './identity.js';
import { classifySeverity, matchSeverityRule, severityRank, type SeverityContext, type SeverityInput } from './severity.js';
import {
  RESOURCE_KINDS,
  type ChangeCounts,
  type ChangeRecord,
  type ChangeSet,
  type KindTotal,
  type ResourceRecord,
  type SeverityConfig,
  type SeverityCounts,
  type Snapshot,
} from './types.js';

const plural = (n: number, unit: string): string => `${n} ${unit}${n === 1 ? '' : 's'}`;

export const formatElapsed = (previous?: string, current?: string): string => {
  if (!previous || !current) return 'Unknown';
  const from = Date.parse(previous);
  const to = Date.parse(current);
  if (Number.isNaN(from) || Number.isNaN(to) || to < from) return 'Unknown';

  const minutes = Math.trunc((to - from) / 60_000);
  if (minutes < 60) return plural(minutes, 'minute');
  return `${plural(Math.floor(minutes / 60), 'hour')}, ${plural(minutes % 60, 'minute')}`;
};

export const tallyChanges = (changes: readonly ChangeRecord[]): ChangeCounts => {
  const counts: ChangeCounts = { additions: 0, deletions: 0, modifications: 0, restarts: 0 };
  for (const change of changes) {
    switch (change.changeType) {
      case 'Added':
        counts.additions += 1;
        break;
      case 'Deleted':
        counts.deletions += 1;
        break;
      case 'Modified':
        counts.modifications += 1;
        break;
      case 'Restarted':
        counts.restarts += 1;
        break;
    }
  }
  return counts;
};

export const tallySeverities = (changes: readonly ChangeRecord[]): SeverityCounts => ({
  critical: changes.filter((c) => c.severity === 'Critical').length,
  important: changes.filter((c) => c.severity === 'Important').length,
  informational: changes.filter((c) => c.severity === 'Informational').length,
});

export const kindTotals = (previous: Snapshot, current: Snapshot): KindTotal[] =>
  RESOURCE_KINDS.map((kind) => {
    const before = previous.resourceRecords.filter((r) => r.kind === kind).length;
    const after = current.resourceRecords.filter((r) => r.kind === kind).length;
    return { kind, previous: before, current: after, change: after - before };
  });

export const compareChanges = (a: ChangeRecord, b: ChangeRecord): number =>
  severityRank(a.severity) - severityRank(b.severity) ||
  (a.namespace ?? '').localeCompare(b.namespace ?? '') ||
  a.kind.localeCompare(b.kind) ||
  a.name.localeCompare(b.name) ||
  a.changeType.localeCompare(b.changeType);

export const emptyChangeSet = (snapshots: readonly Snapshot[] = []): ChangeSet => ({
  comparable: false,
  currentTimestamp: snapshots.at(-1)?.collectedAt,
  elapsed: 'Unknown',
  changes: [],
  counts: { additions: 0, deletions: 0, modifications: 0, restarts: 0 },
  severityCounts: { critical: 0, important: 0, informational: 0 },
  kindTotals: [],
  collisions: [],
});

const toChange = (input: SeverityInput, detail: string, ctx: SeverityContext): ChangeRecord => {
  const severity = classifySeverity(input, ctx);
  debug('diff change', {
    kind: input.kind,
    namespace: input.namespace,
    name: input.name,
    changeType: input.changeType,
    rule: matchSeverityRule(input, ctx) ?? 'default',
  });

  const change: ChangeRecord = {
    kind: input.kind,
    namespace: input.namespace,
    name: input.name,
    changeType: input.changeType,
    severity,
    detail,
  };
  if (input.before) change.beforeSummary = summarizeRecord(input.before);
  if (input.after) change.afterSummary = summarizeRecord(input.after);
  if (input.restartDelta !== undefined) change.restartDelta = input.restartDelta;
  return change;
};

const lifecycleDetail = (verb: string, record: ResourceRecord): string => {
  const summary = summarizeRecord(record);
  return summary ? `${verb} (${summary})` : verb;
};

/**
 * Computes the change-set from `previous` (older) to `current` (newer).
 * Records are joined on `(kind, namespace, name)` only.
 */
export const diffSnapshots = (previous: Snapshot, current: Snapshot, config: SeverityConfig): ChangeSet => {
  debug('diffSnapshots start', {
    previous: previous.collectedAt,
    current: current.collectedAt,
    previousRecords: previous.resourceRecords.length,
    currentRecords: current.resourceRecords.length,
  });

  const a = indexByIdentity(previous.resourceRecords);
  const b = indexByIdentity(current.resourceRecords);
  const collisions = [...new Set([...a.collisions, ...b.collisions])].sort();
  for (const key of collisions) {
    warn('duplicate resource identity in snapshot; keeping the last record', { key });
  }

  const ctx: SeverityContext = {
    config,
    cp4iNamespaces: new Set([...previous.cp4iNamespaces, ...current.cp4iNamespaces]),
  };

  const changes: ChangeRecord[] = [];

  for (const [key, after] of b.records) {
    const before = a.records.get(key);
    if (!before) {
      changes.push(
        toChange(
          { kind: after.kind, namespace: after.namespace, name: after.name, changeType: 'Added', after },
          lifecycleDetail('added', after),
          ctx,
        ),
      );
      continue;
    }

    const detection = compareRecords(before, after);
    if (!detection) continue;
    changes.push(
      toChange(
        {
          kind: after.kind,
          namespace: after.namespace,
          name: after.name,
          changeType: detection.changeType,
          before,
          after,
          restartDelta: detection.restartDelta,
        },
        detection.detail,
        ctx,
      ),
    );
  }

  for (const [key, before] of a.records) {
    if (b.records.has(key)) continue;
    changes.push(
      toChange(
        { kind: before.kind, namespace: before.namespace, name: before.name, changeType: 'Deleted', before },
        lifecycleDetail('deleted', before),
        ctx,
      ),
    );
  }

  changes.sort(compareChanges);

  const changeSet: ChangeSet = {
    comparable: true,
    previousTimestamp: previous.collectedAt,
    currentTimestamp: current.collectedAt,
    elapsed: formatElapsed(previous.collectedAt, current.collectedAt),
    changes,
    counts: tallyChanges(changes),
    severityCounts: tallySeverities(changes),
    kindTotals: kindTotals(previous, current),
    collisions,
  };

  debug('diffSnapshots end', { changes: changes.length, counts: changeSet.counts });
  return changeSet;
};

/**
 * Diffs the two most recent snapshots of an oldest-to-newest history. With fewer
 * than two there is nothing to compare and an empty change-set is returned.
 */
export const diffHistory = (snapshots: readonly Snapshot[], config: SeverityConfig): ChangeSet => {
  if (snapshots.length < 2) {
    debug('diffHistory insufficient history', { snapshots: snapshots.length });
    return emptyChangeSet(snapshots);
  }
  const [previous, current] = snapshots.slice(-2);
  return diffSnapshots(previous, current, config);
};
