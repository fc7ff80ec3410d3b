import { describe, expect, it } from 'vitest';
import { diffSnapshots } from '../../src/domain/diff.js';
import { CLUSTER_SCOPE, groupByNamespace, groupChanges } from '../../src/domain/grouping.js';
import { DEFAULT_SEVERITY_CONFIG, type ChangeRecord } from '../../src/domain/types.js';
import { namespace, node, pod, route, snapshot, topic } from '../helpers.js';

const change = (fields: Partial<ChangeRecord> & Pick<ChangeRecord, 'name'>): ChangeRecord => ({
  kind: 'Pod',
  namespace: 'cp4i',
  changeType: 'Added',
  severity: 'Important',
  detail: 'added',
  ...fields,
});

describe('groupChanges', () => {
  it('nests severity, namespace and kind in a stable order', () => {
    const changes = [
      change({ name: 'topic-b', kind: 'KafkaTopic', namespace: 'es' }),
      change({ name: 'w1', kind: 'Node', namespace: undefined, severity: 'Critical', changeType: 'Modified' }),
      change({ name: 'pod-b' }),
      change({ name: 'pod-a' }),
      change({ name: 'team', kind: 'Namespace', namespace: undefined, severity: 'Informational' }),
    ];

    const groups = groupChanges(changes);

    expect(groups.map((g) => [g.severity, g.count])).toEqual([
      ['Critical', 1],
      ['Important', 3],
      ['Informational', 1],
    ]);
    expect(groups[0].namespaces[0].namespace).toBe(CLUSTER_SCOPE);

    const important = groups[1];
    expect(important.namespaces.map((n) => n.namespace)).toEqual(['cp4i', 'es']);
    expect(important.namespaces[0].kinds[0].changes.map((c) => c.name)).toEqual(['pod-a', 'pod-b']);
  });

  it('omits severities with no changes', () => {
    const groups = groupChanges([change({ name: 'x', severity: 'Informational' })]);
    expect(groups.map((g) => g.severity)).toEqual(['Informational']);
  });

  it('leaves the input list untouched', () => {
    const changes = [change({ name: 'b' }), change({ name: 'a' })];
    groupChanges(changes);
    expect(changes.map((c) => c.name)).toEqual(['b', 'a']);
  });

  it('gives identical output when applied twice to a diffed change-set', () => {
    const before = snapshot('2026-03-01T10:00:00.000Z', [
      node('w1'),
      pod('mq-qm-0', 'cp4i', { restartCount: 0 }),
      pod('ir-0', 'cp4i'),
      route('dash', 'cp4i'),
    ]);
    const after = snapshot('2026-03-01T10:05:00.000Z', [
      node('w1', { status: 'NotReady' }),
      pod('mq-qm-0', 'cp4i', { restartCount: 7 }),
      pod('es-kafka-0', 'es'),
      topic('orders.raw', 'es'),
      namespace('team-x'),
    ]);
    const cs = diffSnapshots(before, after, DEFAULT_SEVERITY_CONFIG);
    const changesBefore = structuredClone(cs.changes);

    expect(new Set(cs.changes.map((c) => c.severity)).size).toBeGreaterThan(1);
    expect(new Set(cs.changes.map((c) => c.kind)).size).toBeGreaterThan(2);
    expect(groupChanges(cs.changes)).toEqual(groupChanges(cs.changes));
    expect(cs.changes).toEqual(changesBefore);
  });
});

describe('groupByNamespace', () => {
  it('counts changes per namespace and splits them by kind', () => {
    const groups = groupByNamespace([
      change({ name: 'r', kind: 'Route' }),
      change({ name: 'p' }),
      change({ name: 'q', namespace: 'apic' }),
    ]);

    expect(groups.map((g) => [g.namespace, g.count])).toEqual([
      ['apic', 1],
      ['cp4i', 2],
    ]);
    expect(groups[1].kinds.map((k) => k.kind)).toEqual(['Pod', 'Route']);
  });
});
