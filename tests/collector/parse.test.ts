import { describe, expect, it } from 'vitest';
import {
  categorizeTopic,
  parseClusterVersion,
  isCp4iOperatorName,
  parseKafkaTopics,
  parseNodes,
  parsePods,
  parseRouteHost,
  parseRoutes,
} from '../../src/collector/parse.js';

describe('parsePods', () => {
  it('sums restarts and requests across containers', () => {
    const { records, skipped } = parsePods({
      items: [
        {
          metadata: { name: 'ir-0', namespace: 'cp4i', labels: { app: 'orders' } },
          spec: {
            nodeName: 'w1',
            containers: [
              { resources: { requests: { cpu: '250m', memory: '256Mi' } } },
              { resources: { requests: { cpu: '1' } } },
            ],
          },
          status: {
            phase: 'Running',
            containerStatuses: [
              { ready: true, restartCount: 1 },
              { ready: false, restartCount: 3 },
            ],
          },
        },
      ],
    });

    expect(skipped).toBe(0);
    expect(records).toEqual([
      {
        kind: 'Pod',
        namespace: 'cp4i',
        name: 'ir-0',
        labels: { app: 'orders' },
        creationTimestamp: undefined,
        phase: 'Running',
        restartCount: 4,
        ready: '1/2',
        nodeName: 'w1',
        cpuRequestCores: 1.25,
        memoryRequestBytes: 256 * 1024 * 1024,
      },
    ]);
  });

  it('leaves the restart count unknown when container statuses are absent', () => {
    const { records } = parsePods({ items: [{ metadata: { name: 'pending-0', namespace: 'cp4i' }, status: { phase: 'Pending' } }] });
    expect(records[0].restartCount).toBeUndefined();
    expect(records[0].ready).toBeUndefined();
    expect(records[0].cpuRequestCores).toBeUndefined();
  });

  it('returns nothing for a payload that is not a list', () => {
    expect(parsePods(undefined)).toEqual({ records: [], skipped: 0 });
    expect(parsePods({ kind: 'Status' })).toEqual({ records: [], skipped: 0 });
  });
});

describe('parseNodes', () => {
  it('derives readiness and roles', () => {
    const { records } = parseNodes({
      items: [
        {
          metadata: { name: 'm1', labels: { 'node-role.kubernetes.io/master': '', 'node-role.kubernetes.io/control-plane': '' } },
          status: { conditions: [{ type: 'Ready', status: 'False' }] },
        },
        { metadata: { name: 'w1' }, status: { conditions: [{ type: 'MemoryPressure', status: 'False' }] } },
        { metadata: { name: 'w2' } },
      ],
    });

    expect(records.map((n) => [n.name, n.status, n.roles])).toEqual([
      ['m1', 'NotReady', 'control-plane,master'],
      ['w1', 'Unknown', 'worker'],
      ['w2', undefined, 'worker'],
    ]);
  });
});

describe('parseRoutes', () => {
  it('builds the URL from host, path and TLS', () => {
    const { records } = parseRoutes({
      items: [
        { metadata: { name: 'a', namespace: 'cp4i' }, spec: { host: 'a.example.test', tls: { termination: 'edge' } } },
        { metadata: { name: 'b', namespace: 'cp4i' }, spec: { host: 'b.example.test', path: '/api' } },
      ],
    });
    expect(records.map((r) => r.url)).toEqual(['https://a.example.test/', 'http://b.example.test/api']);
  });
});

describe('parseKafkaTopics', () => {
  it('takes the owning cluster from the label, else the owner reference', () => {
    const { records } = parseKafkaTopics({
      items: [
        {
          metadata: { name: 'orders.enriched', namespace: 'es', ownerReferences: [{ name: 'es-main' }] },
          spec: { partitions: 6, replicas: 3, config: { 'retention.ms': 604800000 } },
          status: { conditions: [{ type: 'NotReady', status: 'False' }, { type: 'Ready', status: 'True' }] },
        },
      ],
    });
    expect(records[0]).toMatchObject({
      cluster: 'es-main',
      retentionMs: '604800000',
      status: 'Ready',
      category: 'enriched',
    });
  });
});

describe('categorizeTopic', () => {
  it('buckets by naming convention', () => {
    expect(categorizeTopic('orders.raw')).toBe('raw');
    expect(categorizeTopic('orders.curated')).toBe('curated');
    expect(categorizeTopic('orders.dlq')).toBe('dlq');
    expect(categorizeTopic('payments')).toBe('general');
  });

  it('treats cur as curated only when it is a whole name segment', () => {
    expect(categorizeTopic('orders.cur.v1')).toBe('curated');
    expect(categorizeTopic('cur-orders')).toBe('curated');
    expect(categorizeTopic('orders_cur')).toBe('curated');
    expect(categorizeTopic('secure-events')).toBe('general');
    expect(categorizeTopic('current-orders')).toBe('general');
  });
});

describe('parseClusterVersion', () => {
  it('keeps the desired version and the three newest history entries', () => {
    const info = parseClusterVersion({
      status: {
        desired: { version: '4.15.2' },
        history: [
          { version: '4.15.2', state: 'Partial', completionTime: null },
          { version: '4.15.0', state: 'Completed' },
          { state: 'Completed' },
          { version: '4.14.9', state: 'Completed' },
          { version: '4.14.1', state: 'Completed' },
        ],
      },
    });
    expect(info).toEqual({
      version: '4.15.2',
      history: [
        { version: '4.15.2', state: 'Partial', completionTime: undefined },
        { version: '4.15.0', state: 'Completed', completionTime: undefined },
        { version: '4.14.9', state: 'Completed', completionTime: undefined },
      ],
    });
  });

  it('yields an empty result for output it cannot read', () => {
    expect(parseClusterVersion(undefined)).toEqual({ history: [] });
  });
});

describe('isCp4iOperatorName', () => {
  it('recognises CP4I product names', () => {
    expect(isCp4iOperatorName('IBM Event Streams')).toBe(true);
    expect(isCp4iOperatorName('Red Hat OpenShift Logging')).toBe(false);
  });
});

describe('parseRouteHost', () => {
  it('reads the host of a single route', () => {
    expect(parseRouteHost({ spec: { host: 'boot.example.test' } })).toBe('boot.example.test');
    expect(parseRouteHost({ spec: {} })).toBeUndefined();
  });
});
