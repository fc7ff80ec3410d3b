import type {
  KafkaTopicRecord,
  NamespaceRecord,
  NodeRecord,
  OperatorRecord,
  PodRecord,
  ResourceRecord,
  RouteRecord,
  Snapshot,
} from '../src/domain/types.js';

export const pod = (name: string, namespace: string, fields: Partial<PodRecord> = {}): PodRecord => ({
  kind: 'Pod',
  name,
  namespace,
  labels: {},
  phase: 'Running',
  restartCount: 0,
  ready: '1/1',
  ...fields,
});

export const node = (name: string, fields: Partial<NodeRecord> = {}): NodeRecord => ({
  kind: 'Node',
  name,
  labels: {},
  status: 'Ready',
  roles: 'worker',
  ...fields,
});

export const namespace = (name: string, fields: Partial<NamespaceRecord> = {}): NamespaceRecord => ({
  kind: 'Namespace',
  name,
  labels: {},
  phase: 'Active',
  ...fields,
});

export const operator = (name: string, ns: string, fields: Partial<OperatorRecord> = {}): OperatorRecord => ({
  kind: 'Operator',
  name,
  namespace: ns,
  labels: {},
  displayName: name,
  version: '1.0.0',
  phase: 'Succeeded',
  ...fields,
});

export const topic = (name: string, ns: string, fields: Partial<KafkaTopicRecord> = {}): KafkaTopicRecord => ({
  kind: 'KafkaTopic',
  name,
  namespace: ns,
  labels: {},
  cluster: 'es-demo',
  partitions: 3,
  replicas: 3,
  status: 'Ready',
  ...fields,
});

export const route = (name: string, ns: string, fields: Partial<RouteRecord> = {}): RouteRecord => ({
  kind: 'Route',
  name,
  namespace: ns,
  labels: {},
  host: `${name}.apps.example.test`,
  path: '/',
  tls: true,
  url: `https://${name}.apps.example.test/`,
  service: name,
  ...fields,
});

export const snapshot = (
  collectedAt: string,
  resourceRecords: ResourceRecord[],
  fields: Partial<Snapshot> = {},
): Snapshot => ({
  clusterIdentity: 'cluster-abc.example.test',
  collectedAt,
  resourceRecords,
  cp4iNamespaces: ['cp4i'],
  metadata: { collectorVersion: 'test', errors: [], warnings: [] },
  ...fields,
});
