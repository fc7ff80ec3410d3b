import { z } from 'zod';
import type { Snapshot } from '../domain/types.js';

export const SNAPSHOT_FORMAT_VERSION = 1;

const base = {
  namespace: z.string().optional(),
  name: z.string().min(1),
  labels: z.record(z.string()).default({}),
  creationTimestamp: z.string().optional(),
};

const PodSchema = z.object({
  ...base,
  kind: z.literal('Pod'),
  phase: z.string().optional(),
  restartCount: z.number().int().nonnegative().optional(),
  ready: z.string().optional(),
  nodeName: z.string().optional(),
  cpuRequestCores: z.number().nonnegative().optional(),
  memoryRequestBytes: z.number().nonnegative().optional(),
});

const OperatorSchema = z.object({
  ...base,
  kind: z.literal('Operator'),
  displayName: z.string().optional(),
  version: z.string().optional(),
  phase: z.string().optional(),
  reason: z.string().optional(),
  isCp4i: z.boolean().optional(),
});

const NodeSchema = z.object({
  ...base,
  kind: z.literal('Node'),
  status: z.enum(['Ready', 'NotReady', 'Unknown']).optional(),
  roles: z.string().optional(),
  kubeletVersion: z.string().optional(),
  cpuCapacity: z.string().optional(),
  memoryCapacity: z.string().optional(),
});

const NamespaceSchema = z.object({
  ...base,
  kind: z.literal('Namespace'),
  phase: z.string().optional(),
});

const RouteSchema = z.object({
  ...base,
  kind: z.literal('Route'),
  host: z.string().optional(),
  path: z.string().optional(),
  tls: z.boolean().optional(),
  url: z.string().optional(),
  service: z.string().optional(),
});

const KafkaTopicSchema = z.object({
  ...base,
  kind: z.literal('KafkaTopic'),
  cluster: z.string().optional(),
  partitions: z.number().int().optional(),
  replicas: z.number().int().optional(),
  retentionMs: z.string().optional(),
  status: z.string().optional(),
  category: z.enum(['raw', 'enriched', 'curated', 'dlq', 'general']).optional(),
});

const EventStreamsInstanceSchema = z.object({
  ...base,
  kind: z.literal('EventStreamsInstance'),
  status: z.string().optional(),
  version: z.string().optional(),
  bootstrapServer: z.string().optional(),
});

export const ResourceRecordSchema = z.discriminatedUnion('kind', [
  PodSchema,
  OperatorSchema,
  NodeSchema,
  NamespaceSchema,
  RouteSchema,
  KafkaTopicSchema,
  EventStreamsInstanceSchema,
]);

export const SnapshotFileSchema = z.object({
  formatVersion: z.literal(SNAPSHOT_FORMAT_VERSION).default(SNAPSHOT_FORMAT_VERSION),
  clusterIdentity: z.string().min(1),
  collectedAt: z.string().datetime({ offset: true }),
  resourceRecords: z.array(ResourceRecordSchema),
  cp4iNamespaces: z.array(z.string()).default([]),
  metadata: z
    .object({
      collectorVersion: z.string().default('unknown'),
      clusterDisplay: z.string().optional(),
      openshiftVersion: z.string().optional(),
      versionHistory: z
        .array(z.object({ version: z.string(), state: z.string().optional(), completionTime: z.string().optional() }))
        .optional(),
      consoleUrl: z.string().optional(),
      apiUrl: z.string().optional(),
      errors: z.array(z.string()).default([]),
      warnings: z.array(z.string()).default([]),
    })
    .default({}),
});

export const parseSnapshot = (raw: unknown): Snapshot => {
  const { formatVersion: _version, ...snapshot } = SnapshotFileSchema.parse(raw);
  return snapshot;
};

export const serializeSnapshot = (snapshot: Snapshot): string =>
  `${JSON.stringify({ formatVersion: SNAPSHOT_FORMAT_VERSION, ...snapshot }, null, 2)}\n`;
