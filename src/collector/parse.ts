import { z } from 'zod';
import { debug } from '../debug.js';
import { parseCpuQuantity, parseMemoryQuantity } from '../domain/quantity.js';
import type {
  EventStreamsInstanceRecord,
  KafkaTopicRecord,
  NamespaceRecord,
  NodeReadiness,
  NodeRecord,
  OperatorRecord,
  PodRecord,
  RouteRecord,
  TopicCategory,
  VersionHistoryEntry,
} from '../domain/types.js';

const MetadataSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().optional(),
  labels: z.record(z.string()).optional(),
  creationTimestamp: z.string().optional(),
  ownerReferences: z.array(z.object({ name: z.string().optional() })).optional(),
});

type Metadata = z.infer<typeof MetadataSchema>;

const ListSchema = z.object({ items: z.array(z.unknown()) });

const QuantitySchema = z.union([z.string(), z.number()]);

const RawPodSchema = z.object({
  metadata: MetadataSchema,
  spec: z
    .object({
      nodeName: z.string().optional(),
      containers: z
        .array(
          z.object({
            resources: z.object({ requests: z.record(QuantitySchema).optional() }).optional(),
          }),
        )
        .optional(),
    })
    .optional(),
  status: z
    .object({
      phase: z.string().optional(),
      containerStatuses: z
        .array(z.object({ ready: z.boolean().optional(), restartCount: z.number().optional() }))
        .optional(),
    })
    .optional(),
});

const RawNodeSchema = z.object({
  metadata: MetadataSchema,
  status: z
    .object({
      capacity: z.record(QuantitySchema).optional(),
      conditions: z.array(z.object({ type: z.string(), status: z.string() })).optional(),
      nodeInfo: z.object({ kubeletVersion: z.string().optional() }).optional(),
    })
    .optional(),
});

const RawNamespaceSchema = z.object({
  metadata: MetadataSchema,
  status: z.object({ phase: z.string().optional() }).optional(),
});

const RawCsvSchema = z.object({
  metadata: MetadataSchema,
  spec: z.object({ displayName: z.string().optional(), version: z.string().optional() }).optional(),
  status: z.object({ phase: z.string().optional(), reason: z.string().optional() }).optional(),
});

const RawRouteSchema = z.object({
  metadata: MetadataSchema,
  spec: z
    .object({
      host: z.string().optional(),
      path: z.string().optional(),
      tls: z.unknown().optional(),
      to: z.object({ name: z.string().optional() }).optional(),
    })
    .optional(),
});

const RawEventStreamsSchema = z.object({
  metadata: MetadataSchema,
  status: z
    .object({
      phase: z.string().optional(),
      versions: z.object({ reconciled: z.string().optional() }).optional(),
    })
    .optional(),
});

const RawKafkaTopicSchema = z.object({
  metadata: MetadataSchema,
  spec: z
    .object({
      partitions: z.number().int().optional(),
      replicas: z.number().int().optional(),
      config: z.record(z.unknown()).optional(),
    })
    .optional(),
  status: z
    .object({
      conditions: z.array(z.object({ type: z.string(), status: z.string() })).optional(),
    })
    .optional(),
});

const CP4I_OPERATOR_KEYWORDS = [
  'cp4i',
  'integration',
  'navigator',
  'event streams',
  'api connect',
  'app connect',
  'mq',
  'aspera',
  'datapower',
];

export const ES_CLUSTER_LABEL = 'eventstreams.ibm.com/cluster';

export interface ParsedList<T> {
  records: T[];
  skipped: number;
}

/**
 * Converts a `kind: List` payload item by item. Items that do not fit the
 * expected shape are skipped and counted.
 */
export const parseList = <O, T>(
  raw: unknown,
  itemSchema: z.ZodType<O, z.ZodTypeDef, unknown>,
  convert: (item: O) => T,
): ParsedList<T> => {
  const list = ListSchema.safeParse(raw);
  if (!list.success) return { records: [], skipped: 0 };

  const records: T[] = [];
  let skipped = 0;
  for (const item of list.data.items) {
    const parsed = itemSchema.safeParse(item);
    if (parsed.success) {
      records.push(convert(parsed.data));
    } else {
      skipped += 1;
    }
  }
  debug('parseList end', { records: records.length, skipped });
  return { records, skipped };
};

const base = (metadata: Metadata) => ({
  name: metadata.name,
  labels: metadata.labels ?? {},
  creationTimestamp: metadata.creationTimestamp,
});

const sumDefined = (values: Array<number | undefined>): number | undefined => {
  const present = values.filter((v): v is number => v !== undefined);
  return present.length === 0 ? undefined : present.reduce((sum, v) => sum + v, 0);
};

export const toPodRecord = (pod: z.infer<typeof RawPodSchema>): PodRecord => {
  const statuses = pod.status?.containerStatuses;
  const containers = pod.spec?.containers ?? [];
  return {
    kind: 'Pod',
    namespace: pod.metadata.namespace,
    ...base(pod.metadata),
    phase: pod.status?.phase,
    restartCount: statuses ? statuses.reduce((sum, c) => sum + (c.restartCount ?? 0), 0) : undefined,
    ready: statuses ? `${statuses.filter((c) => c.ready).length}/${statuses.length}` : undefined,
    nodeName: pod.spec?.nodeName,
    cpuRequestCores: sumDefined(containers.map((c) => parseCpuQuantity(c.resources?.requests?.cpu))),
    memoryRequestBytes: sumDefined(containers.map((c) => parseMemoryQuantity(c.resources?.requests?.memory))),
  };
};

const nodeReadiness = (conditions: Array<{ type: string; status: string }> | undefined): NodeReadiness | undefined => {
  if (!conditions) return undefined;
  const ready = conditions.find((c) => c.type === 'Ready');
  if (!ready) return 'Unknown';
  return ready.status === 'True' ? 'Ready' : 'NotReady';
};

const NODE_ROLE_PREFIX = 'node-role.kubernetes.io/';

export const toNodeRecord = (node: z.infer<typeof RawNodeSchema>): NodeRecord => {
  const labels = node.metadata.labels ?? {};
  const roles = Object.keys(labels)
    .filter((key) => key.startsWith(NODE_ROLE_PREFIX))
    .map((key) => key.slice(NODE_ROLE_PREFIX.length))
    .filter(Boolean)
    .sort();
  const capacity = node.status?.capacity ?? {};
  return {
    kind: 'Node',
    ...base(node.metadata),
    status: nodeReadiness(node.status?.conditions),
    roles: roles.length > 0 ? roles.join(',') : 'worker',
    kubeletVersion: node.status?.nodeInfo?.kubeletVersion,
    cpuCapacity: capacity.cpu === undefined ? undefined : String(capacity.cpu),
    memoryCapacity: capacity.memory === undefined ? undefined : String(capacity.memory),
  };
};

export const toNamespaceRecord = (ns: z.infer<typeof RawNamespaceSchema>): NamespaceRecord => ({
  kind: 'Namespace',
  ...base(ns.metadata),
  phase: ns.status?.phase,
});

export const isCp4iOperatorName = (displayName: string): boolean => {
  const lower = displayName.toLowerCase();
  return CP4I_OPERATOR_KEYWORDS.some((keyword) => lower.includes(keyword));
};

export const toOperatorRecord = (csv: z.infer<typeof RawCsvSchema>): OperatorRecord => {
  const displayName = csv.spec?.displayName ?? csv.metadata.name;
  return {
    kind: 'Operator',
    namespace: csv.metadata.namespace,
    ...base(csv.metadata),
    displayName,
    version: csv.spec?.version,
    phase: csv.status?.phase,
    reason: csv.status?.reason,
    isCp4i: isCp4iOperatorName(displayName),
  };
};

export const toRouteRecord = (route: z.infer<typeof RawRouteSchema>): RouteRecord => {
  const host = route.spec?.host;
  const path = route.spec?.path ?? '/';
  const tls = route.spec?.tls !== undefined && route.spec.tls !== null;
  return {
    kind: 'Route',
    namespace: route.metadata.namespace,
    ...base(route.metadata),
    host,
    path,
    tls,
    url: host ? `${tls ? 'https' : 'http'}://${host}${path}` : undefined,
    service: route.spec?.to?.name,
  };
};

export const toEventStreamsRecord = (es: z.infer<typeof RawEventStreamsSchema>): EventStreamsInstanceRecord => ({
  kind: 'EventStreamsInstance',
  namespace: es.metadata.namespace,
  ...base(es.metadata),
  status: es.status?.phase,
  version: es.status?.versions?.reconciled,
});

// `cur` only as a whole name segment, so `secure-events` stays general.
const CUR_SEGMENT = /(^|[._-])cur([._-]|$)/;

/** Naming convention buckets: `*.raw`, `*.enriched`, `*.curated`, dead-letter topics. */
export const categorizeTopic = (topicName: string): TopicCategory => {
  const lower = topicName.toLowerCase();
  if (['raw', '.r.'].some((p) => lower.includes(p))) return 'raw';
  if (['enriched', 'enrich', '.e.'].some((p) => lower.includes(p))) return 'enriched';
  if (['curated', '.c.'].some((p) => lower.includes(p)) || CUR_SEGMENT.test(lower)) return 'curated';
  if (['dlq', 'dead', 'error'].some((p) => lower.includes(p))) return 'dlq';
  return 'general';
};

export const toKafkaTopicRecord = (topic: z.infer<typeof RawKafkaTopicSchema>): KafkaTopicRecord => {
  const labels = topic.metadata.labels ?? {};
  const retention = topic.spec?.config?.['retention.ms'];
  const condition = topic.status?.conditions?.find((c) => c.status === 'True');
  return {
    kind: 'KafkaTopic',
    namespace: topic.metadata.namespace,
    ...base(topic.metadata),
    cluster: labels[ES_CLUSTER_LABEL] ?? topic.metadata.ownerReferences?.[0]?.name,
    partitions: topic.spec?.partitions,
    replicas: topic.spec?.replicas,
    retentionMs: retention === undefined || retention === null ? undefined : String(retention),
    status: condition?.type,
    category: categorizeTopic(topic.metadata.name),
  };
};

export const parsePods = (raw: unknown): ParsedList<PodRecord> => parseList(raw, RawPodSchema, toPodRecord);
export const parseNodes = (raw: unknown): ParsedList<NodeRecord> => parseList(raw, RawNodeSchema, toNodeRecord);
export const parseNamespaces = (raw: unknown): ParsedList<NamespaceRecord> =>
  parseList(raw, RawNamespaceSchema, toNamespaceRecord);
export const parseOperators = (raw: unknown): ParsedList<OperatorRecord> =>
  parseList(raw, RawCsvSchema, toOperatorRecord);
export const parseRoutes = (raw: unknown): ParsedList<RouteRecord> => parseList(raw, RawRouteSchema, toRouteRecord);
export const parseEventStreams = (raw: unknown): ParsedList<EventStreamsInstanceRecord> =>
  parseList(raw, RawEventStreamsSchema, toEventStreamsRecord);
export const parseKafkaTopics = (raw: unknown): ParsedList<KafkaTopicRecord> =>
  parseList(raw, RawKafkaTopicSchema, toKafkaTopicRecord);

const RawClusterVersionSchema = z.object({
  status: z
    .object({
      desired: z.object({ version: z.string().optional() }).optional(),
      history: z
        .array(
          z.object({
            version: z.string().optional(),
            state: z.string().optional(),
            completionTime: z.string().nullable().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

export interface ClusterVersionInfo {
  version?: string;
  history: VersionHistoryEntry[];
}

/** Desired version and the three most recent history entries of `oc get clusterversion version`. */
export const parseClusterVersion = (raw: unknown): ClusterVersionInfo => {
  const parsed = RawClusterVersionSchema.safeParse(raw);
  if (!parsed.success) return { history: [] };
  const history = (parsed.data.status?.history ?? [])
    .filter((entry) => entry.version !== undefined)
    .slice(0, 3)
    .map((entry) => ({
      version: entry.version ?? '',
      state: entry.state,
      completionTime: entry.completionTime ?? undefined,
    }));
  return { version: parsed.data.status?.desired?.version, history };
};

const RawHostSchema = z.object({ spec: z.object({ host: z.string().min(1) }) });

/** Host of a single route object, as returned by `oc get route <name>`. */
export const parseRouteHost = (raw: unknown): string | undefined => {
  const parsed = RawHostSchema.safeParse(raw);
  return parsed.success ? parsed.data.spec.host : undefined;
};
