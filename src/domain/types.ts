export const RESOURCE_KINDS = [
  'Pod',
  'Operator',
  'Namespace',
  'Route',
  'KafkaTopic',
  'EventStreamsInstance',
  'Node',
] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export type NodeReadiness = 'Ready' | 'NotReady' | 'Unknown';

export type TopicCategory = 'raw' | 'enriched' | 'curated' | 'dlq' | 'general';

interface RecordBase {
  /** Absent for cluster-scoped kinds (Node, Namespace). */
  namespace?: string;
  name: string;
  labels: Record<string, string>;
  creationTimestamp?: string;
}

export interface PodRecord extends RecordBase {
  kind: 'Pod';
  phase?: string;
  restartCount?: number;
  /** Ready containers over total, e.g. "1/2". */
  ready?: string;
  nodeName?: string;
  cpuRequestCores?: number;
  memoryRequestBytes?: number;
}

export interface OperatorRecord extends RecordBase {
  kind: 'Operator';
  displayName?: string;
  version?: string;
  phase?: string;
  reason?: string;
  isCp4i?: boolean;
}

export interface NodeRecord extends RecordBase {
  kind: 'Node';
  status?: NodeReadiness;
  roles?: string;
  kubeletVersion?: string;
  cpuCapacity?: string;
  memoryCapacity?: string;
}

export interface NamespaceRecord extends RecordBase {
  kind: 'Namespace';
  phase?: string;
}

export interface RouteRecord extends RecordBase {
  kind: 'Route';
  host?: string;
  path?: string;
  tls?: boolean;
  url?: string;
  service?: string;
}

export interface KafkaTopicRecord extends RecordBase {
  kind: 'KafkaTopic';
  /** Owning Event Streams instance. */
  cluster?: string;
  partitions?: number;
  replicas?: number;
  retentionMs?: string;
  status?: string;
  category?: TopicCategory;
}

export interface EventStreamsInstanceRecord extends RecordBase {
  kind: 'EventStreamsInstance';
  status?: string;
  version?: string;
  bootstrapServer?: string;
}

export type ResourceRecord =
  | PodRecord
  | OperatorRecord
  | NodeRecord
  | NamespaceRecord
  | RouteRecord
  | KafkaTopicRecord
  | EventStreamsInstanceRecord;

export type RecordOfKind<K extends ResourceKind> = Extract<ResourceRecord, { kind: K }>;

export interface VersionHistoryEntry {
  version: string;
  state?: string;
  completionTime?: string;
}

export interface SnapshotMetadata {
  collectorVersion: string;
  clusterDisplay?: string;
  /** Desired OpenShift version from the ClusterVersion resource. */
  openshiftVersion?: string;
  /** Newest first, at most three entries. */
  versionHistory?: VersionHistoryEntry[];
  consoleUrl?: string;
  apiUrl?: string;
  errors: string[];
  warnings: string[];
}

export interface Snapshot {
  clusterIdentity: string;
  /** ISO-8601 collection start time. */
  collectedAt: string;
  resourceRecords: readonly ResourceRecord[];
  /** Namespaces the collector recognised as hosting CP4I components. */
  cp4iNamespaces: readonly string[];
  metadata: SnapshotMetadata;
}

export type ChangeType = 'Added' | 'Deleted' | 'Modified' | 'Restarted';

export type Severity = 'Critical' | 'Important' | 'Informational';

export const SEVERITY_ORDER: readonly Severity[] = ['Critical', 'Important', 'Informational'];

export interface ChangeRecord {
  kind: ResourceKind;
  namespace?: string;
  name: string;
  changeType: ChangeType;
  severity: Severity;
  beforeSummary?: string;
  afterSummary?: string;
  detail: string;
  restartDelta?: number;
}

export interface ChangeCounts {
  additions: number;
  deletions: number;
  modifications: number;
  restarts: number;
}

export interface SeverityCounts {
  critical: number;
  important: number;
  informational: number;
}

export interface KindTotal {
  kind: ResourceKind;
  previous: number;
  current: number;
  change: number;
}

export interface ChangeSet {
  /** False when fewer than two snapshots were available. */
  comparable: boolean;
  previousTimestamp?: string;
  currentTimestamp?: string;
  elapsed: string;
  changes: ChangeRecord[];
  counts: ChangeCounts;
  severityCounts: SeverityCounts;
  kindTotals: KindTotal[];
  /** Identity keys seen more than once within a single snapshot. */
  collisions: string[];
}

export interface SeverityConfig {
  restartCriticalThreshold: number;
  cp4iImportantKinds: ResourceKind[];
  failurePhases: string[];
}

export const DEFAULT_SEVERITY_CONFIG: SeverityConfig = {
  restartCriticalThreshold: 5,
  cp4iImportantKinds: ['Operator', 'EventStreamsInstance', 'KafkaTopic', 'Route'],
  failurePhases: ['Failed', 'Unknown'],
};

export type Criticality = 'Critical' | 'Important' | 'Optional';

export type LicensingClass = 'CP4ILicensed' | 'OpenShiftPlatform' | 'Free' | 'Unlicensed';

export interface CategoryAssignment {
  isWorkload: boolean;
  criticality: Criticality;
  licensingClass: LicensingClass;
}

export interface CategorizedResource {
  key: string;
  kind: ResourceKind;
  namespace?: string;
  name: string;
  assignment: CategoryAssignment;
}

export interface CategorySummary {
  total: number;
  licensing: Record<LicensingClass, number>;
  criticality: Record<Criticality, number>;
  workloads: number;
  infrastructure: number;
  /** Sum of CPU requests (cores) of CP4I-licensed pods. */
  totalVpc: number;
  totalCpuRequestCores: number;
  totalMemoryRequestBytes: number;
}
