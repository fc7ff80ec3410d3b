import type { ResourceRecord } from './types.js';

export type FieldValue = string | number | boolean | undefined;

export interface FieldChange {
  field: string;
  before: FieldValue;
  after: FieldValue;
}

export interface Detection {
  changeType: 'Modified' | 'Restarted';
  fieldChanges: FieldChange[];
  restartDelta?: number;
  detail: string;
}

/** Fields whose difference makes a record Modified, per kind. */
export const trackedFields = (record: ResourceRecord): Record<string, FieldValue> => {
  switch (record.kind) {
    case 'Pod':
      return { phase: record.phase };
    case 'Operator':
      return { version: record.version, phase: record.phase };
    case 'Node':
      return { status: record.status };
    case 'Namespace':
      return { phase: record.phase };
    case 'Route':
      return {
        host: record.host,
        path: record.path,
        tls: record.tls,
        url: record.url,
        service: record.service,
      };
    case 'KafkaTopic':
      return {
        partitions: record.partitions,
        replicas: record.replicas,
        retentionMs: record.retentionMs,
        status: record.status,
      };
    case 'EventStreamsInstance':
      return { status: record.status, version: record.version, bootstrapServer: record.bootstrapServer };
  }
};

const summaryFields = (record: ResourceRecord): Record<string, FieldValue> => {
  switch (record.kind) {
    case 'Pod':
      return { phase: record.phase, restarts: record.restartCount, ready: record.ready };
    case 'Operator':
      return { version: record.version, phase: record.phase };
    case 'Node':
      return { status: record.status };
    case 'Namespace':
      return { phase: record.phase };
    case 'Route':
      return { url: record.url ?? record.host, service: record.service };
    case 'KafkaTopic':
      return { partitions: record.partitions, replicas: record.replicas, status: record.status };
    case 'EventStreamsInstance':
      return { status: record.status, version: record.version };
  }
};

const show = (value: FieldValue): string => (value === undefined ? '?' : String(value));

export const summarizeRecord = (record: ResourceRecord): string =>
  Object.entries(summaryFields(record))
    .filter(([, value]) => value !== undefined)
    .map(([field, value]) => `${field}=${show(value)}`)
    .join(', ');

export const formatFieldChanges = (changes: FieldChange[]): string =>
  changes.map((c) => `${c.field}: ${show(c.before)} -> ${show(c.after)}`).join('; ');

/**
 * Field-level differences between two captures of the same object. A field
 * missing on either side counts as unchanged.
 */
export const diffTrackedFields = (before: ResourceRecord, after: ResourceRecord): FieldChange[] => {
  const a = trackedFields(before);
  const b = trackedFields(after);
  const out: FieldChange[] = [];
  for (const field of Object.keys(a)) {
    const prev = a[field];
    const next = b[field];
    if (prev === undefined || next === undefined) continue;
    if (prev !== next) {
      out.push({ field, before: prev, after: next });
    }
  }
  return out;
};

const restartDeltaOf = (before: ResourceRecord, after: ResourceRecord): number => {
  if (before.kind !== 'Pod' || after.kind !== 'Pod') return 0;
  if (typeof before.restartCount !== 'number' || typeof after.restartCount !== 'number') return 0;
  return Math.max(0, after.restartCount - before.restartCount);
};

export const compareRecords = (before: ResourceRecord, after: ResourceRecord): Detection | undefined => {
  const fieldChanges = diffTrackedFields(before, after);
  const restartDelta = restartDeltaOf(before, after);

  if (restartDelta > 0 && after.kind === 'Pod') {
    const base = `restarted ${restartDelta}x (total: ${show(after.restartCount)})`;
    return {
      changeType: 'Restarted',
      fieldChanges,
      restartDelta,
      detail: fieldChanges.length > 0 ? `${base}; ${formatFieldChanges(fieldChanges)}` : base,
    };
  }

  if (fieldChanges.length === 0) return undefined;

  return {
    changeType: 'Modified',
    fieldChanges,
    detail: formatFieldChanges(fieldChanges),
  };
};
