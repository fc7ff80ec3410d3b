import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { formatVersionHistory } from '../cluster.js';
import { debug } from '../debug.js';
import { identityKey } from '../domain/identity.js';
import type { CategorizedResource, CategorySummary, ChangeSet, NodeRecord, PodRecord, Snapshot } from '../domain/types.js';

type CsvValue = string | number | boolean | undefined;

export const escapeCsv = (value: CsvValue): string => {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsv = (headers: string[], rows: CsvValue[][]): string =>
  [headers, ...rows].map((row) => row.map(escapeCsv).join(',')).join('\n') + '\n';

export interface SpreadsheetArgs {
  snapshot: Snapshot;
  changeSet?: ChangeSet;
  categories?: CategorizedResource[];
  summary?: CategorySummary;
}

const summaryRows = (args: SpreadsheetArgs): CsvValue[][] => {
  const rows: CsvValue[][] = [
    ['Cluster', args.snapshot.clusterIdentity],
    ['Collected at', args.snapshot.collectedAt],
    ['Records', args.snapshot.resourceRecords.length],
    ['CP4I namespaces', args.snapshot.cp4iNamespaces.join(' ')],
    ['OpenShift version', args.snapshot.metadata.openshiftVersion],
    ['Version history', formatVersionHistory(args.snapshot.metadata.versionHistory ?? [])],
    ['Console URL', args.snapshot.metadata.consoleUrl],
    ['API server', args.snapshot.metadata.apiUrl],
  ];
  const changeSet = args.changeSet;
  if (changeSet?.comparable) {
    rows.push(
      ['Previous snapshot', changeSet.previousTimestamp],
      ['Elapsed', changeSet.elapsed],
      ['Added', changeSet.counts.additions],
      ['Deleted', changeSet.counts.deletions],
      ['Modified', changeSet.counts.modifications],
      ['Restarted', changeSet.counts.restarts],
      ['Critical', changeSet.severityCounts.critical],
      ['Important', changeSet.severityCounts.important],
      ['Informational', changeSet.severityCounts.informational],
    );
  } else {
    rows.push(['Previous snapshot', 'none']);
  }
  if (args.summary) {
    rows.push(
      ['Workload pods', args.summary.workloads],
      ['Infrastructure pods', args.summary.infrastructure],
      ['CP4I VPC', args.summary.totalVpc],
    );
  }
  return rows;
};

/**
 * Writes `summary.csv`, `changes.csv`, `pods.csv` and `nodes.csv` into `dir`
 * and returns the paths written.
 */
export const writeSpreadsheet = async (dir: string, args: SpreadsheetArgs): Promise<string[]> => {
  const abs = resolve(dir);
  debug('writeSpreadsheet start', { dir: abs });
  await mkdir(abs, { recursive: true });

  const categoryByKey = new Map((args.categories ?? []).map((c) => [c.key, c.assignment]));
  const pods = args.snapshot.resourceRecords.filter((r): r is PodRecord => r.kind === 'Pod');
  const nodes = args.snapshot.resourceRecords.filter((r): r is NodeRecord => r.kind === 'Node');

  const sheets: Array<[string, string]> = [
    ['summary.csv', toCsv(['Field', 'Value'], summaryRows(args))],
    [
      'changes.csv',
      toCsv(
        ['Severity', 'Namespace', 'Kind', 'Name', 'Change', 'Detail', 'Before', 'After'],
        (args.changeSet?.changes ?? []).map((c) => [
          c.severity,
          c.namespace,
          c.kind,
          c.name,
          c.changeType,
          c.detail,
          c.beforeSummary,
          c.afterSummary,
        ]),
      ),
    ],
    [
      'pods.csv',
      toCsv(
        ['Namespace', 'Name', 'Phase', 'Ready', 'Restarts', 'CPU Request (cores)', 'Memory Request (bytes)', 'Workload', 'Criticality', 'Licensing'],
        pods.map((p) => {
          const assignment = categoryByKey.get(identityKey(p));
          return [
            p.namespace,
            p.name,
            p.phase,
            p.ready,
            p.restartCount,
            p.cpuRequestCores,
            p.memoryRequestBytes,
            assignment?.isWorkload,
            assignment?.criticality,
            assignment?.licensingClass,
          ];
        }),
      ),
    ],
    [
      'nodes.csv',
      toCsv(
        ['Name', 'Status', 'Roles', 'Kubelet', 'CPU', 'Memory'],
        nodes.map((n) => [n.name, n.status, n.roles, n.kubeletVersion, n.cpuCapacity, n.memoryCapacity]),
      ),
    ],
  ];

  const written: string[] = [];
  for (const [name, content] of sheets) {
    const path = join(abs, name);
    await writeFile(path, content, 'utf8');
    written.push(path);
  }
  debug('writeSpreadsheet end', { files: written.length });
  return written;
};
