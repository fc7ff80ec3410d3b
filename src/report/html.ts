import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { formatVersionHistory } from '../cluster.js';
import { debug } from '../debug.js';
import { groupChanges, type SeverityGroup } from '../domain/grouping.js';
import { identityKey } from '../domain/identity.js';
import { formatBytes } from '../domain/quantity.js';
import type {
  CategorizedResource,
  CategorySummary,
  ChangeSet,
  KafkaTopicRecord,
  NodeRecord,
  OperatorRecord,
  PodRecord,
  RecordOfKind,
  ResourceKind,
  ResourceRecord,
  RouteRecord,
  Snapshot,
  SnapshotMetadata,
} from '../domain/types.js';

export type OverallStatus = 'Critical' | 'Attention' | 'Healthy';

export interface DashboardArgs {
  snapshot: Snapshot;
  changeSet?: ChangeSet;
  categories?: CategorizedResource[];
  summary?: CategorySummary;
  clusterDisplay: string;
  /** Defaults to the current time. */
  generatedAt?: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: unknown): string => {
  if (value === undefined || value === null) return '';
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
};

const cell = (value: unknown): string => `<td>${value === undefined || value === null || value === '' ? '-' : escapeHtml(value)}</td>`;

const clusterInfoLines = (metadata: SnapshotMetadata): string => {
  const lines: string[] = [];
  if (metadata.openshiftVersion) {
    lines.push(`<div>OpenShift version: ${escapeHtml(metadata.openshiftVersion)}</div>`);
  }
  if (metadata.versionHistory && metadata.versionHistory.length > 0) {
    lines.push(`<div>Version history: ${escapeHtml(formatVersionHistory(metadata.versionHistory))}</div>`);
  }
  if (metadata.consoleUrl) {
    const url = escapeHtml(metadata.consoleUrl);
    lines.push(`<div>Console: <a href="${url}">${url}</a></div>`);
  }
  if (metadata.apiUrl) {
    lines.push(`<div>API server: ${escapeHtml(metadata.apiUrl)}</div>`);
  }
  return lines.map((line) => `${line}\n`).join('');
};

const table = (headers: string[], rows: string[], empty: string): string => {
  if (rows.length === 0) return `<p class="empty">${escapeHtml(empty)}</p>`;
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
  return `<div class="table-wrap"><table><thead><tr>${head}</tr></thead><tbody>${rows.join('\n')}</tbody></table></div>`;
};

const ofKind = <K extends ResourceKind>(records: readonly ResourceRecord[], kind: K): RecordOfKind<K>[] =>
  records.filter((r): r is RecordOfKind<K> => r.kind === kind);

export const overallStatus = (snapshot: Snapshot, changeSet?: ChangeSet): OverallStatus => {
  const notReady = ofKind(snapshot.resourceRecords, 'Node').some((n) => n.status === 'NotReady');
  if (notReady || (changeSet?.severityCounts.critical ?? 0) > 0) return 'Critical';
  if ((changeSet?.severityCounts.important ?? 0) > 0 || snapshot.metadata.errors.length > 0) return 'Attention';
  return 'Healthy';
};

const renderGroups = (groups: SeverityGroup[]): string =>
  groups
    .map(
      (group) => `<div class="severity severity-${group.severity.toLowerCase()}">
<h3>${escapeHtml(group.severity)} (${group.count})</h3>
${group.namespaces
  .map(
    (ns) => `<h4>${escapeHtml(ns.namespace)} (${ns.count})</h4>
${ns.kinds
  .map((k) =>
    table(
      ['Kind', 'Name', 'Change', 'Detail'],
      k.changes.map((c) => `<tr>${cell(c.kind)}${cell(c.name)}${cell(c.changeType)}${cell(c.detail)}</tr>`),
      'No changes',
    ),
  )
  .join('\n')}`,
  )
  .join('\n')}
</div>`,
    )
    .join('\n');

const renderChanges = (changeSet?: ChangeSet): string => {
  if (!changeSet || !changeSet.comparable) {
    return '<p class="notice">First run for this cluster: no previous snapshot to compare against. Changes will appear on the next run.</p>';
  }
  const { counts, severityCounts } = changeSet;
  if (changeSet.changes.length === 0) {
    return `<p class="meta">Compared with ${escapeHtml(changeSet.previousTimestamp)} (${escapeHtml(changeSet.elapsed)} ago).</p>
<p class="notice">No changes detected.</p>`;
  }
  return `<p class="meta">Compared with ${escapeHtml(changeSet.previousTimestamp)} (${escapeHtml(changeSet.elapsed)} ago).</p>
<div class="tiles">
<div class="tile"><b>${counts.additions}</b><span>Added</span></div>
<div class="tile"><b>${counts.deletions}</b><span>Deleted</span></div>
<div class="tile"><b>${counts.modifications}</b><span>Modified</span></div>
<div class="tile"><b>${counts.restarts}</b><span>Restarted</span></div>
<div class="tile critical"><b>${severityCounts.critical}</b><span>Critical</span></div>
<div class="tile important"><b>${severityCounts.important}</b><span>Important</span></div>
</div>
${renderGroups(groupChanges(changeSet.changes))}`;
};

const nodeRow = (n: NodeRecord): string =>
  `<tr>${cell(n.name)}${cell(n.status)}${cell(n.roles)}${cell(n.kubeletVersion)}${cell(n.cpuCapacity)}${cell(n.memoryCapacity)}</tr>`;

const operatorRow = (o: OperatorRecord): string =>
  `<tr>${cell(o.namespace)}${cell(o.displayName ?? o.name)}${cell(o.version)}${cell(o.phase)}${cell(o.isCp4i ? 'yes' : 'no')}</tr>`;

const podRow = (p: PodRecord, category?: CategorizedResource): string =>
  `<tr>${cell(p.namespace)}${cell(p.name)}${cell(p.phase)}${cell(p.ready)}${cell(p.restartCount)}${cell(p.cpuRequestCores)}${cell(
    p.memoryRequestBytes === undefined ? undefined : formatBytes(p.memoryRequestBytes),
  )}${cell(category?.assignment.criticality)}${cell(category?.assignment.licensingClass)}${cell(
    category ? (category.assignment.isWorkload ? 'workload' : 'infrastructure') : undefined,
  )}</tr>`;

const topicRow = (t: KafkaTopicRecord): string =>
  `<tr>${cell(t.namespace)}${cell(t.cluster)}${cell(t.name)}${cell(t.category)}${cell(t.partitions)}${cell(t.replicas)}${cell(t.status)}</tr>`;

const routeRow = (r: RouteRecord): string =>
  `<tr>${cell(r.namespace)}${cell(r.name)}${cell(r.url ?? r.host)}${cell(r.service)}${cell(r.tls ? 'yes' : 'no')}</tr>`;

const renderSummary = (summary?: CategorySummary): string => {
  if (!summary) return '';
  return `<section class="card">
<h2>Categories</h2>
<div class="tiles">
<div class="tile"><b>${summary.total}</b><span>Pods</span></div>
<div class="tile"><b>${summary.workloads}</b><span>Workloads</span></div>
<div class="tile"><b>${summary.infrastructure}</b><span>Infrastructure</span></div>
<div class="tile"><b>${summary.totalVpc.toFixed(2)}</b><span>CP4I VPC</span></div>
<div class="tile"><b>${summary.totalCpuRequestCores.toFixed(2)}</b><span>CPU requested</span></div>
<div class="tile"><b>${escapeHtml(formatBytes(summary.totalMemoryRequestBytes))}</b><span>Memory requested</span></div>
</div>
</section>`;
};

export const renderDashboard = (args: DashboardArgs): string => {
  const { snapshot, changeSet } = args;
  const records = snapshot.resourceRecords;
  debug('renderDashboard start', { records: records.length, changes: changeSet?.changes.length ?? 0 });

  const categoryByKey = new Map((args.categories ?? []).map((c) => [c.key, c]));
  const status = overallStatus(snapshot, changeSet);
  const nodes = ofKind(records, 'Node');
  const operators = ofKind(records, 'Operator');
  const pods = ofKind(records, 'Pod');
  const topics = ofKind(records, 'KafkaTopic');
  const routes = ofKind(records, 'Route');
  const instances = ofKind(records, 'EventStreamsInstance');

  const problems = [...snapshot.metadata.errors, ...snapshot.metadata.warnings];

  const html = `<!doctype html>
<html lang="en">
<head>
<meta charset="UTF-8" />
<meta name="viewport" content="width=device-width, initial-scale=1.0" />
<title>${escapeHtml(args.clusterDisplay)} - CP4I Chief Console</title>
<style>
:root{--bg:#f5f7fb;--card:#fff;--line:#d7dfeb;--text:#12243b;--muted:#4b607b;--critical:#c0262d;--important:#b26a00;--ok:#1f7a3a}
*{box-sizing:border-box}body{margin:0;background:var(--bg);font-family:system-ui,-apple-system,Segoe UI,sans-serif;color:var(--text)}
main{max-width:1300px;margin:24px auto;padding:0 16px}.card{background:var(--card);border:1px solid var(--line);border-radius:12px;padding:16px;margin-bottom:14px}
h1,h2{margin:0 0 10px 0}.meta{color:var(--muted);font-size:.9rem;display:grid;gap:3px}
.status{display:inline-block;padding:4px 10px;border-radius:8px;color:#fff;font-weight:600}
.status-critical{background:var(--critical)}.status-attention{background:var(--important)}.status-healthy{background:var(--ok)}
.tiles{display:flex;flex-wrap:wrap;gap:10px;margin:10px 0}.tile{border:1px solid var(--line);border-radius:10px;padding:8px 14px;display:grid;min-width:110px}
.tile b{font-size:1.4rem}.tile.critical b{color:var(--critical)}.tile.important b{color:var(--important)}
.severity-critical h3{color:var(--critical)}.severity-important h3{color:var(--important)}
.notice{background:#eef4ff;border:1px solid var(--line);border-radius:8px;padding:10px}.empty{color:var(--muted)}
table{width:100%;border-collapse:collapse;font-size:.88rem}th,td{padding:8px;border-bottom:1px solid var(--line);white-space:nowrap;text-align:left}
th{background:#eff4fd;position:sticky;top:0}.table-wrap{overflow:auto;border:1px solid var(--line);border-radius:10px;margin-bottom:8px}
</style>
</head>
<body>
<main>
<section class="card">
<h1>${escapeHtml(args.clusterDisplay)}</h1>
<span class="status status-${status.toLowerCase()}">${status}</span>
<div class="meta">
<div>Cluster: ${escapeHtml(snapshot.clusterIdentity)}</div>
<div>Collected at (UTC): ${escapeHtml(snapshot.collectedAt)}</div>
<div>Generated at (UTC): ${escapeHtml(args.generatedAt ?? new Date().toISOString())}</div>
<div>CP4I namespaces: ${snapshot.cp4iNamespaces.length > 0 ? escapeHtml(snapshot.cp4iNamespaces.join(', ')) : 'none'}</div>
${clusterInfoLines(snapshot.metadata)}<div>Collector: ${escapeHtml(snapshot.metadata.collectorVersion)}</div>
</div>
${problems.length > 0 ? `<ul class="meta">${problems.map((p) => `<li>${escapeHtml(p)}</li>`).join('')}</ul>` : ''}
</section>
<section class="card">
<h2>What changed</h2>
${renderChanges(changeSet)}
</section>
${renderSummary(args.summary)}
<section class="card">
<h2>Nodes (${nodes.length})</h2>
${table(['Name', 'Status', 'Roles', 'Kubelet', 'CPU', 'Memory'], nodes.map(nodeRow), 'No nodes collected')}
</section>
<section class="card">
<h2>Operators (${operators.length})</h2>
${table(['Namespace', 'Name', 'Version', 'Phase', 'CP4I'], operators.map(operatorRow), 'No operators collected')}
</section>
<section class="card">
<h2>Pods (${pods.length})</h2>
${table(
  ['Namespace', 'Name', 'Phase', 'Ready', 'Restarts', 'CPU req', 'Memory req', 'Criticality', 'Licensing', 'Type'],
  pods.map((p) => podRow(p, categoryByKey.get(identityKey(p)))),
  'No pods collected',
)}
</section>
<section class="card">
<h2>Event Streams (${instances.length} instances, ${topics.length} topics)</h2>
${table(
  ['Namespace', 'Name', 'Status', 'Version', 'Bootstrap'],
  instances.map((i) => `<tr>${cell(i.namespace)}${cell(i.name)}${cell(i.status)}${cell(i.version)}${cell(i.bootstrapServer)}</tr>`),
  'No Event Streams instances collected',
)}
${table(['Namespace', 'Instance', 'Topic', 'Category', 'Partitions', 'Replicas', 'Status'], topics.map(topicRow), 'No Kafka topics collected')}
</section>
<section class="card">
<h2>Routes (${routes.length})</h2>
${table(['Namespace', 'Name', 'URL', 'Service', 'TLS'], routes.map(routeRow), 'No routes collected')}
</section>
</main>
</body>
</html>`;

  debug('renderDashboard end', { status, bytes: html.length });
  return html;
};

export const writeDashboard = async (outputPath: string, args: DashboardArgs): Promise<string> => {
  const abs = resolve(outputPath);
  await mkdir(dirname(abs), { recursive: true });
  await writeFile(abs, renderDashboard(args), 'utf8');
  debug('writeDashboard end', { abs });
  return abs;
};
