import { debug } from '../debug.js';
import { identityKey } from './identity.js';
import type {
  CategorizedResource,
  CategoryAssignment,
  CategorySummary,
  Criticality,
  LicensingClass,
  ResourceKind,
  ResourceRecord,
} from './types.js';

export interface CategoryRule<A> {
  /** Case-insensitive; must match at the start of the name, or of the value of `label`. */
  pattern: RegExp;
  scope: ResourceKind | '*';
  namespace?: RegExp;
  label?: string;
  assignment: A;
}

export interface Ruleset {
  workload: CategoryRule<boolean>[];
  criticality: CategoryRule<Criticality>[];
  licensing: CategoryRule<LicensingClass>[];
}

export const EMPTY_RULESET: Ruleset = { workload: [], criticality: [], licensing: [] };

export const DEFAULT_ASSIGNMENT: CategoryAssignment = {
  isWorkload: false,
  criticality: 'Optional',
  licensingClass: 'Unlicensed',
};

// The leftmost match starts at 0 exactly when some match starts at 0.
const matchesAtStart = (pattern: RegExp, subject: string): boolean => {
  return pattern.exec(subject)?.index === 0;
};

export const ruleMatches = <A>(rule: CategoryRule<A>, record: ResourceRecord): boolean => {
  if (rule.scope !== '*' && rule.scope !== record.kind) return false;
  if (rule.namespace) {
    if (record.namespace === undefined || !matchesAtStart(rule.namespace, record.namespace)) return false;
  }
  const subject = rule.label === undefined ? record.name : record.labels[rule.label];
  if (subject === undefined) return false;
  return matchesAtStart(rule.pattern, subject);
};

const firstMatch = <A>(rules: readonly CategoryRule<A>[], record: ResourceRecord, fallback: A): A =>
  rules.find((rule) => ruleMatches(rule, record))?.assignment ?? fallback;

/** Evaluates each axis independently; the first matching rule of an axis wins. */
export const categorize = (record: ResourceRecord, ruleset: Ruleset): CategoryAssignment => ({
  isWorkload: firstMatch(ruleset.workload, record, DEFAULT_ASSIGNMENT.isWorkload),
  criticality: firstMatch(ruleset.criticality, record, DEFAULT_ASSIGNMENT.criticality),
  licensingClass: firstMatch(ruleset.licensing, record, DEFAULT_ASSIGNMENT.licensingClass),
});

export const categorizeAll = (records: readonly ResourceRecord[], ruleset: Ruleset): CategorizedResource[] =>
  records.map((record) => ({
    key: identityKey(record),
    kind: record.kind,
    namespace: record.namespace,
    name: record.name,
    assignment: categorize(record, ruleset),
  }));

const round2 = (value: number): number => Math.round(value * 100) / 100;

/** Licensing, criticality and sizing rollup over the pods of a snapshot. */
export const summarizeCategories = (records: readonly ResourceRecord[], ruleset: Ruleset): CategorySummary => {
  const pods = records.filter((r) => r.kind === 'Pod');
  debug('summarizeCategories start', { records: records.length, pods: pods.length });

  const summary: CategorySummary = {
    total: pods.length,
    licensing: { CP4ILicensed: 0, OpenShiftPlatform: 0, Free: 0, Unlicensed: 0 },
    criticality: { Critical: 0, Important: 0, Optional: 0 },
    workloads: 0,
    infrastructure: 0,
    totalVpc: 0,
    totalCpuRequestCores: 0,
    totalMemoryRequestBytes: 0,
  };

  for (const pod of pods) {
    const assignment = categorize(pod, ruleset);
    const cpu = pod.cpuRequestCores ?? 0;
    summary.licensing[assignment.licensingClass] += 1;
    summary.criticality[assignment.criticality] += 1;
    if (assignment.isWorkload) {
      summary.workloads += 1;
    } else {
      summary.infrastructure += 1;
    }
    if (assignment.licensingClass === 'CP4ILicensed') {
      summary.totalVpc += cpu;
    }
    summary.totalCpuRequestCores += cpu;
    summary.totalMemoryRequestBytes += pod.memoryRequestBytes ?? 0;
  }

  summary.totalVpc = round2(summary.totalVpc);
  summary.totalCpuRequestCores = round2(summary.totalCpuRequestCores);
  debug('summarizeCategories end', { totalVpc: summary.totalVpc, workloads: summary.workloads });
  return summary;
};
