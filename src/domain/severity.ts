import type { ChangeType, ResourceKind, ResourceRecord, Severity, SeverityConfig } from './types.js';

export interface SeverityInput {
  kind: ResourceKind;
  namespace?: string;
  name: string;
  changeType: ChangeType;
  before?: ResourceRecord;
  after?: ResourceRecord;
  restartDelta?: number;
}

export interface SeverityContext {
  config: SeverityConfig;
  /** CP4I namespaces known to either snapshot. */
  cp4iNamespaces: ReadonlySet<string>;
}

interface SeverityRule {
  id: string;
  severity: Exclude<Severity, 'Informational'>;
  matches: (input: SeverityInput, ctx: SeverityContext) => boolean;
}

const nodeStatus = (record: ResourceRecord | undefined): string | undefined =>
  record?.kind === 'Node' ? record.status : undefined;

const podPhase = (record: ResourceRecord | undefined): string | undefined =>
  record?.kind === 'Pod' ? record.phase : undefined;

// Ordered Critical first: the first matching rule decides the tier.
const SEVERITY_RULES: readonly SeverityRule[] = [
  {
    id: 'node-not-ready',
    severity: 'Critical',
    matches: (input) => {
      if (input.kind !== 'Node' || input.changeType !== 'Modified') return false;
      const before = nodeStatus(input.before);
      const after = nodeStatus(input.after);
      return after === 'NotReady' && before !== undefined && before !== 'NotReady';
    },
  },
  {
    id: 'restart-threshold',
    severity: 'Critical',
    matches: (input, ctx) =>
      input.changeType === 'Restarted' && (input.restartDelta ?? 0) >= ctx.config.restartCriticalThreshold,
  },
  {
    id: 'pod-failure-phase',
    severity: 'Critical',
    matches: (input, ctx) => {
      if (input.kind !== 'Pod') return false;
      const before = podPhase(input.before);
      const after = podPhase(input.after);
      if (before === undefined || after === undefined || before === after) return false;
      return ctx.config.failurePhases.includes(after);
    },
  },
  {
    id: 'cp4i-kind',
    severity: 'Important',
    matches: (input, ctx) => ctx.config.cp4iImportantKinds.includes(input.kind),
  },
  {
    id: 'pod-lifecycle',
    severity: 'Important',
    matches: (input) =>
      input.kind === 'Pod' &&
      (input.changeType === 'Added' || input.changeType === 'Deleted' || input.changeType === 'Restarted'),
  },
  {
    id: 'node-readiness',
    severity: 'Important',
    matches: (input) => input.kind === 'Node' && input.changeType === 'Modified',
  },
  {
    id: 'cp4i-namespace-pod',
    severity: 'Important',
    matches: (input, ctx) =>
      input.kind === 'Pod' && input.namespace !== undefined && ctx.cp4iNamespaces.has(input.namespace),
  },
  {
    id: 'cp4i-namespace',
    severity: 'Important',
    matches: (input, ctx) => input.kind === 'Namespace' && ctx.cp4iNamespaces.has(input.name),
  },
];

export const matchSeverityRule = (input: SeverityInput, ctx: SeverityContext): string | undefined =>
  SEVERITY_RULES.find((rule) => rule.matches(input, ctx))?.id;

export const classifySeverity = (input: SeverityInput, ctx: SeverityContext): Severity =>
  SEVERITY_RULES.find((rule) => rule.matches(input, ctx))?.severity ?? 'Informational';

export const severityRank = (severity: Severity): number => {
  switch (severity) {
    case 'Critical':
      return 0;
    case 'Important':
      return 1;
    case 'Informational':
      return 2;
  }
};
