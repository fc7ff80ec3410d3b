import { describe, expect, it } from 'vitest';
import {
  categorize,
  categorizeAll,
  DEFAULT_ASSIGNMENT,
  EMPTY_RULESET,
  summarizeCategories,
  type Ruleset,
} from '../../src/domain/categorizer.js';
import { namespace, pod } from '../helpers.js';

const ruleset: Ruleset = {
  workload: [
    { pattern: /operator/i, scope: 'Pod', assignment: false },
    { pattern: /.*-ir-/i, scope: 'Pod', assignment: true },
    { pattern: /^orders$/i, scope: 'Pod', label: 'app', assignment: true },
  ],
  criticality: [
    { pattern: /./i, scope: 'Pod', namespace: /^openshift-/i, assignment: 'Critical' },
    { pattern: /.*-ir-/i, scope: '*', assignment: 'Important' },
    { pattern: /.*-ir-/i, scope: 'Pod', assignment: 'Critical' },
  ],
  licensing: [
    { pattern: /.*(-ir-|-qm-)/i, scope: 'Pod', assignment: 'CP4ILicensed' },
    { pattern: /./i, scope: 'Pod', namespace: /^openshift-/i, assignment: 'OpenShiftPlatform' },
  ],
};

describe('categorize', () => {
  it('gives the first matching rule of each axis', () => {
    expect(categorize(pod('orders-ir-0', 'cp4i'), ruleset)).toEqual({
      isWorkload: true,
      criticality: 'Important',
      licensingClass: 'CP4ILicensed',
    });
  });

  it('falls back to the default assignment when nothing matches', () => {
    expect(categorize(pod('misc', 'apps'), ruleset)).toEqual(DEFAULT_ASSIGNMENT);
    expect(categorize(pod('orders-ir-0', 'cp4i'), EMPTY_RULESET)).toEqual(DEFAULT_ASSIGNMENT);
  });

  it('restricts rules to their scope and namespace', () => {
    expect(categorize(namespace('orders-ir-ns'), ruleset).licensingClass).toBe('Unlicensed');
    expect(categorize(namespace('orders-ir-ns'), ruleset).criticality).toBe('Important');
    expect(categorize(pod('router-1', 'openshift-ingress'), ruleset)).toMatchObject({
      criticality: 'Critical',
      licensingClass: 'OpenShiftPlatform',
    });
  });

  it('matches label values instead of names when a label is named', () => {
    expect(categorize(pod('web-7f9', 'apps', { labels: { app: 'orders' } }), ruleset).isWorkload).toBe(true);
    expect(categorize(pod('orders', 'apps'), ruleset).isWorkload).toBe(false);
  });

  it('only matches patterns at the start of the name', () => {
    const rules: Ruleset = { ...EMPTY_RULESET, criticality: [{ pattern: /operator/i, scope: 'Pod', assignment: 'Critical' }] };
    expect(categorize(pod('ibm-mq-operator-0', 'cp4i'), rules).criticality).toBe('Optional');
    expect(categorize(pod('operator-0', 'cp4i'), rules).criticality).toBe('Critical');
  });

  it('matches namespace patterns at the start of the namespace', () => {
    const rules: Ruleset = { ...EMPTY_RULESET, licensing: [{ pattern: /./i, scope: 'Pod', namespace: /apic/i, assignment: 'CP4ILicensed' }] };
    expect(categorize(pod('gw-0', 'apic-prod'), rules).licensingClass).toBe('CP4ILicensed');
    expect(categorize(pod('gw-0', 'cp4i-apic'), rules).licensingClass).toBe('Unlicensed');
  });

  it('is pure: the same record always gets the same assignment', () => {
    const record = pod('mq-qm-0', 'cp4i');
    expect(categorize(record, ruleset)).toEqual(categorize(record, ruleset));
  });
});

describe('categorizeAll', () => {
  it('keys each assignment by identity', () => {
    const [entry] = categorizeAll([pod('orders-ir-0', 'cp4i')], ruleset);
    expect(entry.key).toBe('Pod/cp4i/orders-ir-0');
    expect(entry.assignment.isWorkload).toBe(true);
  });
});

describe('summarizeCategories', () => {
  it('sums licensed CPU as VPC and counts pods per class', () => {
    const summary = summarizeCategories(
      [
        pod('orders-ir-0', 'cp4i', { cpuRequestCores: 0.25, memoryRequestBytes: 512 }),
        pod('mq-qm-0', 'cp4i', { cpuRequestCores: 1 }),
        pod('router-1', 'openshift-ingress', { cpuRequestCores: 0.1 }),
        pod('misc', 'apps'),
        namespace('cp4i'),
      ],
      ruleset,
    );

    expect(summary.total).toBe(4);
    expect(summary.totalVpc).toBe(1.25);
    expect(summary.totalCpuRequestCores).toBe(1.35);
    expect(summary.totalMemoryRequestBytes).toBe(512);
    expect(summary.licensing).toEqual({ CP4ILicensed: 2, OpenShiftPlatform: 1, Free: 0, Unlicensed: 1 });
    expect(summary.workloads).toBe(1);
    expect(summary.infrastructure).toBe(3);
  });
});
