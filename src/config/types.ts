import { z } from 'zod';
import { DEFAULT_SEVERITY_CONFIG, RESOURCE_KINDS } from '../domain/types.js';

export const ResourceKindSchema = z.enum(RESOURCE_KINDS);

export const SeverityConfigSchema = z.object({
  restartCriticalThreshold: z.number().int().min(1).default(DEFAULT_SEVERITY_CONFIG.restartCriticalThreshold),
  cp4iImportantKinds: z.array(ResourceKindSchema).default([...DEFAULT_SEVERITY_CONFIG.cp4iImportantKinds]),
  failurePhases: z.array(z.string().min(1)).default([...DEFAULT_SEVERITY_CONFIG.failurePhases]),
});

export const DEFAULT_CP4I_NAMESPACE_PATTERNS = [
  'cp4i',
  'integration',
  'ibm.*navigator',
  'eventstreams',
  'apic',
  'ace',
  'mq',
];

const ClusterAliasSchema = z.union([
  z.string().min(1),
  z.object({
    name: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
  }),
]);

export type ClusterAlias = z.infer<typeof ClusterAliasSchema>;

export const AppConfigSchema = z.object({
  outputDir: z.string().min(1).default('./output'),
  rulesPath: z.string().min(1).default('./resource_categories.yaml'),
  historyDepth: z.number().int().min(2).max(50).default(2),
  ocPath: z.string().min(1).default('oc'),
  ocTimeoutMs: z.number().int().min(1000).default(30_000),
  cp4iNamespacePatterns: z.array(z.string().min(1)).default(DEFAULT_CP4I_NAMESPACE_PATTERNS),
  fallbackNamespace: z.string().min(1).default('openshift-operators'),
  spreadsheet: z.boolean().default(true),
  severity: SeverityConfigSchema.default({}),
  clusterAliases: z.record(ClusterAliasSchema).default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ConfigOverrides {
  outputDir?: string;
  spreadsheet?: boolean;
}
