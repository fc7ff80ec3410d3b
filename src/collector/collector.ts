import { debug } from '../debug.js';
import type {
  EventStreamsInstanceRecord,
  KafkaTopicRecord,
  NamespaceRecord,
  ResourceRecord,
  Snapshot,
} from '../domain/types.js';
import type { OcClient } from './oc.js';
import {
  parseClusterVersion,
  parseEventStreams,
  parseKafkaTopics,
  parseNamespaces,
  parseNodes,
  parseOperators,
  parsePods,
  parseRouteHost,
  parseRoutes,
  type ParsedList,
} from './parse.js';

export const COLLECTOR_VERSION = '0.3.0';

const CP4I_LABEL_HINT = /cp4i|integration/i;

export interface CollectOptions {
  clusterIdentity: string;
  clusterDisplay?: string;
  cp4iNamespacePatterns: readonly RegExp[];
  /** Namespace sampled for pods when no CP4I namespace is found. */
  fallbackNamespace: string;
  now?: () => Date;
}

export const discoverCp4iNamespaces = (
  namespaces: readonly NamespaceRecord[],
  patterns: readonly RegExp[],
): string[] =>
  namespaces
    .filter(
      (ns) =>
        patterns.some((pattern) => pattern.test(ns.name)) ||
        Object.keys(ns.labels).some((key) => CP4I_LABEL_HINT.test(key)),
    )
    .map((ns) => ns.name)
    .sort();

const topicBelongsTo = (topic: KafkaTopicRecord, instances: readonly EventStreamsInstanceRecord[]): boolean =>
  topic.cluster === undefined || instances.some((instance) => instance.name === topic.cluster);

/**
 * Captures one snapshot through read-only `oc get` and `oc whoami` calls,
 * issued one after another. Anything that cannot be read is recorded in the snapshot metadata
 * and the collection carries on.
 */
export const collectSnapshot = async (oc: OcClient, options: CollectOptions): Promise<Snapshot> => {
  const collectedAt = (options.now ?? (() => new Date()))().toISOString();
  const errorsBefore = oc.errors.length;
  const warnings: string[] = [];
  debug('collectSnapshot start', { clusterIdentity: options.clusterIdentity, collectedAt });

  const take = <T>(label: string, parsed: ParsedList<T>): T[] => {
    if (parsed.skipped > 0) {
      warnings.push(`${parsed.skipped} ${label} item(s) skipped: unexpected shape`);
    }
    return parsed.records;
  };

  const clusterVersion = parseClusterVersion(await oc.getJson(['get', 'clusterversion', 'version']));
  const consoleUrl = await oc.getText(['whoami', '--show-console']);
  const apiUrl = await oc.getText(['whoami', '--show-server']);

  const nodes = take('node', parseNodes(await oc.getJson(['get', 'nodes'])));
  const namespaces = take('namespace', parseNamespaces(await oc.getJson(['get', 'namespaces'])));

  const cp4iNamespaces = discoverCp4iNamespaces(namespaces, options.cp4iNamespacePatterns);
  if (cp4iNamespaces.length === 0) {
    warnings.push('No CP4I namespaces discovered. Cluster may not have CP4I installed.');
  }

  const operators = take('operator', parseOperators(await oc.getJson(['get', 'csv', '--all-namespaces'])));

  const podNamespaces = cp4iNamespaces.length > 0 ? cp4iNamespaces : [options.fallbackNamespace];
  const pods: ResourceRecord[] = [];
  for (const namespace of podNamespaces) {
    pods.push(...take('pod', parsePods(await oc.getJson(['get', 'pods', '-n', namespace]))));
  }

  const routes: ResourceRecord[] = [];
  for (const namespace of cp4iNamespaces) {
    routes.push(...take('route', parseRoutes(await oc.getJson(['get', 'routes', '-n', namespace]))));
  }

  const instances = take('eventstreams', parseEventStreams(await oc.getJson(['get', 'eventstreams', '--all-namespaces'])));
  if (instances.length === 0) {
    warnings.push('No Event Streams instances found. Kafka collection unavailable.');
  }

  const withBootstrap: EventStreamsInstanceRecord[] = [];
  for (const instance of instances) {
    const route = await oc.getJson(['get', 'route', `${instance.name}-kafka-bootstrap`, '-n', instance.namespace ?? '']);
    const host = parseRouteHost(route);
    withBootstrap.push(host ? { ...instance, bootstrapServer: `${host}:443` } : instance);
  }

  const topics: KafkaTopicRecord[] = [];
  const topicNamespaces = [...new Set(instances.map((i) => i.namespace).filter((ns): ns is string => Boolean(ns)))].sort();
  for (const namespace of topicNamespaces) {
    const owners = instances.filter((i) => i.namespace === namespace);
    const found = take('kafkatopic', parseKafkaTopics(await oc.getJson(['get', 'kafkatopic', '-n', namespace])));
    topics.push(...found.filter((topic) => topicBelongsTo(topic, owners)));
  }

  const resourceRecords: ResourceRecord[] = [
    ...nodes,
    ...namespaces,
    ...operators,
    ...pods,
    ...routes,
    ...withBootstrap,
    ...topics,
  ];

  const snapshot: Snapshot = {
    clusterIdentity: options.clusterIdentity,
    collectedAt,
    resourceRecords,
    cp4iNamespaces,
    metadata: {
      collectorVersion: COLLECTOR_VERSION,
      clusterDisplay: options.clusterDisplay,
      openshiftVersion: clusterVersion.version,
      versionHistory: clusterVersion.history,
      consoleUrl,
      apiUrl,
      errors: oc.errors.slice(errorsBefore),
      warnings,
    },
  };

  debug('collectSnapshot end', {
    nodes: nodes.length,
    namespaces: namespaces.length,
    cp4iNamespaces: cp4iNamespaces.length,
    operators: operators.length,
    pods: pods.length,
    routes: routes.length,
    eventStreams: instances.length,
    topics: topics.length,
    errors: snapshot.metadata.errors.length,
    warnings: warnings.length,
  });
  return snapshot;
};
