import type { ClusterAlias } from './config/types.js';
import type { OcClient } from './collector/oc.js';
import { debug } from './debug.js';
import type { VersionHistoryEntry } from './domain/types.js';

export interface ClusterInfo {
  clusterId?: string;
  server?: string;
  user?: string;
  loggedIn: boolean;
}

export interface ClusterDisplay {
  display: string;
  alias?: string;
  aliasId?: string;
}

export const sanitizeClusterId = (value: string): string => value.replace(/[^\w\-.]/g, '_');

/**
 * `https://api.cluster-abc.example.com:6443` → `cluster-abc.example.com`.
 */
export const clusterIdFromServer = (serverUrl: string): string => {
  let host = serverUrl.trim().replace(/^https?:\/\//, '');
  host = host.split('/')[0].split(':')[0];
  if (host.startsWith('api.')) {
    host = host.slice(4);
  }
  return sanitizeClusterId(host);
};

export const formatClusterName = (clusterId: string): string => clusterId.split('.')[0] || clusterId;

/** `4.14.8 (Completed), 4.14.6 (Partial)` */
export const formatVersionHistory = (entries: readonly VersionHistoryEntry[]): string =>
  entries.map((entry) => (entry.state ? `${entry.version} (${entry.state})` : entry.version)).join(', ');

export const resolveClusterDisplay = (
  clusterId: string,
  aliases: Record<string, ClusterAlias>,
  fallback = 'CP4I Chief Console',
): ClusterDisplay => {
  const entry = aliases[clusterId];
  if (typeof entry === 'string') {
    return { display: entry, alias: entry };
  }
  if (entry) {
    return { display: entry.name ?? fallback, alias: entry.name, aliasId: entry.id };
  }
  return { display: fallback };
};

export const getClusterInfo = async (oc: OcClient): Promise<ClusterInfo> => {
  const server = await oc.getText(['whoami', '--show-server']);
  const user = await oc.getText(['whoami']);
  const info: ClusterInfo = {
    clusterId: server ? clusterIdFromServer(server) : undefined,
    server,
    user,
    loggedIn: Boolean(server),
  };
  debug('getClusterInfo', info);
  return info;
};
