import { describe, expect, it } from 'vitest';
import {
  clusterIdFromServer,
  formatClusterName,
  getClusterInfo,
  resolveClusterDisplay,
  sanitizeClusterId,
} from '../src/cluster.js';
import { fakeOc } from './fakeOc.js';

describe('clusterIdFromServer', () => {
  it('strips protocol, port and the api prefix', () => {
    expect(clusterIdFromServer('https://api.cluster-abc.example.test:6443')).toBe('cluster-abc.example.test');
    expect(clusterIdFromServer('https://ocp.example.test/path')).toBe('ocp.example.test');
  });
});

describe('sanitizeClusterId', () => {
  it('replaces characters unsafe in directory names', () => {
    expect(sanitizeClusterId('a/b:c d')).toBe('a_b_c_d');
  });
});

describe('formatClusterName', () => {
  it('keeps the first label of the host', () => {
    expect(formatClusterName('cluster-abc.example.test')).toBe('cluster-abc');
  });
});

describe('resolveClusterDisplay', () => {
  const aliases = {
    'a.example.test': 'Alpha',
    'b.example.test': { name: 'Beta', id: 'B-01' },
    'c.example.test': { id: 'C-01' },
  };

  it('uses a plain string alias as the display name', () => {
    expect(resolveClusterDisplay('a.example.test', aliases)).toEqual({ display: 'Alpha', alias: 'Alpha' });
  });

  it('uses the name and id of an object alias', () => {
    expect(resolveClusterDisplay('b.example.test', aliases)).toEqual({ display: 'Beta', alias: 'Beta', aliasId: 'B-01' });
  });

  it('falls back when no name is configured', () => {
    expect(resolveClusterDisplay('c.example.test', aliases, 'c').display).toBe('c');
    expect(resolveClusterDisplay('unknown', aliases).display).toBe('CP4I Chief Console');
  });
});

describe('getClusterInfo', () => {
  it('reads server and user from oc whoami', async () => {
    const oc = fakeOc({
      'whoami --show-server': 'https://api.cluster-abc.example.test:6443\n',
      whoami: 'kube:admin\n',
    });
    expect(await getClusterInfo(oc)).toEqual({
      clusterId: 'cluster-abc.example.test',
      server: 'https://api.cluster-abc.example.test:6443',
      user: 'kube:admin',
      loggedIn: true,
    });
  });

  it('reports not logged in when whoami fails', async () => {
    const info = await getClusterInfo(fakeOc({}));
    expect(info.loggedIn).toBe(false);
    expect(info.clusterId).toBeUndefined();
  });
});
