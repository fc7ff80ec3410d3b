import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { diffSnapshots } from '../../src/domain/diff.js';
import { DEFAULT_SEVERITY_CONFIG } from '../../src/domain/types.js';
import { escapeCsv, toCsv, writeSpreadsheet } from '../../src/report/csv.js';
import { node, pod, snapshot } from '../helpers.js';

const tempPaths: string[] = [];

afterEach(async () => {
  for (const path of tempPaths.splice(0, tempPaths.length)) {
    await rm(path, { recursive: true, force: true });
  }
});

describe('escapeCsv', () => {
  it('quotes fields with separators, quotes or newlines', () => {
    expect(escapeCsv('plain')).toBe('plain');
    expect(escapeCsv('a,b')).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv(undefined)).toBe('');
    expect(escapeCsv(3)).toBe('3');
  });
});

describe('toCsv', () => {
  it('writes a header row and one line per row', () => {
    expect(toCsv(['A', 'B'], [[1, 'x'], [2, undefined]])).toBe('A,B\n1,x\n2,\n');
  });
});

describe('writeSpreadsheet', () => {
  it('writes the four sheets', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'chief-console-csv-'));
    tempPaths.push(dir);

    const before = snapshot('2026-03-01T10:00:00.000Z', [node('w1')]);
    const after = snapshot('2026-03-01T10:05:00.000Z', [node('w1', { status: 'NotReady' }), pod('a', 'cp4i')]);
    const changeSet = diffSnapshots(before, after, DEFAULT_SEVERITY_CONFIG);

    const written = await writeSpreadsheet(dir, { snapshot: after, changeSet });
    expect(written.map((p) => p.slice(dir.length + 1))).toEqual(['summary.csv', 'changes.csv', 'pods.csv', 'nodes.csv']);

    const changes = (await readFile(join(dir, 'changes.csv'), 'utf8')).split('\n');
    expect(changes[0]).toBe('Severity,Namespace,Kind,Name,Change,Detail,Before,After');
    expect(changes[1]).toBe('Critical,,Node,w1,Modified,status: Ready -> NotReady,status=Ready,status=NotReady');
    expect(changes[2]).toBe('Important,cp4i,Pod,a,Added,"added (phase=Running, restarts=0, ready=1/1)",,"phase=Running, restarts=0, ready=1/1"');

    const summary = await readFile(join(dir, 'summary.csv'), 'utf8');
    expect(summary).toContain('Elapsed,5 minutes\n');
    expect(summary).toContain('Critical,1\n');

    const nodes = (await readFile(join(dir, 'nodes.csv'), 'utf8')).split('\n');
    expect(nodes[1]).toBe('w1,NotReady,worker,,,');
  });

  it('lists the cluster version and URLs in the summary sheet', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'chief-console-csv-'));
    tempPaths.push(dir);
    const s = snapshot('2026-03-01T10:00:00.000Z', [], {
      metadata: {
        collectorVersion: 'test',
        openshiftVersion: '4.14.8',
        versionHistory: [
          { version: '4.14.8', state: 'Completed' },
          { version: '4.14.6', state: 'Partial' },
        ],
        consoleUrl: 'https://console.apps.example.test/?a=1&b=2',
        apiUrl: 'https://api.example.test:6443',
        errors: [],
        warnings: [],
      },
    });

    await writeSpreadsheet(dir, { snapshot: s });

    const summary = (await readFile(join(dir, 'summary.csv'), 'utf8')).split('\n');
    expect(summary).toContain('OpenShift version,4.14.8');
    expect(summary).toContain('Version history,"4.14.8 (Completed), 4.14.6 (Partial)"');
    expect(summary).toContain('Console URL,https://console.apps.example.test/?a=1&b=2');
    expect(summary).toContain('API server,https://api.example.test:6443');
  });
});
