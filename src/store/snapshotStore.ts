import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { sanitizeClusterId } from '../cluster.js';
import { debug, warn } from '../debug.js';
import type { Snapshot } from '../domain/types.js';
import { parseSnapshot, serializeSnapshot } from './schema.js';

export interface SnapshotStore {
  /** Persists a snapshot and returns where it was written. */
  save(snapshot: Snapshot): Promise<string>;
  /** The most recent `nBack` snapshots of a cluster, oldest first. */
  load(clusterIdentity: string, nBack?: number): Promise<Snapshot[]>;
}

const SNAPSHOT_FILE = /^snapshot-.*\.json$/;

const pad = (n: number, width = 2): string => String(n).padStart(width, '0');

/** `20260102-030405-006` in UTC, sortable and filesystem safe. */
export const snapshotStamp = (iso: string): string => {
  const d = new Date(iso);
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `-${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}` +
    `-${pad(d.getUTCMilliseconds(), 3)}`
  );
};

export class FileSnapshotStore implements SnapshotStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
    debug('FileSnapshotStore initialized', { rootDir: this.rootDir });
  }

  snapshotDir(clusterIdentity: string): string {
    return join(this.rootDir, sanitizeClusterId(clusterIdentity), 'snapshots');
  }

  async save(snapshot: Snapshot): Promise<string> {
    const dir = this.snapshotDir(snapshot.clusterIdentity);
    await mkdir(dir, { recursive: true });
    const path = join(dir, `snapshot-${snapshotStamp(snapshot.collectedAt)}.json`);
    await writeFile(path, serializeSnapshot(snapshot), 'utf8');
    debug('snapshot saved', { path, records: snapshot.resourceRecords.length });
    return path;
  }

  async load(clusterIdentity: string, nBack = 2): Promise<Snapshot[]> {
    const dir = this.snapshotDir(clusterIdentity);
    debug('loadSnapshots start', { dir, nBack });

    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      debug('loadSnapshots no snapshot directory', { dir, error });
      return [];
    }

    // Stamped names sort chronologically; only the newest valid files are read.
    const files = entries.filter((name) => SNAPSHOT_FILE.test(name)).sort().reverse();
    const recent: Snapshot[] = [];
    for (const file of files) {
      if (recent.length >= nBack) break;
      const path = join(dir, file);
      try {
        const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
        recent.push(parseSnapshot(raw));
      } catch (error) {
        warn(`Skipping unreadable snapshot ${path}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    recent.sort((a, b) => Date.parse(a.collectedAt) - Date.parse(b.collectedAt));

    debug('loadSnapshots end', { files: files.length, returned: recent.length });
    return recent;
  }
}
