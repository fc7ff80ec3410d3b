import { join } from 'node:path';
import { formatClusterName, getClusterInfo, resolveClusterDisplay } from './cluster.js';
import { collectSnapshot } from './collector/collector.js';
import type { OcClient } from './collector/oc.js';
import { compilePatterns, loadRuleset } from './config/rules.js';
import type { AppConfig } from './config/types.js';
import { debug, warn } from './debug.js';
import { categorizeAll, summarizeCategories } from './domain/categorizer.js';
import { diffHistory } from './domain/diff.js';
import type { ChangeSet, Snapshot } from './domain/types.js';
import { writeSpreadsheet } from './report/csv.js';
import { writeDashboard } from './report/html.js';
import { FileSnapshotStore, snapshotStamp, type SnapshotStore } from './store/snapshotStore.js';

export interface PipelineDeps {
  oc: OcClient;
  store?: SnapshotStore;
  now?: () => Date;
}

export interface PipelineResult {
  clusterId: string;
  snapshot: Snapshot;
  snapshotPath: string;
  changeSet: ChangeSet;
  dashboardPath: string;
  spreadsheetPaths: string[];
}

export const NOT_LOGGED_IN = 'Not logged in to an OpenShift cluster. Run "oc login" first.';

export const requireClusterId = async (oc: OcClient): Promise<string> => {
  const info = await getClusterInfo(oc);
  if (!info.loggedIn || !info.clusterId) {
    throw new Error(NOT_LOGGED_IN);
  }
  return info.clusterId;
};

/** One-line-per-fact console summary of a change-set. */
export const describeChangeSet = (changeSet: ChangeSet): string[] => {
  if (!changeSet.comparable) {
    return ['First run for this cluster: baseline snapshot saved, nothing to compare yet.'];
  }
  const { counts, severityCounts } = changeSet;
  return [
    `Compared with ${changeSet.previousTimestamp ?? 'unknown'} (${changeSet.elapsed} ago)`,
    `Changes: ${changeSet.changes.length} (added ${counts.additions}, deleted ${counts.deletions}, modified ${counts.modifications}, restarted ${counts.restarts})`,
    `Severity: ${severityCounts.critical} critical, ${severityCounts.important} important, ${severityCounts.informational} informational`,
  ];
};

/**
 * Collect, persist, compare with history, categorize and render. Outputs go
 * under `<outputDir>/<clusterId>/`.
 */
export const runPipeline = async (config: AppConfig, deps: PipelineDeps): Promise<PipelineResult> => {
  debug('runPipeline start', { outputDir: config.outputDir });
  const clusterId = await requireClusterId(deps.oc);
  const display = resolveClusterDisplay(clusterId, config.clusterAliases, formatClusterName(clusterId));
  const store = deps.store ?? new FileSnapshotStore(config.outputDir);

  const patterns = compilePatterns(config.cp4iNamespacePatterns, 'cp4iNamespacePatterns');
  for (const problem of patterns.problems) {
    warn(problem);
  }

  const snapshot = await collectSnapshot(deps.oc, {
    clusterIdentity: clusterId,
    clusterDisplay: display.display,
    cp4iNamespacePatterns: patterns.patterns,
    fallbackNamespace: config.fallbackNamespace,
    now: deps.now,
  });
  for (const error of snapshot.metadata.errors) {
    warn(error);
  }

  const snapshotPath = await store.save(snapshot);
  const history = await store.load(clusterId, config.historyDepth);
  const changeSet = diffHistory(history, config.severity);

  const ruleset = await loadRuleset(config.rulesPath);
  const categories = categorizeAll(snapshot.resourceRecords, ruleset);
  const summary = summarizeCategories(snapshot.resourceRecords, ruleset);

  const clusterDir = join(config.outputDir, clusterId);
  const dashboardPath = await writeDashboard(join(clusterDir, 'dashboard.html'), {
    snapshot,
    changeSet,
    categories,
    summary,
    clusterDisplay: display.display,
  });

  const spreadsheetPaths = config.spreadsheet
    ? await writeSpreadsheet(join(clusterDir, `sheets-${snapshotStamp(snapshot.collectedAt)}`), {
        snapshot,
        changeSet,
        categories,
        summary,
      })
    : [];

  debug('runPipeline end', { clusterId, snapshotPath, dashboardPath, changes: changeSet.changes.length });
  return { clusterId, snapshot, snapshotPath, changeSet, dashboardPath, spreadsheetPaths };
};

/** Re-diffs the stored history of a cluster without collecting. */
export const diffStored = async (config: AppConfig, clusterId: string, store?: SnapshotStore): Promise<ChangeSet> => {
  const history = await (store ?? new FileSnapshotStore(config.outputDir)).load(clusterId, config.historyDepth);
  return diffHistory(history, config.severity);
};
