import { Command, InvalidArgumentError } from 'commander';
import { OcClient } from './collector/oc.js';
import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { debug, setDebugEnabled } from './debug.js';
import { runMonitor } from './monitor/schedule.js';
import { describeChangeSet, diffStored, requireClusterId, runPipeline } from './pipeline.js';

const VERSION = '0.3.0';

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type RunOptions = {
  output?: string;
  spreadsheet?: boolean;
};

type DiffOptions = {
  cluster?: string;
};

type WatchOptions = RunOptions & {
  interval: number;
  minGap: number;
  maxRuns: number;
};

const integer = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
};

const ocFor = (config: AppConfig): OcClient => new OcClient({ ocPath: config.ocPath, timeoutMs: config.ocTimeoutMs });

const configFor = (globals: GlobalOptions, opts: RunOptions = {}): Promise<AppConfig> =>
  loadConfig(globals.config, {
    outputDir: opts.output,
    // commander reports `true` unless --no-spreadsheet was given
    spreadsheet: opts.spreadsheet === false ? false : undefined,
  });

const runOnce = async (config: AppConfig): Promise<void> => {
  const result = await runPipeline(config, { oc: ocFor(config) });
  console.log(`Cluster: ${result.clusterId}`);
  console.log(`Resources collected: ${result.snapshot.resourceRecords.length}`);
  for (const line of describeChangeSet(result.changeSet)) {
    console.log(line);
  }
  console.log(`Snapshot written to: ${result.snapshotPath}`);
  console.log(`Dashboard written to: ${result.dashboardPath}`);
  if (result.spreadsheetPaths.length > 0) {
    console.log(`Spreadsheet written to: ${result.spreadsheetPaths.join(', ')}`);
  }
};

export const run = async (argv: string[]): Promise<void> => {
  if (argv.includes('--debug') || argv.includes('-d')) {
    setDebugEnabled(true);
  }
  debug('run start', { argv });
  const program = new Command();

  program
    .name('chief-console')
    .description('CP4I cluster snapshots with change detection and categorized dashboards')
    .version(VERSION)
    .option('-c, --config <path>', 'config file path (default: config.yaml when present)')
    .option('-d, --debug', 'enable debug logging');

  program
    .command('run', { isDefault: true })
    .description('collect a snapshot, compare it with the previous one and render the dashboard')
    .option('-o, --output <dir>', 'override output directory')
    .option('--no-spreadsheet', 'skip the CSV export')
    .action(async (opts: RunOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      debug('run command', { globals, opts });
      await runOnce(await configFor(globals, opts));
    });

  program
    .command('diff')
    .description('compare the stored snapshots of a cluster without collecting')
    .option('--cluster <id>', 'cluster identity (default: the cluster oc is logged in to)')
    .action(async (opts: DiffOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const config = await configFor(globals);
      const clusterId = opts.cluster ?? (await requireClusterId(ocFor(config)));
      const changeSet = await diffStored(config, clusterId);
      console.log(`Cluster: ${clusterId}`);
      for (const line of describeChangeSet(changeSet)) {
        console.log(line);
      }
      for (const change of changeSet.changes) {
        console.log(`[${change.severity}] ${change.kind} ${change.namespace ?? '-'}/${change.name}: ${change.detail}`);
      }
    });

  program
    .command('watch')
    .description('re-run collection periodically')
    .option('--interval <seconds>', 'seconds between run starts (min 10)', integer, 120)
    .option('--min-gap <seconds>', 'minimum pause between runs', integer, 10)
    .option('--max-runs <n>', 'stop after n runs, 0 for unlimited', integer, 0)
    .option('-o, --output <dir>', 'override output directory')
    .option('--no-spreadsheet', 'skip the CSV export')
    .action(async (opts: WatchOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const config = await configFor(globals, opts);
      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once('SIGINT', stop);
      try {
        const result = await runMonitor({
          intervalSeconds: opts.interval,
          minGapSeconds: opts.minGap,
          maxRuns: opts.maxRuns,
          signal: controller.signal,
          runOnce: async (n) => {
            console.log(`Run #${n} - ${new Date().toISOString()}`);
            await runOnce(config);
          },
        });
        console.log(`Monitoring stopped after ${result.runs} run(s), ${result.failures} failed.`);
      } finally {
        process.removeListener('SIGINT', stop);
      }
    });

  await program.parseAsync(argv);
  debug('run end');
};

export const main = async (): Promise<void> => {
  debug('main start');
  try {
    await run(process.argv);
    debug('main end success');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    debug('main end failure', { message });
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
};

const isMain = import.meta.url === `file://${process.argv[1]}`;
if (isMain) {
  void main();
}
