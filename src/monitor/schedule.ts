import { setTimeout as delay } from 'node:timers/promises';
import { debug, warn } from '../debug.js';

export const MIN_INTERVAL_SECONDS = 10;

export interface MonitorOptions {
  /** Seconds between run starts. */
  intervalSeconds: number;
  /** Lower bound on the pause after a run, however long it took. */
  minGapSeconds: number;
  /** 0 runs until stopped. */
  maxRuns: number;
  runOnce: (run: number) => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  signal?: AbortSignal;
}

export interface MonitorResult {
  runs: number;
  failures: number;
  durationsMs: number[];
}

export const computeWaitSeconds = (intervalSeconds: number, runSeconds: number, minGapSeconds: number): number =>
  Math.max(intervalSeconds - runSeconds, minGapSeconds);

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};

/**
 * Repeats `runOnce` so that starts are `intervalSeconds` apart. A failed run is
 * reported and the loop keeps going.
 */
export const runMonitor = async (options: MonitorOptions): Promise<MonitorResult> => {
  if (options.intervalSeconds < MIN_INTERVAL_SECONDS) {
    throw new Error(`Interval must be at least ${MIN_INTERVAL_SECONDS} seconds`);
  }
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const result: MonitorResult = { runs: 0, failures: 0, durationsMs: [] };
  debug('runMonitor start', {
    intervalSeconds: options.intervalSeconds,
    minGapSeconds: options.minGapSeconds,
    maxRuns: options.maxRuns,
  });

  while (!options.signal?.aborted) {
    result.runs += 1;
    const startedAt = now();
    try {
      await options.runOnce(result.runs);
    } catch (error) {
      result.failures += 1;
      warn(`Run #${result.runs} failed`, { error: error instanceof Error ? error.message : String(error) });
    }
    const durationMs = now() - startedAt;
    result.durationsMs.push(durationMs);

    if (durationMs > options.intervalSeconds * 800) {
      warn(`Run #${result.runs} took ${(durationMs / 1000).toFixed(1)}s, over 80% of the interval`);
    }

    if (options.maxRuns > 0 && result.runs >= options.maxRuns) break;

    const waitSeconds = computeWaitSeconds(options.intervalSeconds, durationMs / 1000, options.minGapSeconds);
    debug('runMonitor waiting', { run: result.runs, durationMs, waitSeconds });
    await sleep(waitSeconds * 1000, options.signal);
  }

  debug('runMonitor end', result);
  return result;
};
