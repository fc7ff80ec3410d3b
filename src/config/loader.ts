import { readFile } from 'node:fs/promises';
import { dirname, extname, join, resolve } from 'node:path';
import { env } from 'node:process';
import yaml from 'js-yaml';
import { debug, warn } from '../debug.js';
import { DEFAULT_SEVERITY_CONFIG, type ResourceKind, type SeverityConfig } from '../domain/types.js';
import { AppConfigSchema, ResourceKindSchema, SeverityConfigSchema, type AppConfig, type ConfigOverrides } from './types.js';

export const DEFAULT_CONFIG_PATH = 'config.yaml';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const parseByExtension = (raw: string, path: string): unknown => {
  debug('parseByExtension start', { path });
  if (path.endsWith('.json')) {
    const parsed: unknown = JSON.parse(raw);
    debug('parseByExtension end', { format: 'json' });
    return parsed;
  }
  const parsed = yaml.load(raw);
  debug('parseByExtension end', { format: 'yaml' });
  return parsed;
};

const readOptional = async (path: string): Promise<string | undefined> => {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return undefined;
    throw error;
  }
};

const parseMapping = (raw: string, path: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = parseByExtension(raw, path);
  } catch (error) {
    debug('parse failed', { path, error });
    throw new Error(`Invalid config format in ${path}`);
  }
  // An empty YAML document is an empty config.
  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    debug('invalid parsed type', { parsedType: typeof parsed });
    throw new Error(`Invalid config format in ${path}`);
  }
  return parsed;
};

export interface SeverityResolution {
  config: SeverityConfig;
  problems: string[];
}

/**
 * Resolves the severity section field by field. An invalid field does not fail
 * the load: it is reported and its default is used instead.
 */
export const resolveSeverityConfig = (raw: unknown): SeverityResolution => {
  const defaults: SeverityConfig = {
    restartCriticalThreshold: DEFAULT_SEVERITY_CONFIG.restartCriticalThreshold,
    cp4iImportantKinds: [...DEFAULT_SEVERITY_CONFIG.cp4iImportantKinds],
    failurePhases: [...DEFAULT_SEVERITY_CONFIG.failurePhases],
  };
  if (raw === undefined || raw === null) return { config: defaults, problems: [] };
  if (!isRecord(raw)) {
    return { config: defaults, problems: ['severity: expected a mapping, using defaults'] };
  }

  const problems: string[] = [];
  const shape = SeverityConfigSchema.shape;

  const threshold = shape.restartCriticalThreshold.safeParse(raw.restartCriticalThreshold);
  if (!threshold.success) {
    problems.push(
      `severity.restartCriticalThreshold: invalid value ${JSON.stringify(raw.restartCriticalThreshold)}, using ${defaults.restartCriticalThreshold}`,
    );
  }

  let kinds: ResourceKind[] = defaults.cp4iImportantKinds;
  if (raw.cp4iImportantKinds !== undefined) {
    if (Array.isArray(raw.cp4iImportantKinds)) {
      kinds = [];
      for (const entry of raw.cp4iImportantKinds) {
        const kind = ResourceKindSchema.safeParse(entry);
        if (kind.success) {
          kinds.push(kind.data);
        } else {
          problems.push(`severity.cp4iImportantKinds: unknown kind ${JSON.stringify(entry)} skipped`);
        }
      }
    } else {
      problems.push('severity.cp4iImportantKinds: expected a list, using defaults');
    }
  }

  const phases = shape.failurePhases.safeParse(raw.failurePhases);
  if (!phases.success) {
    problems.push('severity.failurePhases: expected a list of phase names, using defaults');
  }

  return {
    config: {
      restartCriticalThreshold: threshold.success ? threshold.data : defaults.restartCriticalThreshold,
      cp4iImportantKinds: kinds,
      failurePhases: phases.success ? phases.data : defaults.failurePhases,
    },
    problems,
  };
};

const mergeLocal = (base: Record<string, unknown>, local: Record<string, unknown>): Record<string, unknown> => {
  const merged = { ...base };
  for (const [key, value] of Object.entries(local)) {
    if (key === 'clusterAliases' && isRecord(value)) {
      const current = isRecord(merged.clusterAliases) ? merged.clusterAliases : {};
      merged.clusterAliases = { ...current, ...value };
      continue;
    }
    merged[key] = value;
  }
  return merged;
};

const localPathFor = (absPath: string): string => {
  const ext = extname(absPath) || '.yaml';
  return join(dirname(absPath), `config.local${ext}`);
};

/**
 * Loads the config file, merges `config.local.*` beside it, applies CLI and
 * environment overrides and validates the result. Without an explicit path a
 * missing `config.yaml` means defaults.
 */
export const loadConfig = async (configPath?: string, overrides?: ConfigOverrides): Promise<AppConfig> => {
  debug('loadConfig start', { configPath, overrides });
  const absPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  const raw = await readOptional(absPath);
  if (raw === undefined && configPath !== undefined) {
    debug('loadConfig readFile failed', { absPath });
    throw new Error(`Config file not found: ${absPath}`);
  }

  let configInput = raw === undefined ? {} : parseMapping(raw, absPath);

  const localPath = localPathFor(absPath);
  const localRaw = await readOptional(localPath);
  if (localRaw !== undefined) {
    debug('loadConfig merging local overrides', { localPath });
    configInput = mergeLocal(configInput, parseMapping(localRaw, localPath));
  }

  if (typeof env.CHIEF_CONSOLE_OUTPUT_DIR === 'string' && env.CHIEF_CONSOLE_OUTPUT_DIR.trim().length > 0) {
    configInput.outputDir = env.CHIEF_CONSOLE_OUTPUT_DIR.trim();
    debug('CHIEF_CONSOLE_OUTPUT_DIR env override applied');
  }

  if (typeof env.CHIEF_CONSOLE_OC_PATH === 'string' && env.CHIEF_CONSOLE_OC_PATH.trim().length > 0) {
    configInput.ocPath = env.CHIEF_CONSOLE_OC_PATH.trim();
    debug('CHIEF_CONSOLE_OC_PATH env override applied');
  }

  // Flags typed on the command line win over the environment.
  if (overrides?.outputDir) {
    debug('loadConfig applying outputDir override', { outputDir: overrides.outputDir });
    configInput.outputDir = overrides.outputDir;
  }

  if (overrides?.spreadsheet !== undefined) {
    configInput.spreadsheet = overrides.spreadsheet;
  }

  const severity = resolveSeverityConfig(configInput.severity);
  for (const problem of severity.problems) {
    warn(problem);
  }
  configInput.severity = severity.config;

  let config: AppConfig;
  try {
    config = AppConfigSchema.parse(configInput);
  } catch (error) {
    debug('loadConfig schema validation failed', { error });
    throw error;
  }

  debug('loadConfig end', {
    outputDir: config.outputDir,
    rulesPath: config.rulesPath,
    historyDepth: config.historyDepth,
    restartCriticalThreshold: config.severity.restartCriticalThreshold,
  });
  return config;
};
