import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { debug, warn } from '../debug.js';
import { EMPTY_RULESET, type CategoryRule, type Ruleset } from '../domain/categorizer.js';
import { ResourceKindSchema } from './types.js';

const ruleShape = <A extends z.ZodTypeAny>(assignment: A) =>
  z.object({
    pattern: z.string().min(1),
    scope: z.union([ResourceKindSchema, z.literal('*')]).default('*'),
    namespace: z.string().min(1).optional(),
    label: z.string().min(1).optional(),
    assignment,
  });

const WorkloadRuleSchema = ruleShape(z.boolean());
const CriticalityRuleSchema = ruleShape(z.enum(['Critical', 'Important', 'Optional']));
const LicensingRuleSchema = ruleShape(z.enum(['CP4ILicensed', 'OpenShiftPlatform', 'Free', 'Unlicensed']));

export interface RulesetCompilation {
  ruleset: Ruleset;
  problems: string[];
}

export interface PatternCompilation {
  patterns: RegExp[];
  problems: string[];
}

const compileRegex = (source: string): RegExp | string => {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

/** Compiles regex sources, dropping and reporting the ones that do not parse. */
export const compilePatterns = (sources: readonly string[], label: string): PatternCompilation => {
  const patterns: RegExp[] = [];
  const problems: string[] = [];
  sources.forEach((source, index) => {
    const compiled = compileRegex(source);
    if (typeof compiled === 'string') {
      problems.push(`${label}[${index}]: invalid pattern ${JSON.stringify(source)} skipped (${compiled})`);
    } else {
      patterns.push(compiled);
    }
  });
  return { patterns, problems };
};

const compileAxis = <A>(
  axis: string,
  entries: unknown,
  schema: z.ZodType<{ pattern: string; scope: CategoryRule<A>['scope']; namespace?: string; label?: string; assignment: A }, z.ZodTypeDef, unknown>,
  problems: string[],
): CategoryRule<A>[] => {
  if (entries === undefined || entries === null) return [];
  if (!Array.isArray(entries)) {
    problems.push(`${axis}: expected a list of rules, axis ignored`);
    return [];
  }

  const rules: CategoryRule<A>[] = [];
  entries.forEach((entry: unknown, index) => {
    const where = `${axis}[${index}]`;
    const parsed = schema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      problems.push(`${where}: ${issue ? `${issue.path.join('.') || 'rule'} ${issue.message}` : 'invalid rule'}; skipped`);
      return;
    }

    const pattern = compileRegex(parsed.data.pattern);
    if (typeof pattern === 'string') {
      problems.push(`${where}: invalid pattern ${JSON.stringify(parsed.data.pattern)} skipped (${pattern})`);
      return;
    }

    let namespace: RegExp | undefined;
    if (parsed.data.namespace !== undefined) {
      const compiled = compileRegex(parsed.data.namespace);
      if (typeof compiled === 'string') {
        problems.push(`${where}: invalid namespace pattern ${JSON.stringify(parsed.data.namespace)} skipped (${compiled})`);
        return;
      }
      namespace = compiled;
    }

    rules.push({
      pattern,
      scope: parsed.data.scope,
      namespace,
      label: parsed.data.label,
      assignment: parsed.data.assignment,
    });
  });
  return rules;
};

/**
 * Builds a ruleset from parsed YAML. Rules keep their file order; every rule
 * that cannot be used is left out and described in `problems`.
 */
export const compileRuleset = (raw: unknown): RulesetCompilation => {
  const problems: string[] = [];
  if (raw === undefined || raw === null) return { ruleset: EMPTY_RULESET, problems };
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return { ruleset: EMPTY_RULESET, problems: ['ruleset: expected a mapping of workload, criticality and licensing rules'] };
  }

  const input = new Map<string, unknown>(Object.entries(raw));
  const ruleset: Ruleset = {
    workload: compileAxis('workload', input.get('workload'), WorkloadRuleSchema, problems),
    criticality: compileAxis('criticality', input.get('criticality'), CriticalityRuleSchema, problems),
    licensing: compileAxis('licensing', input.get('licensing'), LicensingRuleSchema, problems),
  };

  debug('compileRuleset end', {
    workload: ruleset.workload.length,
    criticality: ruleset.criticality.length,
    licensing: ruleset.licensing.length,
    problems: problems.length,
  });
  return { ruleset, problems };
};

/**
 * Reads a ruleset file. A missing file yields the empty ruleset (every resource
 * gets the default assignment); malformed rules are reported here, once.
 */
export const loadRuleset = async (rulesPath: string): Promise<Ruleset> => {
  const absPath = resolve(rulesPath);
  debug('loadRuleset start', { absPath });

  let raw: string;
  try {
    raw = await readFile(absPath, 'utf8');
  } catch (error) {
    warn(`Ruleset not readable, using default categories: ${absPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return EMPTY_RULESET;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    warn(`Ruleset is not valid YAML, using default categories: ${absPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return EMPTY_RULESET;
  }

  const { ruleset, problems } = compileRuleset(parsed);
  for (const problem of problems) {
    warn(`ruleset ${problem}`);
  }
  debug('loadRuleset end', { absPath, problems: problems.length });
  return ruleset;
};
