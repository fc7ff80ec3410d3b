import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { debug } from '../debug.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], options: { timeout: number }) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const execRunner: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    timeout: options.timeout,
    maxBuffer: 64 * 1024 * 1024,
    encoding: 'utf8',
  });
  return { stdout, stderr };
};

export interface OcClientOptions {
  ocPath: string;
  timeoutMs: number;
  runner?: CommandRunner;
}

const describeFailure = (error: unknown): string => {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = error.stderr;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return error instanceof Error ? error.message : String(error);
};

/**
 * Read-only wrapper around the `oc` CLI. Failures never throw: they are
 * recorded in `errors` and surface as `undefined` results.
 */
export class OcClient {
  private readonly ocPath: string;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;
  readonly errors: string[] = [];

  constructor(options: OcClientOptions) {
    this.ocPath = options.ocPath;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? execRunner;
    debug('OcClient initialized', { ocPath: this.ocPath, timeoutMs: this.timeoutMs });
  }

  private async exec(args: string[]): Promise<string | undefined> {
    const command = `${this.ocPath} ${args.join(' ')}`;
    const startedAt = Date.now();
    debug('oc command start', { command });
    try {
      const { stdout } = await this.runner(this.ocPath, args, { timeout: this.timeoutMs });
      debug('oc command end', { command, elapsedMs: Date.now() - startedAt, bytes: stdout.length });
      return stdout;
    } catch (error) {
      const message = `Command failed: ${command}: ${describeFailure(error)}`;
      debug('oc command failed', { command, elapsedMs: Date.now() - startedAt, message });
      this.errors.push(message);
      return undefined;
    }
  }

  async getJson(args: string[]): Promise<unknown> {
    const stdout = await this.exec(args.includes('-o') ? args : [...args, '-o', 'json']);
    if (!stdout || !stdout.trim()) return undefined;
    try {
      const parsed: unknown = JSON.parse(stdout);
      return parsed;
    } catch (error) {
      this.errors.push(`JSON parse error for oc ${args.join(' ')}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  async getText(args: string[]): Promise<string | undefined> {
    const stdout = await this.exec(args);
    const trimmed = stdout?.trim();
    return trimmed ? trimmed : undefined;
  }
}
