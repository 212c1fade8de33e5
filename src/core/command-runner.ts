import { execa } from 'execa';
import { PrerequisiteMissingError, type SetupStep } from './errors.js';

export interface RunOptions {
  /** Attach the child to this terminal (installers, password prompts) */
  inherit?: boolean;
  env?: Record<string, string>;
  cwd?: string;
}

export interface RunResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /** Run a command; rejects with CommandFailedError on a non-zero exit */
  run(file: string, args: string[], options?: RunOptions): Promise<RunResult>;
  /** Absolute path of a command on PATH, or null */
  which(command: string): Promise<string | null>;
  /** Run as root: directly when already root, through sudo otherwise */
  runPrivileged(file: string, args: string[], options?: RunOptions & { step?: SetupStep }): Promise<RunResult>;
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode?: number;

  constructor(command: string, exitCode: number | undefined, details: string, cause?: unknown) {
    super(`\`${command}\` failed${exitCode !== undefined ? ` (exit ${exitCode})` : ''}: ${details}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    if (cause) this.cause = cause;
  }
}

export type ExecFn = (file: string, args: string[], options: RunOptions) => Promise<RunResult>;

/**
 * Default ExecFn backed by execa
 */
export const execaExec: ExecFn = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    // Without a terminal, a child waiting on stdin (a password prompt) gets EOF
    stdio: options.inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
  });
  // stdout/stderr are undefined when inherited
  return { stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
};

function exitCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'exitCode' in error) {
    return typeof error.exitCode === 'number' ? error.exitCode : undefined;
  }
  return undefined;
}

function detailsOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
    if (stderr) return stderr.split('\n')[0];
  }
  if (typeof error === 'object' && error !== null && 'shortMessage' in error) {
    if (typeof error.shortMessage === 'string') return error.shortMessage;
  }
  return error instanceof Error ? error.message : String(error);
}

export class ShellCommandRunner implements CommandRunner {
  private readonly exec: ExecFn;
  private readonly isRoot: boolean;

  constructor(options: { isRoot: boolean; exec?: ExecFn }) {
    this.isRoot = options.isRoot;
    this.exec = options.exec ?? execaExec;
  }

  async run(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    try {
      return await this.exec(file, args, options);
    } catch (error) {
      throw new CommandFailedError([file, ...args].join(' '), exitCodeOf(error), detailsOf(error), error);
    }
  }

  async which(command: string): Promise<string | null> {
    try {
      const { stdout } = await this.exec('which', [command], {});
      const path = stdout.trim().split('\n')[0];
      return path || null;
    } catch {
      return null;
    }
  }

  async runPrivileged(
    file: string,
    args: string[],
    options: RunOptions & { step?: SetupStep } = {}
  ): Promise<RunResult> {
    const { step = 'packages', ...runOptions } = options;
    if (this.isRoot) {
      return this.run(file, args, runOptions);
    }
    if (!(await this.which('sudo'))) {
      throw new PrerequisiteMissingError(
        step,
        'sudo',
        `Run as root or install sudo (needed for: ${[file, ...args].join(' ')})`
      );
    }
    return this.run('sudo', [file, ...args], runOptions);
  }
}
