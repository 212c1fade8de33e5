/**
 * Shared test helpers: temp directories, an in-process command runner and a
 * logger that records what it was told.
 */

import { mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { CommandRunner, RunOptions, RunResult } from '../src/core/command-runner.js';
import { CommandFailedError } from '../src/core/command-runner.js';
import { PrerequisiteMissingError } from '../src/core/errors.js';
import type { SetupLogger } from '../src/core/setup-runner.js';

export function createTestDir(): string {
  const dir = join(
    tmpdir(),
    `zsh-bootstrap-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`
  );
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function cleanupDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

// ─── Fake runner ──────────────────────────────────────────────────────────────

export interface RecordedCall {
  command: string;
  privileged: boolean;
  options: RunOptions;
}

/** Return stdout, or a number to fail with that exit code */
export type CommandHandler = (command: string) => string | number | undefined;

/**
 * CommandRunner that never spawns anything. Commands are matched by their
 * joined string ("apt-get install -y zsh"); unmatched commands succeed with
 * empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly available: Record<string, string> = {},
    private readonly handler: CommandHandler = () => undefined,
    private readonly isRoot = false
  ) {}

  async run(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    return this.exec([file, ...args].join(' '), false, options);
  }

  async which(command: string): Promise<string | null> {
    return this.available[command] ?? null;
  }

  async runPrivileged(file: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    if (!this.isRoot && !this.available.sudo) {
      throw new PrerequisiteMissingError('packages', 'sudo', 'Run as root or install sudo');
    }
    return this.exec([file, ...args].join(' '), true, options);
  }

  commands(): string[] {
    return this.calls.map((call) => (call.privileged ? `sudo ${call.command}` : call.command));
  }

  private exec(command: string, privileged: boolean, options: RunOptions): RunResult {
    this.calls.push({ command, privileged, options });
    const outcome = this.handler(command);
    if (typeof outcome === 'number') {
      throw new CommandFailedError(command, outcome, 'fake failure');
    }
    return { stdout: outcome ?? '', stderr: '' };
  }
}

export const ALL_TOOLS: Record<string, string> = {
  zsh: '/usr/bin/zsh',
  git: '/usr/bin/git',
  curl: '/usr/bin/curl',
  sudo: '/usr/bin/sudo',
  chsh: '/usr/bin/chsh',
  'dpkg-query': '/usr/bin/dpkg-query',
};

// ─── Recording logger ─────────────────────────────────────────────────────────

export class RecordingLogger implements SetupLogger {
  readonly entries: Array<{ level: 'step' | 'info' | 'success' | 'warn'; message: string }> = [];

  step(message: string): void {
    this.entries.push({ level: 'step', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  success(message: string): void {
    this.entries.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  messages(level: 'step' | 'info' | 'success' | 'warn'): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
