import type { CommandRunner } from './command-runner.js';

export type ShellSwitchStatus = 'already-set' | 'changed' | 'failed';

export interface ShellSwitchOutcome {
  status: ShellSwitchStatus;
  message: string;
  /** Manual fix when status is 'failed' */
  hint?: string;
}

export interface ShellSwitchOptions {
  /** Current login shell ($SHELL) */
  currentShell?: string;
  user: string;
}

/**
 * Make `shellPath` the user's login shell. Never throws: chsh is often
 * restricted by policy, so a failure is reported, not raised.
 */
export async function setDefaultShell(
  runner: CommandRunner,
  shellPath: string,
  options: ShellSwitchOptions
): Promise<ShellSwitchOutcome> {
  if (options.currentShell === shellPath) {
    return { status: 'already-set', message: `Default shell already set to ${shellPath}` };
  }

  const manual = `chsh -s ${shellPath}`;

  if (!(await runner.which('chsh'))) {
    return {
      status: 'failed',
      message: 'chsh not found; cannot set default shell automatically',
      hint: manual,
    };
  }

  const direct = await runner.run('chsh', ['-s', shellPath]).then(
    () => true,
    () => false
  );
  if (direct) {
    return { status: 'changed', message: `Default shell changed to ${shellPath}` };
  }

  // Disallowed for the user or needs a password; retry as root
  try {
    await runner.runPrivileged('chsh', ['-s', shellPath, options.user], { step: 'default-shell' });
    return { status: 'changed', message: `Default shell changed to ${shellPath} (via sudo)` };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return {
      status: 'failed',
      message: `Could not change default shell automatically: ${reason}`,
      hint: manual,
    };
  }
}
