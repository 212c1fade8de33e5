import { existsSync } from 'fs';
import type { CommandRunner } from './command-runner.js';
import { PrerequisiteMissingError } from './errors.js';

export type OhMyZshOutcome = 'already-installed' | 'installed';

export interface OhMyZshOptions {
  dir: string;
  installerUrl: string;
  /** Keep the installer from starting zsh or running chsh itself */
  unattended: boolean;
}

/**
 * Install Oh My Zsh with the official installer unless `dir` already exists.
 */
export async function installOhMyZsh(
  runner: CommandRunner,
  options: OhMyZshOptions
): Promise<OhMyZshOutcome> {
  if (existsSync(options.dir)) {
    return 'already-installed';
  }

  if (!(await runner.which('curl'))) {
    throw new PrerequisiteMissingError('oh-my-zsh', 'curl', 'Install it first: apt install curl');
  }

  try {
    const { stdout: script } = await runner.run('curl', ['-fsSL', options.installerUrl]);
    const env: Record<string, string> = { ZSH: options.dir };
    if (options.unattended) {
      env.RUNZSH = 'no';
      env.CHSH = 'no';
    }
    await runner.run('sh', ['-c', script], { inherit: true, env });
  } catch (error) {
    throw new PrerequisiteMissingError(
      'oh-my-zsh',
      'Oh My Zsh',
      `The installer failed; run it by hand: sh -c "$(curl -fsSL ${options.installerUrl})"`,
      error
    );
  }

  return 'installed';
}
