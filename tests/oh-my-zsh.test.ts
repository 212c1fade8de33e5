import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { installOhMyZsh } from '../src/core/oh-my-zsh.js';
import { PrerequisiteMissingError } from '../src/core/errors.js';
import { ALL_TOOLS, FakeRunner, cleanupDir, createTestDir } from './helpers.js';

const INSTALLER_URL = 'https://example.com/install.sh';

describe('installOhMyZsh', () => {
  let home: string;
  let dir: string;

  beforeEach(() => {
    home = createTestDir();
    dir = join(home, '.oh-my-zsh');
  });

  afterEach(() => {
    cleanupDir(home);
  });

  it('does nothing when the directory exists', async () => {
    mkdirSync(dir);
    const runner = new FakeRunner(ALL_TOOLS);

    const outcome = await installOhMyZsh(runner, { dir, installerUrl: INSTALLER_URL, unattended: true });

    expect(outcome).toBe('already-installed');
    expect(runner.calls).toEqual([]);
  });

  it('downloads the installer and runs it unattended', async () => {
    const runner = new FakeRunner(ALL_TOOLS, (command) =>
      command.startsWith('curl') ? 'echo installing' : undefined
    );

    const outcome = await installOhMyZsh(runner, { dir, installerUrl: INSTALLER_URL, unattended: true });

    expect(outcome).toBe('installed');
    expect(runner.commands()).toEqual([`curl -fsSL ${INSTALLER_URL}`, 'sh -c echo installing']);
    expect(runner.calls[1].options).toEqual({
      inherit: true,
      env: { ZSH: dir, RUNZSH: 'no', CHSH: 'no' },
    });
  });

  it('lets the installer prompt when not unattended', async () => {
    const runner = new FakeRunner(ALL_TOOLS);

    await installOhMyZsh(runner, { dir, installerUrl: INSTALLER_URL, unattended: false });

    expect(runner.calls[1].options.env).toEqual({ ZSH: dir });
  });

  it('requires curl', async () => {
    const { curl: _, ...tools } = ALL_TOOLS;
    const runner = new FakeRunner(tools);

    const error = await installOhMyZsh(runner, { dir, installerUrl: INSTALLER_URL, unattended: true }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(PrerequisiteMissingError);
    expect(error instanceof PrerequisiteMissingError && error.tool).toBe('curl');
  });

  it('reports a failed installer as a missing prerequisite', async () => {
    const runner = new FakeRunner(ALL_TOOLS, (command) => (command.startsWith('sh') ? 1 : undefined));

    const error = await installOhMyZsh(runner, { dir, installerUrl: INSTALLER_URL, unattended: true }).catch(
      (e: unknown) => e
    );

    expect(error instanceof PrerequisiteMissingError && error.tool).toBe('Oh My Zsh');
    expect(error instanceof PrerequisiteMissingError && error.step).toBe('oh-my-zsh');
  });
});
