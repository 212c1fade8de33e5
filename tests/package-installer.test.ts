import { describe, it, expect } from 'vitest';
import { AptInstaller } from '../src/core/package-installer.js';
import { PrerequisiteMissingError } from '../src/core/errors.js';
import { ALL_TOOLS, FakeRunner } from './helpers.js';

const INSTALLED = 'install ok installed';

function dpkg(installed: string[]): (command: string) => string | number | undefined {
  return (command) => {
    if (command.startsWith('dpkg-query')) {
      const name = command.split(' ').pop() ?? '';
      return installed.includes(name) ? INSTALLED : 1;
    }
    return undefined;
  };
}

describe('AptInstaller', () => {
  it('does not call apt when everything is installed', async () => {
    const runner = new FakeRunner(ALL_TOOLS, dpkg(['zsh', 'git']));
    const installer = new AptInstaller(runner);

    const report = await installer.ensureInstalled(['zsh', 'git']);

    expect(report.packages).toEqual([
      { name: 'zsh', status: 'present' },
      { name: 'git', status: 'present' },
    ]);
    expect(report.warnings).toEqual([]);
    expect(runner.commands().some((c) => c.includes('apt-get'))).toBe(false);
  });

  it('updates the index and installs only the missing packages', async () => {
    const runner = new FakeRunner(ALL_TOOLS, dpkg(['git']));
    const installer = new AptInstaller(runner);

    const report = await installer.ensureInstalled(['zsh', 'git', 'curl']);

    expect(runner.commands().slice(-2)).toEqual([
      'sudo apt-get update -y',
      'sudo apt-get install -y zsh curl',
    ]);
    expect(report.packages.map((p) => `${p.name}:${p.status}`)).toEqual([
      'zsh:installed',
      'git:present',
      'curl:installed',
    ]);
  });

  it('skips the index refresh when asked', async () => {
    const runner = new FakeRunner(ALL_TOOLS, dpkg([]));
    const installer = new AptInstaller(runner);

    await installer.ensureInstalled(['zsh-autosuggestions'], { refreshIndex: false, inherit: false });

    expect(runner.commands().slice(-1)).toEqual(['sudo apt-get install -y zsh-autosuggestions']);
    expect(runner.calls[runner.calls.length - 1].options.inherit).toBe(false);
  });

  it('marks packages failed when apt fails', async () => {
    const runner = new FakeRunner(ALL_TOOLS, (command) => {
      if (command.startsWith('dpkg-query')) return 1;
      if (command.startsWith('apt-get install')) return 100;
      return undefined;
    });
    const installer = new AptInstaller(runner);

    const report = await installer.ensureInstalled(['zsh', 'fancy-plugin']);

    expect(report.packages.map((p) => p.status)).toEqual(['failed', 'failed']);
    expect(report.warnings).toEqual(['apt could not install: zsh, fancy-plugin']);
  });

  it('attempts the install when dpkg-query is unavailable', async () => {
    const { 'dpkg-query': _, ...tools } = ALL_TOOLS;
    const runner = new FakeRunner(tools);
    const installer = new AptInstaller(runner);

    const report = await installer.ensureInstalled(['zsh']);

    expect(report.warnings).toEqual([
      'dpkg-query not found; skipping installed checks and attempting install',
    ]);
    expect(report.packages).toEqual([{ name: 'zsh', status: 'installed' }]);
  });

  it('propagates a missing sudo', async () => {
    const { sudo: _, ...tools } = ALL_TOOLS;
    const runner = new FakeRunner(tools, dpkg([]));
    const installer = new AptInstaller(runner);

    await expect(installer.ensureInstalled(['zsh'])).rejects.toBeInstanceOf(PrerequisiteMissingError);
  });

  it('needs no sudo as root', async () => {
    const { sudo: _, ...tools } = ALL_TOOLS;
    const runner = new FakeRunner(tools, dpkg([]), true);
    const installer = new AptInstaller(runner);

    const report = await installer.ensureInstalled(['zsh']);

    expect(report.packages).toEqual([{ name: 'zsh', status: 'installed' }]);
  });
});
