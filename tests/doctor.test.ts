import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runChecks, type CheckResult } from '../src/commands/doctor.js';
import { resolveSetupConfig, type SetupConfig } from '../src/config/index.js';
import { ConfigSchema } from '../src/config/schema.js';
import { patchZshrc } from '../src/core/setup-runner.js';
import { ALL_TOOLS, FakeRunner, RecordingLogger, cleanupDir, createTestDir } from './helpers.js';

function find(checks: CheckResult[], name: string): CheckResult | undefined {
  return checks.find((check) => check.name === name);
}

describe('runChecks', () => {
  let home: string;
  let config: SetupConfig;

  beforeEach(() => {
    home = createTestDir();
    config = resolveSetupConfig(
      ConfigSchema.parse({
        plugins: [{ name: 'zsh-autosuggestions', url: 'https://example.com/zsh-autosuggestions.git' }],
      }),
      { home, user: 'tester', shell: '/usr/bin/zsh', isRoot: false }
    );
  });

  afterEach(() => {
    cleanupDir(home);
  });

  it('reports a fully set up machine as healthy', async () => {
    mkdirSync(join(config.pluginDir, 'zsh-autosuggestions', '.git'), { recursive: true });
    patchZshrc(config, new RecordingLogger());
    const runner = new FakeRunner(ALL_TOOLS, (command) =>
      command.endsWith('--version') ? `${command.split(' ')[0]} 1.0\nextra` : undefined
    );

    const checks = await runChecks(config, runner);

    expect(checks.filter((check) => check.status !== 'ok')).toEqual([]);
    expect(find(checks, 'zsh')?.message).toBe('zsh 1.0');
    expect(find(checks, 'plugins=')?.message).toBe('Present');
  });

  it('flags missing tools, plugins and .zshrc', async () => {
    const { zsh: _, ...tools } = ALL_TOOLS;

    const checks = await runChecks(config, new FakeRunner(tools));

    expect(find(checks, 'zsh')).toEqual({
      name: 'zsh',
      status: 'error',
      message: 'Not found',
      fix: 'sudo apt-get install -y zsh',
    });
    expect(find(checks, 'Oh My Zsh')?.status).toBe('error');
    expect(find(checks, 'zsh-autosuggestions')?.message).toBe('Not cloned');
    expect(find(checks, '.zshrc')?.zshrc).toBe(true);
  });

  it('marks an altered plugins line as fixable', async () => {
    writeFileSync(config.zshrcPath, 'plugins=(git)\n');

    const checks = await runChecks(config, new FakeRunner(ALL_TOOLS));

    expect(find(checks, 'plugins=')).toEqual({
      name: 'plugins=',
      status: 'error',
      message: 'Not set as expected',
      fix: 'zsh-bootstrap patch',
      zshrc: true,
    });
    expect(find(checks, 'kp() {')?.message).toBe('Missing');
  });

  it('warns when the login shell is not zsh', async () => {
    const bashConfig: SetupConfig = {
      ...config,
      environment: { ...config.environment, shell: '/bin/bash' },
    };

    const checks = await runChecks(bashConfig, new FakeRunner(ALL_TOOLS));

    expect(find(checks, 'Default shell')?.message).toBe('/bin/bash (not zsh)');
    expect(find(checks, 'Default shell')?.status).toBe('warning');
  });
});
