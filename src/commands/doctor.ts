import { Command } from 'commander';
import { existsSync } from 'fs';
import { join } from 'path';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';
import type { SetupConfig } from '../config/index.js';
import { ShellCommandRunner, type CommandRunner } from '../core/command-runner.js';
import { checkExpectations, readConfigFile } from '../core/config-patcher.js';
import { patchZshrc } from '../core/setup-runner.js';
import { buildExpectations } from '../core/zshrc-profile.js';
import { ConsoleLogger } from '../utils/logger.js';
import { loadSetupConfig, reportFailure } from './shared.js';

const { colors } = UI;

export interface CheckResult {
  name: string;
  status: 'ok' | 'warning' | 'error';
  message: string;
  fix?: string;
  /** Fixable by `doctor --fix` */
  zshrc?: boolean;
}

/**
 * Get version of a command
 */
async function getVersion(runner: CommandRunner, cmd: string): Promise<string | null> {
  try {
    const { stdout } = await runner.run(cmd, ['--version']);
    return stdout.trim().split('\n')[0];
  } catch {
    return null;
  }
}

/**
 * Run all diagnostic checks
 */
export async function runChecks(config: SetupConfig, runner: CommandRunner): Promise<CheckResult[]> {
  const checks: CheckResult[] = [];

  // Required tools
  for (const tool of ['zsh', 'git', 'curl']) {
    const version = (await runner.which(tool)) ? await getVersion(runner, tool) : null;
    checks.push(
      version
        ? { name: tool, status: 'ok', message: version }
        : {
            name: tool,
            status: 'error',
            message: 'Not found',
            fix: `sudo apt-get install -y ${tool}`,
          }
    );
  }

  // Privileges for apt and chsh
  if (config.environment.isRoot) {
    checks.push({ name: 'sudo', status: 'ok', message: 'Running as root' });
  } else if (await runner.which('sudo')) {
    checks.push({ name: 'sudo', status: 'ok', message: 'Available' });
  } else {
    checks.push({
      name: 'sudo',
      status: 'error',
      message: 'Not found (needed to install packages)',
      fix: 'Run as root or install sudo',
    });
  }

  checks.push(
    (await runner.which('chsh'))
      ? { name: 'chsh', status: 'ok', message: 'Available' }
      : {
          name: 'chsh',
          status: 'warning',
          message: 'Not found; the default shell cannot be changed automatically',
        }
  );

  checks.push(
    (await runner.which('dpkg-query'))
      ? { name: 'dpkg-query', status: 'ok', message: 'Available' }
      : {
          name: 'dpkg-query',
          status: 'warning',
          message: 'Not found; installed-package checks will be skipped',
        }
  );

  // Oh My Zsh and plugins
  checks.push(
    existsSync(config.ohMyZshDir)
      ? { name: 'Oh My Zsh', status: 'ok', message: config.ohMyZshDir }
      : {
          name: 'Oh My Zsh',
          status: 'error',
          message: `Not installed at ${config.ohMyZshDir}`,
          fix: 'zsh-bootstrap install',
        }
  );

  for (const plugin of config.plugins) {
    const dest = join(config.pluginDir, plugin.name);
    if (existsSync(join(dest, '.git'))) {
      checks.push({ name: plugin.name, status: 'ok', message: dest });
    } else if (existsSync(dest)) {
      checks.push({
        name: plugin.name,
        status: 'warning',
        message: `${dest} is not a git repository; it will not be updated`,
      });
    } else {
      checks.push({
        name: plugin.name,
        status: 'error',
        message: 'Not cloned',
        fix: 'zsh-bootstrap install',
      });
    }
  }

  // .zshrc
  if (!existsSync(config.zshrcPath)) {
    checks.push({
      name: '.zshrc',
      status: 'error',
      message: `${config.zshrcPath} does not exist`,
      fix: 'zsh-bootstrap patch',
      zshrc: true,
    });
  } else {
    const content = readConfigFile(config.zshrcPath);
    for (const { expectation, passed } of checkExpectations(content, buildExpectations(config))) {
      const name = expectation.kind === 'line' ? 'plugins=' : expectation.pattern;
      checks.push(
        passed
          ? { name, status: 'ok', message: 'Present' }
          : {
              name,
              status: 'error',
              message: expectation.kind === 'line' ? 'Not set as expected' : 'Missing',
              fix: 'zsh-bootstrap patch',
              zshrc: true,
            }
      );
    }
  }

  // Login shell
  const shell = config.environment.shell;
  checks.push(
    shell && /\/zsh$/.test(shell)
      ? { name: 'Default shell', status: 'ok', message: shell }
      : {
          name: 'Default shell',
          status: 'warning',
          message: shell ? `${shell} (not zsh)` : 'Unknown ($SHELL not set)',
          fix: 'chsh -s "$(command -v zsh)"',
        }
  );

  return checks;
}

export const doctorCommand = new Command('doctor')
  .description('Check tools, plugins and ~/.zshrc state')
  .option('--zshrc <path>', 'Check this file instead of ~/.zshrc')
  .option('-c, --config <path>', 'Read settings from this JSON file')
  .option('--fix', 'Re-apply the .zshrc patch when it is missing or altered')
  .action(async (options: { zshrc?: string; config?: string; fix?: boolean }) => {
    console.log('');
    console.log(UI.header('System Check'));
    console.log('');

    try {
      const config = loadSetupConfig(options);
      const runner = new ShellCommandRunner({ isRoot: config.environment.isRoot });

      const spinner = UI.spinner('Running diagnostics...');
      spinner.start();
      const checks = await runChecks(config, runner);
      spinner.stop();

      const statusIcon = {
        ok: colors.success(ASCII.status.check),
        warning: colors.warning(ASCII.status.warning),
        error: colors.error(ASCII.status.cross),
      };

      for (const check of checks) {
        const icon = statusIcon[check.status];
        const name = check.name.padEnd(30);
        const message =
          check.status === 'ok'
            ? colors.muted(check.message)
            : check.status === 'error'
              ? colors.error(check.message)
              : colors.warning(check.message);

        console.log(`  ${icon} ${name} ${message}`);

        if (check.fix && check.status !== 'ok') {
          console.log(`      ${colors.muted('Fix:')} ${colors.accent(check.fix)}`);
        }
      }

      console.log('');

      const errors = checks.filter((c) => c.status === 'error');
      if (errors.length === 0) {
        console.log(UI.success('All checks passed'));
        console.log('');
        return;
      }

      console.log(UI.error(`${errors.length} issue(s) found`));
      console.log('');

      if (options.fix && errors.some((c) => c.zshrc)) {
        console.log(UI.info('Re-applying the .zshrc patch...'));
        patchZshrc(config, new ConsoleLogger());
        console.log('');
        if (errors.every((c) => c.zshrc)) return;
      } else if (!options.fix) {
        console.log(UI.info('Run `zsh-bootstrap doctor --fix` to repair .zshrc, or `zsh-bootstrap install`'));
        console.log('');
      }
      process.exitCode = 1;
    } catch (error) {
      reportFailure(error);
    }
  });
