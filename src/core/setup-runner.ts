/**
 * Setup Runner - the install sequence, one blocking step after another
 *
 *  1. required apt packages            (fatal when missing)
 *  2. Oh My Zsh                        (fatal when it cannot be installed)
 *  3. .zshrc exists
 *  4. optional apt plugin packages     (warning)
 *  5. plugin repositories              (warning per repository)
 *  6. plugins= line and helper block
 *  7. verification                     (fatal)
 *  8. default shell                    (warning)
 *
 * Nothing is retried; running the command again is the retry, since every
 * step is a no-op once its end state is reached.
 */

import { mkdirSync } from 'fs';
import { join } from 'path';
import type { SetupConfig } from '../config/index.js';
import type { CommandRunner } from './command-runner.js';
import {
  applyDirectiveLine,
  applyMarkedBlock,
  ensureConfigFile,
  ensureDirectiveLine,
  ensureMarkedBlock,
  readConfigFile,
  verify,
  type DirectiveOutcome,
  type ExpectationResult,
  type MarkedBlockAction,
} from './config-patcher.js';
import {
  CollaboratorWarning,
  OptionalStepFailedError,
  PrerequisiteMissingError,
  SetupError,
  WriteError,
  type SetupStep,
} from './errors.js';
import { installOhMyZsh } from './oh-my-zsh.js';
import type { PackageInstaller } from './package-installer.js';
import type { FetchOutcome } from './plugin-fetcher.js';
import { setDefaultShell } from './shell-switcher.js';
import { buildExpectations, helperBlock, pluginsDirective } from './zshrc-profile.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface SetupLogger {
  /** A step is starting */
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export interface PluginSource {
  cloneOrUpdate(url: string, dest: string): Promise<FetchOutcome>;
}

export interface SetupDeps {
  runner: CommandRunner;
  installer: PackageInstaller;
  fetcher: PluginSource;
  logger: SetupLogger;
}

export interface SetupOptions {
  skipOptionalPackages?: boolean;
  skipPlugins?: boolean;
  skipDefaultShell?: boolean;
}

export type StepStatus = 'ok' | 'skipped' | 'warning';

export interface StepReport {
  step: SetupStep;
  status: StepStatus;
  detail: string;
}

export interface SetupReport {
  steps: StepReport[];
  /** Non-fatal failures, in the order they happened */
  warnings: SetupError[];
}

export interface PatchResult {
  directive: DirectiveOutcome;
  block: MarkedBlockAction;
  checks: ExpectationResult[];
}

export interface PatchPlan {
  directive: DirectiveOutcome;
  block: MarkedBlockAction;
  changed: boolean;
}

// ─── Patching ─────────────────────────────────────────────────────────────────

export function describeDirective(outcome: DirectiveOutcome): string {
  switch (outcome.action) {
    case 'unchanged':
      return `plugins= line already set (line ${outcome.lineNumber})`;
    case 'replaced':
      return `Replaced plugins= line (line ${outcome.lineNumber})`;
    case 'inserted-after':
    case 'inserted-before':
      return `Inserted plugins= line at line ${outcome.lineNumber}`;
    case 'prepended':
      return 'Added plugins= line at the top of the file';
    case 'appended':
      return 'Added plugins= line at the end of the file';
  }
}

/**
 * Set the plugins= line, append the helper block, then verify both.
 */
export function patchZshrc(config: SetupConfig, logger: SetupLogger): PatchResult {
  const file = config.zshrcPath;

  logger.step(`Ensuring plugins= line in ${file}`);
  const directive = ensureDirectiveLine(file, pluginsDirective(config.pluginsLine));
  logger.info(describeDirective(directive));

  const block = helperBlock(config);
  const blockAction = ensureMarkedBlock(file, block);
  if (blockAction === 'present') {
    logger.info(`Already present in ${file}: ${block.marker}`);
  } else {
    logger.success(`Appended block to ${file}: ${block.marker}`);
  }

  logger.step('Verifying changes...');
  const checks = verify(file, buildExpectations(config));
  logger.success(`All ${checks.length} checks passed`);

  return { directive, block: blockAction, checks };
}

/**
 * What patchZshrc would do, computed without writing anything.
 */
export function planZshrcPatch(config: SetupConfig): PatchPlan {
  const before = readConfigFile(config.zshrcPath);
  const directive = applyDirectiveLine(before, pluginsDirective(config.pluginsLine));
  const block = applyMarkedBlock(directive.content, helperBlock(config));

  return {
    directive: { action: directive.action, lineNumber: directive.lineNumber },
    block: block.action,
    changed: block.content !== before,
  };
}

// ─── Full run ─────────────────────────────────────────────────────────────────

export async function runSetup(
  config: SetupConfig,
  deps: SetupDeps,
  options: SetupOptions = {}
): Promise<SetupReport> {
  const { runner, installer, fetcher, logger } = deps;
  const steps: StepReport[] = [];
  const warnings: SetupError[] = [];

  const record = (step: SetupStep, status: StepStatus, detail: string): void => {
    steps.push({ step, status, detail });
  };
  const warn = (warning: SetupError): void => {
    warnings.push(warning);
    logger.warn(warning.message);
  };

  // 1. Required packages
  const required = config.packages.required;
  if (required.length > 0) {
    logger.step(`Installing prerequisites (${required.join(', ')})...`);
    const report = await installer.ensureInstalled(required, { step: 'packages' });
    report.warnings.forEach((message) =>
      warn(new CollaboratorWarning('packages', message, 'See the apt output above'))
    );

    const failed = report.packages.filter((pkg) => pkg.status === 'failed');
    if (failed.length > 0) {
      const names = failed.map((pkg) => pkg.name).join(' ');
      throw new PrerequisiteMissingError(
        'packages',
        names,
        `Install manually: sudo apt-get install -y ${names}`
      );
    }

    const installed = report.packages.filter((pkg) => pkg.status === 'installed');
    if (installed.length > 0) {
      logger.success(`Installed packages: ${installed.map((pkg) => pkg.name).join(' ')}`);
    } else {
      logger.info(`All packages already installed: ${required.join(' ')}`);
    }
    record('packages', 'ok', `${installed.length} installed, ${required.length - installed.length} present`);
  } else {
    record('packages', 'skipped', 'no required packages configured');
  }

  // 2. Oh My Zsh
  logger.step('Installing Oh My Zsh...');
  const omz = await installOhMyZsh(runner, {
    dir: config.ohMyZshDir,
    installerUrl: config.installerUrl,
    unattended: config.unattended,
  });
  if (omz === 'already-installed') {
    logger.info(`Oh My Zsh already installed at ${config.ohMyZshDir}`);
  } else {
    logger.success(`Oh My Zsh installed at ${config.ohMyZshDir}`);
  }
  record('oh-my-zsh', 'ok', omz);

  // 3. .zshrc
  if (ensureConfigFile(config.zshrcPath) === 'created') {
    logger.info(`Created missing ${config.zshrcPath}`);
    record('zshrc', 'ok', 'created');
  } else {
    record('zshrc', 'ok', 'exists');
  }

  // 4. Optional apt plugin packages
  const optional = config.packages.optional;
  if (options.skipOptionalPackages || optional.length === 0) {
    record('optional-packages', 'skipped', 'disabled');
  } else {
    logger.step('Installing optional zsh plugin packages from apt (if available)...');
    try {
      const report = await installer.ensureInstalled(optional, {
        refreshIndex: false,
        inherit: false,
        step: 'optional-packages',
      });
      report.warnings.forEach((message) =>
        warn(new CollaboratorWarning('optional-packages', message, 'Optional; the git plugins are used instead'))
      );
      const failed = report.packages.filter((pkg) => pkg.status === 'failed');
      if (failed.length > 0) {
        throw new OptionalStepFailedError(
          'optional-packages',
          `Apt plugin packages not installed: ${failed.map((pkg) => pkg.name).join(', ')}`,
          'They may not exist on this distro; the git plugins below are used instead'
        );
      }
      logger.success('Apt plugin packages installed (or already installed)');
      record('optional-packages', 'ok', optional.join(' '));
    } catch (error) {
      const warning =
        error instanceof OptionalStepFailedError
          ? error
          : new OptionalStepFailedError(
              'optional-packages',
              `Apt plugin packages not installed: ${error instanceof Error ? error.message : String(error)}`,
              'Continuing with git plugins',
              error
            );
      warn(warning);
      record('optional-packages', 'warning', warning.message);
    }
  }

  // 5. Plugin repositories
  if (options.skipPlugins) {
    record('plugins', 'skipped', 'disabled');
  } else {
    if (!(await runner.which('git'))) {
      throw new PrerequisiteMissingError('plugins', 'git', 'Install it first: apt install git');
    }
    try {
      mkdirSync(config.pluginDir, { recursive: true });
    } catch (error) {
      throw new WriteError(config.pluginDir, 'create', error);
    }

    logger.step(`Installing/Updating Oh My Zsh plugins in: ${config.pluginDir}`);
    let problems = 0;
    for (const plugin of config.plugins) {
      const outcome = await fetcher.cloneOrUpdate(plugin.url, join(config.pluginDir, plugin.name));
      if (outcome.status === 'warning' || outcome.status === 'skipped') {
        problems++;
        warn(
          new CollaboratorWarning(
            'plugins',
            outcome.message,
            `Remove ${outcome.dest} and re-run to get a fresh clone`
          )
        );
      } else {
        logger.success(outcome.message);
      }
    }
    record(
      'plugins',
      problems > 0 ? 'warning' : 'ok',
      `${config.plugins.length - problems}/${config.plugins.length} plugins ready`
    );
  }

  // 6-7. .zshrc patch and verification
  const patch = patchZshrc(config, logger);
  record('patch', 'ok', patch.directive.action);
  record('verify', 'ok', `${patch.checks.length} checks`);

  // 8. Default shell
  if (options.skipDefaultShell || !config.setDefaultShell) {
    record('default-shell', 'skipped', 'disabled');
  } else {
    const zshPath = await runner.which('zsh');
    if (!zshPath) {
      throw new PrerequisiteMissingError('default-shell', 'zsh', 'Install it first: apt install zsh');
    }

    logger.step(`Setting default shell to zsh (${zshPath})`);
    const outcome = await setDefaultShell(runner, zshPath, {
      currentShell: config.environment.shell,
      user: config.environment.user,
    });
    if (outcome.status === 'failed') {
      warn(new CollaboratorWarning('default-shell', outcome.message, `Run: ${outcome.hint ?? ''}`));
      record('default-shell', 'warning', outcome.message);
    } else {
      logger.success(outcome.message);
      record('default-shell', 'ok', outcome.status);
    }
  }

  return { steps, warnings };
}
