import { Command } from 'commander';
import inquirer from 'inquirer';
import UI from '../ui/renderer.js';
import { ShellCommandRunner } from '../core/command-runner.js';
import { AptInstaller } from '../core/package-installer.js';
import { PluginFetcher } from '../core/plugin-fetcher.js';
import { runSetup } from '../core/setup-runner.js';
import type { SetupConfig } from '../config/index.js';
import { ConsoleLogger } from '../utils/logger.js';
import { loadSetupConfig, reportFailure } from './shared.js';

const { colors } = UI;

interface InstallOptions {
  yes?: boolean;
  zshrc?: string;
  config?: string;
  aptPlugins: boolean;
  plugins: boolean;
  shell: boolean;
}

function renderPlan(config: SetupConfig, options: InstallOptions): string {
  const on = (enabled: boolean): string => (enabled ? colors.success('yes') : colors.muted('skip'));
  return [
    UI.keyValue('Packages', config.packages.required.join(' ')),
    UI.keyValue('Oh My Zsh', config.ohMyZshDir),
    UI.keyValue('Plugins dir', config.pluginDir),
    UI.keyValue('Plugins', options.plugins ? config.plugins.map((p) => p.name).join(' ') : colors.muted('skip')),
    UI.keyValue('apt plugins', on(options.aptPlugins && config.packages.optional.length > 0)),
    UI.keyValue('.zshrc', config.zshrcPath),
    UI.keyValue('Default shell', on(options.shell && config.setDefaultShell)),
  ].join('\n');
}

async function confirm(): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    { type: 'confirm', name: 'proceed', message: 'Continue?', default: true },
  ]);
  return proceed;
}

export const installCommand = new Command('install')
  .description('Install zsh, Oh My Zsh and plugins, then configure ~/.zshrc')
  .option('-y, --yes', 'Do not ask for confirmation')
  .option('--zshrc <path>', 'Patch this file instead of ~/.zshrc')
  .option('-c, --config <path>', 'Read settings from this JSON file')
  .option('--no-apt-plugins', 'Skip the optional apt plugin packages')
  .option('--no-plugins', 'Skip cloning/updating plugin repositories')
  .option('--no-shell', 'Do not change the default shell')
  .action(async (options: InstallOptions) => {
    console.log('');
    console.log(UI.header('install'));

    try {
      const config = loadSetupConfig(options);
      console.log(UI.box(renderPlan(config, options), 'Plan'));

      if (!options.yes && process.stdin.isTTY && !(await confirm())) {
        console.log(UI.info('Aborted, nothing changed'));
        return;
      }

      const runner = new ShellCommandRunner({ isRoot: config.environment.isRoot });
      const report = await runSetup(
        config,
        {
          runner,
          installer: new AptInstaller(runner),
          fetcher: new PluginFetcher(),
          logger: new ConsoleLogger(),
        },
        {
          skipOptionalPackages: !options.aptPlugins,
          skipPlugins: !options.plugins,
          skipDefaultShell: !options.shell,
        }
      );

      if (report.warnings.length > 0) {
        console.log(UI.section('Warnings', UI.ASCII.status.warning));
        for (const warning of report.warnings) {
          console.log(UI.warning(warning.message));
          console.log(`    ${colors.muted(UI.ASCII.status.arrow)} ${colors.muted(warning.hint)}`);
        }
      }

      console.log('');
      console.log(UI.success('Done.'));
      console.log(UI.section('Next'));
      console.log(
        UI.list([
          `Start a new terminal session, or run: ${colors.accent("zsh -i -c 'source ~/.zshrc; echo OK'")}`,
          `Inside zsh you can test: ${colors.accent('type kp fp sr')}`,
        ])
      );
      console.log('');
    } catch (error) {
      reportFailure(error);
    }
  });
