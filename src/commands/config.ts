import { Command } from 'commander';
import { existsSync } from 'fs';
import inquirer from 'inquirer';
import { ConfigManager, expandHome, readEnvironment } from '../config/index.js';
import UI from '../ui/renderer.js';
import { ASCII } from '../ui/ascii.js';
import { reportFailure } from './shared.js';

interface ConfigCommandOptions {
  config?: string;
  path?: boolean;
  show?: boolean;
  init?: boolean;
  force?: boolean;
}

export const configCommand = new Command('config')
  .description('Show or initialize the zsh-bootstrap configuration')
  .option('-c, --config <path>', 'Use this JSON file instead of the global one')
  .option('--path', 'Show config file path')
  .option('--show', 'Show the resolved configuration')
  .option('--init', 'Write the default configuration file')
  .option('-f, --force', 'With --init, overwrite an existing file')
  .action(async (options: ConfigCommandOptions) => {
    try {
      const environment = readEnvironment();

      if (options.init) {
        const path = options.config
          ? expandHome(options.config, environment.home)
          : ConfigManager.getGlobalConfigPath(environment.home);

        let force = options.force ?? false;
        if (existsSync(path) && !force) {
          const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
            {
              type: 'confirm',
              name: 'overwrite',
              message: `${path} exists. Overwrite with defaults?`,
              default: false,
            },
          ]);
          if (!overwrite) {
            console.log(UI.info('Left unchanged'));
            return;
          }
          force = true;
        }

        ConfigManager.writeDefaults(path, force);
        console.log(UI.success(`Wrote default configuration to ${path}`));
        return;
      }

      const manager = new ConfigManager(environment, options.config);

      if (options.path) {
        console.log('');
        console.log(UI.keyValue('Config path', manager.getConfigPath()));
        console.log(UI.keyValue('Exists', manager.exists() ? 'yes' : 'no (using defaults)'));
        console.log('');
        return;
      }

      const resolved = manager.resolve(environment);

      if (options.show) {
        console.log('');
        console.log(UI.section('Resolved Configuration', ASCII.icons.config));
        console.log('');
        console.log(JSON.stringify(resolved, null, 2));
        console.log('');
        return;
      }

      console.log('');
      console.log(UI.header('Configuration'));
      console.log('');
      console.log(UI.keyValue('Config file', manager.getConfigPath()));
      console.log(UI.keyValue('.zshrc', resolved.zshrcPath));
      console.log(UI.keyValue('Oh My Zsh', resolved.ohMyZshDir));
      console.log(UI.keyValue('Plugins dir', resolved.pluginDir));
      console.log(UI.keyValue('plugins=', resolved.pluginsLine));
      console.log('');
      console.log(UI.info('Use --show for everything, --init to write a config file'));
      console.log('');
    } catch (error) {
      reportFailure(error);
    }
  });
