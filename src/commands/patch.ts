import { Command } from 'commander';
import UI from '../ui/renderer.js';
import { describeDirective, patchZshrc, planZshrcPatch } from '../core/setup-runner.js';
import { ConsoleLogger } from '../utils/logger.js';
import { loadSetupConfig, reportFailure } from './shared.js';

const { colors } = UI;

interface PatchOptions {
  zshrc?: string;
  config?: string;
  dryRun?: boolean;
}

export const patchCommand = new Command('patch')
  .description('Set the plugins= line and append the helper block in ~/.zshrc')
  .option('--zshrc <path>', 'Patch this file instead of ~/.zshrc')
  .option('-c, --config <path>', 'Read settings from this JSON file')
  .option('-n, --dry-run', 'Show what would change without writing')
  .action((options: PatchOptions) => {
    try {
      const config = loadSetupConfig(options);

      if (options.dryRun) {
        const plan = planZshrcPatch(config);
        console.log('');
        console.log(UI.header(`patch --dry-run ${config.zshrcPath}`));
        console.log('');
        console.log(UI.keyValue('plugins=', describeDirective(plan.directive)));
        console.log(
          UI.keyValue(
            'helper block',
            plan.block === 'present' ? 'already present' : 'would be appended'
          )
        );
        console.log('');
        console.log(
          plan.changed
            ? UI.info(`Run without ${colors.accent('--dry-run')} to apply`)
            : UI.success('Nothing to change')
        );
        console.log('');
        return;
      }

      patchZshrc(config, new ConsoleLogger());
      console.log('');
    } catch (error) {
      reportFailure(error);
    }
  });
