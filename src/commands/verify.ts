import { Command } from 'commander';
import UI from '../ui/renderer.js';
import { checkExpectations, readConfigFile, verify } from '../core/config-patcher.js';
import { buildExpectations } from '../core/zshrc-profile.js';
import { loadSetupConfig, reportFailure } from './shared.js';

const { colors } = UI;

interface VerifyOptions {
  zshrc?: string;
  config?: string;
}

export const verifyCommand = new Command('verify')
  .description('Check that ~/.zshrc holds the plugins= line and helper block')
  .option('--zshrc <path>', 'Check this file instead of ~/.zshrc')
  .option('-c, --config <path>', 'Read settings from this JSON file')
  .action((options: VerifyOptions) => {
    try {
      const config = loadSetupConfig(options);
      const expectations = buildExpectations(config);

      console.log('');
      console.log(UI.header(`verify ${config.zshrcPath}`));
      console.log('');
      for (const { expectation, passed } of checkExpectations(
        readConfigFile(config.zshrcPath),
        expectations
      )) {
        const icon = passed ? colors.success(UI.ASCII.status.check) : colors.error(UI.ASCII.status.cross);
        const kind = colors.muted(expectation.kind === 'line' ? 'line     ' : 'contains ');
        console.log(`  ${icon} ${kind} ${expectation.pattern}`);
      }
      console.log('');

      verify(config.zshrcPath, expectations);
      console.log(UI.success('All checks passed'));
      console.log('');
    } catch (error) {
      reportFailure(error);
    }
  });
