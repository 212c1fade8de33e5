import { ConfigManager, readEnvironment, type SetupConfig } from '../config/index.js';
import { SetupError } from '../core/errors.js';
import UI from '../ui/renderer.js';

const { colors } = UI;

export interface ConfigOptions {
  config?: string;
  zshrc?: string;
}

/**
 * Read the environment and config file into the struct every step receives.
 */
export function loadSetupConfig(options: ConfigOptions): SetupConfig {
  const environment = readEnvironment();
  const manager = new ConfigManager(environment, options.config);
  return manager.resolve(environment, { zshrc: options.zshrc });
}

/**
 * Print a failure and mark the process as failed.
 */
export function reportFailure(error: unknown): void {
  console.error('');
  if (error instanceof SetupError) {
    console.error(UI.error(error.message, `→ ${error.hint}`));
  } else {
    console.error(UI.error('An unexpected error occurred'));
    console.error(colors.muted(error instanceof Error ? error.message : String(error)));
  }
  console.error('');
  process.exitCode = 1;
}
