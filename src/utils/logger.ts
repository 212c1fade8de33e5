import UI from '../ui/renderer.js';
import type { SetupLogger } from '../core/setup-runner.js';

/**
 * SetupLogger printing through the UI renderers. Warnings go to stderr so
 * they survive `> /dev/null`.
 */
export class ConsoleLogger implements SetupLogger {
  constructor(private readonly verbose = true) {}

  step(message: string): void {
    console.log(UI.step(message));
  }

  info(message: string): void {
    if (this.verbose) console.log(UI.info(message));
  }

  success(message: string): void {
    console.log(UI.success(message));
  }

  warn(message: string): void {
    console.error(UI.warning(message));
  }
}
