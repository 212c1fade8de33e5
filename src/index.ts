#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'module';
import { installCommand } from './commands/install.js';
import { patchCommand } from './commands/patch.js';
import { verifyCommand } from './commands/verify.js';
import { doctorCommand } from './commands/doctor.js';
import { configCommand } from './commands/config.js';
import { renderMainHelp, UI } from './ui/index.js';

const { colors } = UI;

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

// Configure program
program
  .name('zsh-bootstrap')
  .description('Install and configure zsh, Oh My Zsh and plugins')
  .version(pkg.version, '-v, --version', 'Show version number')
  .configureHelp({
    sortSubcommands: true,
    sortOptions: true,
  })
  .showHelpAfterError('Run `zsh-bootstrap --help` for usage information');

// Register commands
program.addCommand(installCommand);
program.addCommand(patchCommand);
program.addCommand(verifyCommand);
program.addCommand(doctorCommand);
program.addCommand(configCommand);

// Add aliases
installCommand.alias('setup').alias('i');
doctorCommand.alias('check');
configCommand.alias('cfg');

// Default action (no command) - show help
program.action(() => {
  console.log(renderMainHelp());
});

// Error handling
program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('');
    console.log(UI.error(`Unknown command`));
    console.log(UI.info('Run `zsh-bootstrap --help` to see available commands'));
    process.exit(1);
  }
  // Don't throw for help - just exit cleanly
  if (
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.help' ||
    err.code === 'commander.version'
  ) {
    process.exit(0);
  }
  throw err;
});

// Graceful shutdown
process.on('SIGINT', () => {
  console.log('');
  console.log(UI.info('Interrupted'));
  process.exit(130);
});

process.on('uncaughtException', (error) => {
  console.log('');
  console.log(UI.error('An unexpected error occurred'));
  console.log(colors.muted(error.message));
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
