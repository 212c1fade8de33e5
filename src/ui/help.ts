import { colors } from './colors.js';
import { ASCII } from './ascii.js';

interface CommandDef {
  name: string;
  aliases: string[];
  description: string;
  icon: string;
}

const COMMANDS: CommandDef[] = [
  {
    name: 'install',
    aliases: ['setup', 'i'],
    description: 'Install zsh, Oh My Zsh and plugins, then configure ~/.zshrc',
    icon: ASCII.icons.install,
  },
  {
    name: 'patch',
    aliases: [],
    description: 'Only update ~/.zshrc (plugins= line and helper block)',
    icon: ASCII.icons.patch,
  },
  {
    name: 'verify',
    aliases: [],
    description: 'Check that ~/.zshrc holds the managed configuration',
    icon: ASCII.icons.verify,
  },
  {
    name: 'doctor',
    aliases: ['check'],
    description: 'Report tools, plugins and ~/.zshrc state',
    icon: ASCII.icons.doctor,
  },
  {
    name: 'config',
    aliases: ['cfg'],
    description: 'Show or initialize the configuration file',
    icon: ASCII.icons.config,
  },
];

/**
 * Render the main help screen
 */
export const renderMainHelp = (): string => {
  const lines: string[] = [];

  lines.push(colors.gradient(ASCII.logoMini, ['cyan', 'blue']));
  lines.push('');
  lines.push(colors.muted('  Set up zsh, Oh My Zsh and a curated plugin set, safely re-runnable'));
  lines.push('');

  lines.push(colors.bold('USAGE'));
  lines.push('');
  lines.push(
    `  ${colors.muted('$')} ${colors.primary('zsh-bootstrap')} ${colors.accent('<command>')} ${colors.muted('[options]')}`
  );
  lines.push('');

  lines.push(colors.bold('COMMANDS'));
  lines.push('');
  COMMANDS.forEach((cmd) => {
    const aliases = cmd.aliases.length > 0 ? colors.muted(` (${cmd.aliases.join(', ')})`) : '';
    const icon = colors.accent(cmd.icon);
    const name = colors.primary(cmd.name.padEnd(10));
    lines.push(`  ${icon} ${name}${cmd.description}${aliases}`);
  });
  lines.push('');

  lines.push(colors.bold('QUICK START'));
  lines.push('');
  lines.push(
    `  ${colors.muted('$')} ${colors.primary('zsh-bootstrap install')}        ${colors.muted('# Full setup')}`
  );
  lines.push(
    `  ${colors.muted('$')} ${colors.primary('zsh-bootstrap patch --dry-run')} ${colors.muted('# Preview .zshrc changes')}`
  );
  lines.push('');

  lines.push(colors.muted('─'.repeat(60)));
  lines.push(
    `  ${colors.muted('Run')} ${colors.primary('zsh-bootstrap <command> --help')} ${colors.muted('for detailed command help')}`
  );
  lines.push('');

  return lines.join('\n');
};
