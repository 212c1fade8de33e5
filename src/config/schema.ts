import { z } from 'zod';

export const DEFAULT_INSTALLER_URL =
  'https://raw.githubusercontent.com/ohmyzsh/ohmyzsh/master/tools/install.sh';

// Plugin repositories cloned into $ZSH_CUSTOM/plugins
export const PluginSchema = z.object({
  // Directory name under plugins/ and the name listed in plugins=(...)
  name: z.string().regex(/^[\w.-]+$/, 'plugin names may only contain letters, digits, ".", "_" and "-"'),
  url: z.string().url(),
});

export const DEFAULT_PLUGINS: z.infer<typeof PluginSchema>[] = [
  { name: 'zsh-autosuggestions', url: 'https://github.com/zsh-users/zsh-autosuggestions.git' },
  { name: 'zsh-syntax-highlighting', url: 'https://github.com/zsh-users/zsh-syntax-highlighting.git' },
  {
    name: 'fast-syntax-highlighting',
    url: 'https://github.com/zdharma-continuum/fast-syntax-highlighting.git',
  },
  { name: 'zsh-autocomplete', url: 'https://github.com/marlonrichert/zsh-autocomplete.git' },
  {
    name: 'zsh-history-substring-search',
    url: 'https://github.com/zsh-users/zsh-history-substring-search.git',
  },
];

// apt packages
export const PackagesSchema = z.object({
  required: z.array(z.string()).default(['zsh', 'git', 'curl']),
  // Distro builds of plugins; failures only warn
  optional: z.array(z.string()).default(['zsh-autosuggestions', 'zsh-syntax-highlighting']),
});

export const OhMyZshSchema = z.object({
  // Defaults to ~/.oh-my-zsh
  dir: z.string().optional(),
  installerUrl: z.string().url().default(DEFAULT_INSTALLER_URL),
  // RUNZSH=no CHSH=no: don't drop into zsh or change the shell mid-run
  unattended: z.boolean().default(true),
});

// Appended block with the kp/fp helpers
export const BlockSchema = z.object({
  marker: z.string().min(1).default('kp() {'),
  // Path to a custom block file; defaults to the bundled template
  template: z.string().optional(),
  // Substrings that must be in .zshrc after patching
  checks: z.array(z.string()).default(['kp() {', 'fp() {', 'alias sr="source ~/.zshrc"']),
});

// Full configuration schema
export const ConfigSchema = z.object({
  // Version for config migrations
  version: z.number().default(1),

  // Defaults to ~/.zshrc
  zshrc: z.string().optional(),

  ohMyZsh: OhMyZshSchema.default({}),

  // Defaults to $ZSH_CUSTOM, then <ohMyZsh.dir>/custom
  customDir: z.string().optional(),

  packages: PackagesSchema.default({}),

  // Plugins shipped with Oh My Zsh, listed first in plugins=(...)
  builtinPlugins: z.array(z.string()).default(['git']),
  plugins: z.array(PluginSchema).default(DEFAULT_PLUGINS),

  block: BlockSchema.default({}),

  shell: z
    .object({
      setDefault: z.boolean().default(true),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type Plugin = z.infer<typeof PluginSchema>;
export type Packages = z.infer<typeof PackagesSchema>;
