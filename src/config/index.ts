import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { homedir, userInfo } from 'os';
import { join, dirname, resolve, isAbsolute } from 'path';
import { ConfigSchema, type Config, type Packages, type Plugin } from './schema.js';
import { ConfigFileError } from '../core/errors.js';
import { buildPluginsLine } from '../core/zshrc-profile.js';

// Config file location, relative to $HOME
const CONFIG_DIR = join('.config', 'zsh-bootstrap');
const CONFIG_FILENAME = 'config.json';

/**
 * Everything the run takes from the process environment, read in one place.
 */
export interface SetupEnvironment {
  home: string;
  user: string;
  /** Login shell from $SHELL */
  shell?: string;
  /** $ZSH_CUSTOM */
  zshCustom?: string;
  isRoot: boolean;
}

/**
 * Fully resolved settings passed to every step of the run.
 */
export interface SetupConfig {
  environment: SetupEnvironment;
  zshrcPath: string;
  ohMyZshDir: string;
  pluginDir: string;
  installerUrl: string;
  unattended: boolean;
  packages: Packages;
  plugins: Plugin[];
  /** The exact plugins=(...) line written to .zshrc */
  pluginsLine: string;
  block: {
    marker: string;
    templatePath?: string;
    checks: string[];
  };
  setDefaultShell: boolean;
}

export interface SetupOverrides {
  zshrc?: string;
}

export function readEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  uid: number | undefined = process.getuid?.()
): SetupEnvironment {
  return {
    home: env.HOME || homedir(),
    user: env.USER || env.LOGNAME || userInfo().username,
    shell: env.SHELL || undefined,
    zshCustom: env.ZSH_CUSTOM || undefined,
    isRoot: uid === 0,
  };
}

/**
 * Expand a leading ~ and make the path absolute
 */
export function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return isAbsolute(path) ? path : resolve(path);
}

export function resolveSetupConfig(
  config: Config,
  environment: SetupEnvironment,
  overrides: SetupOverrides = {}
): SetupConfig {
  const { home } = environment;
  const ohMyZshDir = expandHome(config.ohMyZsh.dir ?? '~/.oh-my-zsh', home);
  const customDir = expandHome(
    config.customDir ?? environment.zshCustom ?? join(ohMyZshDir, 'custom'),
    home
  );

  return {
    environment,
    zshrcPath: expandHome(overrides.zshrc ?? config.zshrc ?? '~/.zshrc', home),
    ohMyZshDir,
    pluginDir: join(customDir, 'plugins'),
    installerUrl: config.ohMyZsh.installerUrl,
    unattended: config.ohMyZsh.unattended,
    packages: config.packages,
    plugins: config.plugins,
    pluginsLine: buildPluginsLine(config.builtinPlugins, config.plugins),
    block: {
      marker: config.block.marker,
      templatePath: config.block.template ? expandHome(config.block.template, home) : undefined,
      checks: config.block.checks,
    },
    setDefaultShell: config.shell.setDefault,
  };
}

export class ConfigManager {
  private readonly config: Config;
  private readonly configPath: string;
  private readonly explicit: boolean;

  /**
   * @param configPath - explicit file; it must exist. Without one the
   *   global file is used when present, defaults otherwise.
   */
  constructor(environment: SetupEnvironment, configPath?: string) {
    this.explicit = configPath !== undefined;
    this.configPath = configPath !== undefined
      ? expandHome(configPath, environment.home)
      : ConfigManager.getGlobalConfigPath(environment.home);
    this.config = this.load();
  }

  private load(): Config {
    if (!existsSync(this.configPath)) {
      if (this.explicit) {
        throw new ConfigFileError(this.configPath, 'file not found');
      }
      return ConfigSchema.parse({});
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      const details = error instanceof Error ? error.message : 'unreadable';
      throw new ConfigFileError(this.configPath, details, error);
    }

    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigFileError(this.configPath, details, parsed.error);
    }
    return parsed.data;
  }

  get(): Config {
    return this.config;
  }

  resolve(environment: SetupEnvironment, overrides: SetupOverrides = {}): SetupConfig {
    return resolveSetupConfig(this.config, environment, overrides);
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Write the defaults to `path`. Refuses to overwrite unless forced.
   */
  static writeDefaults(path: string, force = false): boolean {
    if (existsSync(path) && !force) {
      return false;
    }
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(path, JSON.stringify(ConfigSchema.parse({}), null, 2) + '\n');
    return true;
  }

  static getGlobalConfigPath(home: string): string {
    return join(home, CONFIG_DIR, CONFIG_FILENAME);
  }
}
