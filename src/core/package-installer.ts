/**
 * apt/dpkg package installation.
 */

import type { CommandRunner } from './command-runner.js';
import { SetupError, type SetupStep } from './errors.js';

export type PackageStatus = 'present' | 'installed' | 'failed';

export interface PackageResult {
  name: string;
  status: PackageStatus;
  reason?: string;
}

export interface InstallReport {
  packages: PackageResult[];
  warnings: string[];
}

export interface EnsureInstalledOptions {
  /** Run `apt-get update` before installing (default true) */
  refreshIndex?: boolean;
  /** Show apt output on the terminal (default true) */
  inherit?: boolean;
  step?: SetupStep;
}

export interface PackageInstaller {
  ensureInstalled(names: string[], options?: EnsureInstalledOptions): Promise<InstallReport>;
}

const INSTALLED_STATUS = 'install ok installed';

export class AptInstaller implements PackageInstaller {
  constructor(private readonly runner: CommandRunner) {}

  async isInstalled(name: string): Promise<boolean> {
    try {
      const { stdout } = await this.runner.run('dpkg-query', ['-W', '-f=${Status}', name]);
      return stdout.includes(INSTALLED_STATUS);
    } catch {
      // dpkg-query exits non-zero for unknown packages
      return false;
    }
  }

  async ensureInstalled(
    names: string[],
    options: EnsureInstalledOptions = {}
  ): Promise<InstallReport> {
    const { refreshIndex = true, inherit = true, step = 'packages' } = options;
    const warnings: string[] = [];
    const present = new Set<string>();

    if (await this.runner.which('dpkg-query')) {
      for (const name of names) {
        if (await this.isInstalled(name)) present.add(name);
      }
    } else {
      warnings.push('dpkg-query not found; skipping installed checks and attempting install');
    }

    const missing = names.filter((name) => !present.has(name));
    const results = new Map<string, PackageResult>(
      [...present].map((name): [string, PackageResult] => [name, { name, status: 'present' }])
    );

    if (missing.length > 0) {
      try {
        if (refreshIndex) {
          await this.runner.runPrivileged('apt-get', ['update', '-y'], { inherit, step });
        }
        await this.runner.runPrivileged('apt-get', ['install', '-y', ...missing], { inherit, step });
        for (const name of missing) {
          results.set(name, { name, status: 'installed' });
        }
      } catch (error) {
        // sudo missing and the like are the caller's to classify
        if (error instanceof SetupError) throw error;
        const reason = error instanceof Error ? error.message : String(error);
        for (const name of missing) {
          results.set(name, { name, status: 'failed', reason });
        }
        warnings.push(`apt could not install: ${missing.join(', ')}`);
      }
    }

    return {
      packages: names.map((name): PackageResult => results.get(name) ?? { name, status: 'failed' }),
      warnings,
    };
  }
}
