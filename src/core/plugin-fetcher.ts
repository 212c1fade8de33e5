/**
 * Clone or fast-forward plugin repositories.
 *
 * Failures never throw: they come back as a 'warning' outcome so one
 * unreachable repository does not stop the others.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import { simpleGit } from 'simple-git';

export type FetchStatus = 'updated' | 'cloned' | 'skipped' | 'warning';

export interface FetchOutcome {
  status: FetchStatus;
  dest: string;
  message: string;
}

/**
 * The git operations the fetcher needs
 */
export interface GitClient {
  clone(url: string, dest: string, depth: number): Promise<void>;
  pullFastForward(dir: string): Promise<void>;
}

export function createGitClient(): GitClient {
  return {
    async clone(url, dest, depth) {
      await simpleGit().clone(url, dest, ['--depth', String(depth)]);
    },
    async pullFastForward(dir) {
      await simpleGit(dir).pull(['--ff-only']);
    },
  };
}

function reasonOf(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.trim().split('\n')[0];
}

export class PluginFetcher {
  constructor(private readonly git: GitClient = createGitClient()) {}

  async cloneOrUpdate(url: string, dest: string): Promise<FetchOutcome> {
    if (existsSync(join(dest, '.git'))) {
      try {
        await this.git.pullFastForward(dest);
        return { status: 'updated', dest, message: `Updated ${dest}` };
      } catch (error) {
        return {
          status: 'warning',
          dest,
          message: `Could not update ${dest} (continuing): ${reasonOf(error)}`,
        };
      }
    }

    if (existsSync(dest)) {
      return {
        status: 'skipped',
        dest,
        message: `Directory exists but is not a git repo: ${dest} (skipping clone)`,
      };
    }

    try {
      await this.git.clone(url, dest, 1);
      return { status: 'cloned', dest, message: `Cloned ${url} -> ${dest}` };
    } catch (error) {
      return {
        status: 'warning',
        dest,
        message: `Could not clone ${url} (continuing): ${reasonOf(error)}`,
      };
    }
  }
}
