import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { PluginFetcher, type GitClient } from '../src/core/plugin-fetcher.js';
import { cleanupDir, createTestDir } from './helpers.js';

const REPO_URL = 'https://example.com/zsh-users/zsh-autosuggestions.git';

function fakeGit(overrides: Partial<GitClient> = {}): GitClient {
  return {
    clone: vi.fn(async () => undefined),
    pullFastForward: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('PluginFetcher', () => {
  let dir: string;
  let dest: string;

  beforeEach(() => {
    dir = createTestDir();
    dest = join(dir, 'zsh-autosuggestions');
  });

  afterEach(() => {
    cleanupDir(dir);
  });

  it('clones a missing repository with depth 1', async () => {
    const git = fakeGit();
    const fetcher = new PluginFetcher(git);

    const outcome = await fetcher.cloneOrUpdate(REPO_URL, dest);

    expect(outcome).toEqual({ status: 'cloned', dest, message: `Cloned ${REPO_URL} -> ${dest}` });
    expect(git.clone).toHaveBeenCalledWith(REPO_URL, dest, 1);
    expect(git.pullFastForward).not.toHaveBeenCalled();
  });

  it('fast-forwards an existing clone', async () => {
    mkdirSync(join(dest, '.git'), { recursive: true });
    const git = fakeGit();
    const fetcher = new PluginFetcher(git);

    const outcome = await fetcher.cloneOrUpdate(REPO_URL, dest);

    expect(outcome).toEqual({ status: 'updated', dest, message: `Updated ${dest}` });
    expect(git.pullFastForward).toHaveBeenCalledWith(dest);
    expect(git.clone).not.toHaveBeenCalled();
  });

  it('skips a directory that is not a git repository', async () => {
    mkdirSync(dest);
    const git = fakeGit();
    const fetcher = new PluginFetcher(git);

    const outcome = await fetcher.cloneOrUpdate(REPO_URL, dest);

    expect(outcome.status).toBe('skipped');
    expect(outcome.message).toBe(`Directory exists but is not a git repo: ${dest} (skipping clone)`);
    expect(git.clone).not.toHaveBeenCalled();
  });

  it('returns a warning when the pull fails', async () => {
    mkdirSync(join(dest, '.git'), { recursive: true });
    const fetcher = new PluginFetcher(
      fakeGit({
        pullFastForward: async () => {
          throw new Error('fatal: Not possible to fast-forward, aborting.\nhint: more');
        },
      })
    );

    const outcome = await fetcher.cloneOrUpdate(REPO_URL, dest);

    expect(outcome.status).toBe('warning');
    expect(outcome.message).toBe(
      `Could not update ${dest} (continuing): fatal: Not possible to fast-forward, aborting.`
    );
  });

  it('returns a warning when the clone fails', async () => {
    const fetcher = new PluginFetcher(
      fakeGit({
        clone: async () => {
          throw new Error('fatal: repository not found');
        },
      })
    );

    const outcome = await fetcher.cloneOrUpdate(REPO_URL, dest);

    expect(outcome).toEqual({
      status: 'warning',
      dest,
      message: `Could not clone ${REPO_URL} (continuing): fatal: repository not found`,
    });
  });

  it('reports a failed clone through the default git client', async () => {
    const source = join(dir, 'no-such-repo');
    const fetcher = new PluginFetcher();

    const outcome = await fetcher.cloneOrUpdate(source, dest);

    expect(outcome.status).toBe('warning');
    expect(outcome.message.startsWith(`Could not clone ${source} (continuing): `)).toBe(true);
  });
});
