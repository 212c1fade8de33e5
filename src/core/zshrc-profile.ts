/**
 * What zsh-bootstrap manages inside .zshrc: the plugins=(...) directive, the
 * helper-function block, and the checks run after patching.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { SetupConfig } from '../config/index.js';
import type { Plugin } from '../config/schema.js';
import type { DirectiveSpec, Expectation, MarkedBlock } from './config-patcher.js';
import { WriteError } from './errors.js';

export const DEFAULT_BLOCK_TEMPLATE = fileURLToPath(
  new URL('../../templates/zshrc-block.zsh', import.meta.url)
);

const PLUGINS_ANCHOR = /^\s*plugins=/;
const THEME_ANCHOR = /^\s*ZSH_THEME=/;

export function buildPluginsLine(builtin: string[], plugins: Plugin[]): string {
  const names = [...builtin, ...plugins.map((plugin) => plugin.name)];
  return `plugins=(${names.join(' ')})`;
}

/**
 * Replace the first plugins= line; otherwise insert after ZSH_THEME=, else at the top.
 */
export function pluginsDirective(line: string): DirectiveSpec {
  return {
    anchor: PLUGINS_ANCHOR,
    line,
    fallbacks: [{ kind: 'after', anchor: THEME_ANCHOR }, { kind: 'prepend' }],
  };
}

export function loadBlockTemplate(path: string = DEFAULT_BLOCK_TEMPLATE): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new WriteError(path, 'read', error);
  }
}

export function helperBlock(config: SetupConfig): MarkedBlock {
  return {
    marker: config.block.marker,
    content: loadBlockTemplate(config.block.templatePath),
  };
}

export function buildExpectations(config: SetupConfig): Expectation[] {
  return [
    { pattern: config.pluginsLine, kind: 'line' },
    ...config.block.checks.map((pattern): Expectation => ({ pattern, kind: 'substring' })),
  ];
}
