/**
 * Config Patcher - idempotent edits of a single text configuration file
 *
 * Two kinds of edits are supported:
 *  - a directive line, located by a regex anchor and replaced in place, or
 *    inserted through an ordered chain of fallback strategies when absent
 *  - a marked block, appended once and detected afterwards by a marker substring
 *
 * Each edit comes in two forms: a pure transform over the file content
 * (`applyDirectiveLine`, `applyMarkedBlock`) and a file operation that reads,
 * writes and re-checks the file (`ensureDirectiveLine`, `ensureMarkedBlock`).
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  realpathSync,
  renameSync,
  rmSync,
  statSync,
  writeFileSync,
} from 'fs';
import { dirname } from 'path';
import { InvalidBlockError, PatchVerificationError, VerificationFailedError, WriteError } from './errors.js';

export const BLOCK_BEGIN = '# --- added by zsh-bootstrap ---';
export const BLOCK_END = '# --- end added by zsh-bootstrap ---';

// ─── Types ────────────────────────────────────────────────────────────────────

export type InsertionStrategy =
  | { kind: 'after'; anchor: RegExp }
  | { kind: 'before'; anchor: RegExp }
  | { kind: 'prepend' }
  | { kind: 'append' };

export interface DirectiveSpec {
  /** Identifies the canonical directive line; only the first match is replaced */
  anchor: RegExp;
  /** Exact content the directive line must have */
  line: string;
  /** Tried in order when no line matches `anchor`; prepends if none applies */
  fallbacks: InsertionStrategy[];
}

export type DirectiveAction =
  | 'unchanged'
  | 'replaced'
  | 'inserted-after'
  | 'inserted-before'
  | 'prepended'
  | 'appended';

export interface DirectiveOutcome {
  action: DirectiveAction;
  /** 1-based line number of the directive line in the result */
  lineNumber: number;
}

export interface MarkedBlock {
  /** Substring whose presence means the block is already in the file */
  marker: string;
  content: string;
}

export type MarkedBlockAction = 'present' | 'appended';

export type MatchKind = 'line' | 'substring';

export interface Expectation {
  pattern: string;
  kind: MatchKind;
}

export interface ExpectationResult {
  expectation: Expectation;
  passed: boolean;
}

// ─── Line helpers ─────────────────────────────────────────────────────────────

interface Lines {
  lines: string[];
  trailingNewline: boolean;
}

function splitLines(content: string): Lines {
  if (content === '') {
    return { lines: [], trailingNewline: true };
  }
  const trailingNewline = content.endsWith('\n');
  const body = trailingNewline ? content.slice(0, -1) : content;
  return { lines: body.split('\n'), trailingNewline };
}

function joinLines({ lines, trailingNewline }: Lines): string {
  if (lines.length === 0) return '';
  return lines.join('\n') + (trailingNewline ? '\n' : '');
}

// A `g` or `y` flag makes RegExp#test stateful across lines
function lineMatcher(anchor: RegExp): RegExp {
  return new RegExp(anchor.source, anchor.flags.replace(/[gy]/g, ''));
}

function findLine(lines: string[], anchor: RegExp): number {
  const matcher = lineMatcher(anchor);
  return lines.findIndex((line) => matcher.test(line));
}

function hasLine(content: string, line: string): boolean {
  return content.split(/\r?\n/).some((candidate) => candidate === line);
}

/**
 * Resolve where a strategy would put the line, or null if it does not apply.
 */
function placeLine(
  lines: string[],
  strategy: InsertionStrategy
): { index: number; action: DirectiveAction } | null {
  switch (strategy.kind) {
    case 'after': {
      const found = findLine(lines, strategy.anchor);
      return found === -1 ? null : { index: found + 1, action: 'inserted-after' };
    }
    case 'before': {
      const found = findLine(lines, strategy.anchor);
      return found === -1 ? null : { index: found, action: 'inserted-before' };
    }
    case 'prepend':
      return { index: 0, action: 'prepended' };
    case 'append':
      return { index: lines.length, action: 'appended' };
  }
}

// ─── Pure transforms ──────────────────────────────────────────────────────────

export function applyDirectiveLine(
  content: string,
  directive: DirectiveSpec
): DirectiveOutcome & { content: string } {
  const parsed = splitLines(content);
  const lines = [...parsed.lines];

  const existing = findLine(lines, directive.anchor);
  if (existing !== -1) {
    const current = lines[existing];
    const cr = current.endsWith('\r') ? '\r' : '';
    if (current.slice(0, current.length - cr.length) === directive.line) {
      return { content, action: 'unchanged', lineNumber: existing + 1 };
    }
    lines[existing] = directive.line + cr;
    return {
      content: joinLines({ lines, trailingNewline: parsed.trailingNewline }),
      action: 'replaced',
      lineNumber: existing + 1,
    };
  }

  let placement: { index: number; action: DirectiveAction } = { index: 0, action: 'prepended' };
  for (const strategy of directive.fallbacks) {
    const placed = placeLine(lines, strategy);
    if (placed) {
      placement = placed;
      break;
    }
  }

  // Inserted lines follow a CRLF file's line ending
  const cr = lines.length > 0 && lines[0].endsWith('\r') ? '\r' : '';
  lines.splice(placement.index, 0, directive.line + cr);
  return {
    content: joinLines({ lines, trailingNewline: parsed.trailingNewline }),
    action: placement.action,
    lineNumber: placement.index + 1,
  };
}

/**
 * Text appended to `content` to add `block`, or '' when the marker is present.
 */
export function renderBlockAppendix(content: string, block: MarkedBlock): string {
  if (!block.content.includes(block.marker)) {
    throw new InvalidBlockError(block.marker);
  }
  if (content.includes(block.marker)) {
    return '';
  }

  const terminator = content !== '' && !content.endsWith('\n') ? '\n' : '';
  const body = block.content.replace(/\n+$/, '');
  return `${terminator}\n${BLOCK_BEGIN}\n${body}\n${BLOCK_END}\n`;
}

export function applyMarkedBlock(
  content: string,
  block: MarkedBlock
): { content: string; action: MarkedBlockAction } {
  const appendix = renderBlockAppendix(content, block);
  if (appendix === '') {
    return { content, action: 'present' };
  }
  return { content: content + appendix, action: 'appended' };
}

export function checkExpectations(content: string, expectations: Expectation[]): ExpectationResult[] {
  return expectations.map((expectation) => ({
    expectation,
    passed:
      expectation.kind === 'line'
        ? hasLine(content, expectation.pattern)
        : content.includes(expectation.pattern),
  }));
}

// ─── File operations ──────────────────────────────────────────────────────────

/**
 * Read the file; a file that does not exist reads as empty.
 */
export function readConfigFile(file: string): string {
  if (!existsSync(file)) return '';
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    throw new WriteError(file, 'read', error);
  }
}

export function ensureConfigFile(file: string): 'created' | 'exists' {
  if (existsSync(file)) return 'exists';
  try {
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, '', 'utf-8');
  } catch (error) {
    throw new WriteError(file, 'create', error);
  }
  return 'created';
}

/**
 * Replace the file's content through a sibling temp file renamed over it.
 * Symlinks are followed so a linked dotfile keeps its link.
 */
function writeReplacing(file: string, content: string): void {
  const target = existsSync(file) ? realpathSync(file) : file;
  const mode = existsSync(target) ? statSync(target).mode & 0o777 : 0o644;
  const temp = `${target}.zsh-bootstrap-${process.pid}.tmp`;

  try {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(temp, content, { encoding: 'utf-8', mode });
    renameSync(temp, target);
  } catch (error) {
    rmSync(temp, { force: true });
    throw new WriteError(file, 'write', error);
  }
}

export function ensureDirectiveLine(file: string, directive: DirectiveSpec): DirectiveOutcome {
  const before = readConfigFile(file);
  const result = applyDirectiveLine(before, directive);

  if (result.content !== before) {
    writeReplacing(file, result.content);
  }

  if (!hasLine(readConfigFile(file), directive.line)) {
    throw new PatchVerificationError(file, directive.line);
  }

  return { action: result.action, lineNumber: result.lineNumber };
}

export function ensureMarkedBlock(file: string, block: MarkedBlock): MarkedBlockAction {
  const current = readConfigFile(file);
  const appendix = renderBlockAppendix(current, block);
  if (appendix === '') {
    return 'present';
  }

  try {
    appendFileSync(file, appendix, 'utf-8');
  } catch (error) {
    throw new WriteError(file, 'append', error);
  }
  return 'appended';
}

/**
 * Re-read the file and check every expectation in order.
 * Throws VerificationFailedError naming the first one that fails.
 */
export function verify(file: string, expectations: Expectation[]): ExpectationResult[] {
  const results = checkExpectations(readConfigFile(file), expectations);
  const failed = results.find((result) => !result.passed);
  if (failed) {
    throw new VerificationFailedError(file, failed.expectation.pattern);
  }
  return results;
}
