/**
 * Setup Error Types - Structured error handling for the install run
 *
 * Every failure carries the step it happened in and a hint telling the user
 * what to do next. Fatal errors abort the run; the others are reported as
 * warnings and the run continues.
 */

export type SetupStep =
  | 'packages'
  | 'oh-my-zsh'
  | 'zshrc'
  | 'optional-packages'
  | 'plugins'
  | 'patch'
  | 'verify'
  | 'default-shell'
  | 'config';

/**
 * Base error for all setup failures
 */
export class SetupError extends Error {
  readonly step: SetupStep;
  readonly hint: string;
  readonly fatal: boolean;

  constructor(step: SetupStep, message: string, hint: string, fatal: boolean, cause?: unknown) {
    super(message);
    this.name = 'SetupError';
    this.step = step;
    this.hint = hint;
    this.fatal = fatal;
    if (cause) this.cause = cause;
  }

  /**
   * Format for user-facing display (CLI output)
   */
  toUserMessage(): string {
    return `[${this.step}] ${this.message}\n  → ${this.hint}`;
  }
}

/**
 * A required tool or framework is absent and could not be installed.
 * Examples: zsh missing after apt, no sudo for a non-root user, Oh My Zsh installer failed
 */
export class PrerequisiteMissingError extends SetupError {
  readonly tool: string;

  constructor(step: SetupStep, tool: string, hint: string, cause?: unknown) {
    super(step, `${tool} is required but not available`, hint, true, cause);
    this.name = 'PrerequisiteMissingError';
    this.tool = tool;
  }
}

/**
 * An optional step failed. The run continues.
 */
export class OptionalStepFailedError extends SetupError {
  constructor(step: SetupStep, message: string, hint: string, cause?: unknown) {
    super(step, message, hint, false, cause);
    this.name = 'OptionalStepFailedError';
  }
}

/**
 * The directive line is not in the file after patching it
 */
export class PatchVerificationError extends SetupError {
  readonly file: string;
  readonly expectedLine: string;

  constructor(file: string, expectedLine: string) {
    super(
      'patch',
      `Failed to set "${expectedLine}" in ${file}`,
      'The file may have been modified while patching. Re-run the command.',
      true
    );
    this.name = 'PatchVerificationError';
    this.file = file;
    this.expectedLine = expectedLine;
  }
}

/**
 * A verification expectation did not hold
 */
export class VerificationFailedError extends SetupError {
  readonly file: string;
  readonly pattern: string;

  constructor(file: string, pattern: string) {
    super(
      'verify',
      `Expected ${JSON.stringify(pattern)} in ${file}`,
      `Re-run \`zsh-bootstrap patch\` to restore the managed configuration in ${file}`,
      true
    );
    this.name = 'VerificationFailedError';
    this.file = file;
    this.pattern = pattern;
  }
}

/**
 * The target file could not be read, written or appended to
 */
export class WriteError extends SetupError {
  readonly file: string;

  constructor(file: string, operation: 'read' | 'write' | 'append' | 'create', cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      'patch',
      `Could not ${operation} ${file}${reason}`,
      `Check that ${file} and its directory are writable by the current user`,
      true,
      cause
    );
    this.name = 'WriteError';
    this.file = file;
  }
}

/**
 * A clone/update/shell-switch call failed. The run continues, but that step's
 * end state may be incomplete.
 */
export class CollaboratorWarning extends SetupError {
  constructor(step: SetupStep, message: string, hint: string, cause?: unknown) {
    super(step, message, hint, false, cause);
    this.name = 'CollaboratorWarning';
  }
}

/**
 * A managed block does not contain the marker used to detect it
 */
export class InvalidBlockError extends SetupError {
  constructor(marker: string) {
    super(
      'patch',
      `Block text does not contain its marker ${JSON.stringify(marker)}`,
      'Set block.marker to a string that occurs in the block template',
      true
    );
    this.name = 'InvalidBlockError';
  }
}

/**
 * Configuration file unreadable or invalid
 */
export class ConfigFileError extends SetupError {
  readonly path: string;

  constructor(path: string, details: string, cause?: unknown) {
    super(
      'config',
      `Invalid configuration in ${path}: ${details}`,
      'Fix the file, or run `zsh-bootstrap config --init` to write the defaults',
      true,
      cause
    );
    this.name = 'ConfigFileError';
    this.path = path;
  }
}

/**
 * Anything that is not a SetupError is treated as fatal
 */
export function isFatal(error: unknown): boolean {
  return error instanceof SetupError ? error.fatal : true;
}

export function errorMessage(error: unknown): string {
  if (error instanceof SetupError) return error.toUserMessage();
  if (error instanceof Error) return error.message;
  return String(error);
}
