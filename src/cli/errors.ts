/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isRecoveryError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'AMBIGUOUS_PACKAGES'
  | 'MANIFEST_MISSING'
  | 'STAGING_PATH'
  | 'INTERNAL';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `vdb-elf-recover help <command>` for usage information.',
  AMBIGUOUS_PACKAGES: 'Inspect the listed packages by hand (or re-merge them); nothing was written.',
  MANIFEST_MISSING: 'A package directory without CONTENTS is corrupt beyond what this tool repairs; re-merge or remove it.',
  STAGING_PATH: 'Check that --output and --vdb point where you expect.',
  INTERNAL: 'Re-run with --verbose for per-file detail.',
};

/** Non-zero exit status for every reported error. */
export const EXIT_FAILURE = 1;

export interface ErrorEnvelope {
  code: string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

function isCliErrorCode(code: string): code is CliErrorCode {
  return Object.hasOwn(ERROR_SUGGESTIONS, code);
}

/** Library error codes the CLI reports under one of its own codes. */
const RECOVERY_CODE_ALIASES: Readonly<Record<string, CliErrorCode>> = {
  INVALID_CONFIG: 'INVALID_ARGUMENT',
};

function isParseArgsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS_');
}

/**
 * Normalise anything thrown by a command into an envelope for output.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return { code: error.code, message: error.message, suggestion: error.suggestion, details: error.details };
  }
  if (isRecoveryError(error)) {
    const code = Object.hasOwn(RECOVERY_CODE_ALIASES, error.code) ? RECOVERY_CODE_ALIASES[error.code] : error.code;
    return {
      code,
      message: error.message,
      suggestion: isCliErrorCode(code) ? ERROR_SUGGESTIONS[code] : undefined,
      details: error.toJSON().details,
    };
  }
  if (isParseArgsError(error)) {
    return { code: 'INVALID_ARGUMENT', message: getErrorMessage(error), suggestion: ERROR_SUGGESTIONS.INVALID_ARGUMENT };
  }
  return { code: 'INTERNAL', message: getErrorMessage(error), suggestion: ERROR_SUGGESTIONS.INTERNAL };
}

export function formatError(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.suggestion) {
    lines.push('', `Suggestion: ${envelope.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
