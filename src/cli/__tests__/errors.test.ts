import { describe, it, expect } from 'vitest';
import { parseArgs } from 'node:util';
import { CliError, classifyError, createError, formatError, formatErrorJson } from '../errors.js';
import { ManifestMissingError, SynthesisInvariantError } from '../../core/errors.js';

describe('classifyError', () => {
  it('keeps CliError fields', () => {
    const error = createError('AMBIGUOUS_PACKAGES', '1 package(s) need attention', { packages: ['cat-d/qux-3.0'] });

    expect(classifyError(error)).toEqual({
      code: 'AMBIGUOUS_PACKAGES',
      message: '1 package(s) need attention',
      suggestion: 'Inspect the listed packages by hand (or re-merge them); nothing was written.',
      details: { packages: ['cat-d/qux-3.0'] },
    });
  });

  it('maps recovery errors by code, with details', () => {
    const envelope = classifyError(new ManifestMissingError('cat-e/gone-1', '/vdb/cat-e/gone-1/CONTENTS'));

    expect(envelope.code).toBe('MANIFEST_MISSING');
    expect(envelope.suggestion).toContain('re-merge or remove it');
    expect(envelope.details).toEqual({ cpf: 'cat-e/gone-1', manifestPath: '/vdb/cat-e/gone-1/CONTENTS' });
  });

  it('gives no suggestion for recovery codes the CLI does not know', () => {
    expect(classifyError(new SynthesisInvariantError('cat-b/bar-2.0')).suggestion).toBeUndefined();
  });

  it('treats argument parser errors as invalid arguments', () => {
    let thrown: unknown;
    try {
      parseArgs({ args: ['--bogus'], options: {}, strict: true });
    } catch (error) {
      thrown = error;
    }

    expect(classifyError(thrown).code).toBe('INVALID_ARGUMENT');
  });

  it('falls back to INTERNAL', () => {
    expect(classifyError(new TypeError('x is undefined'))).toEqual({
      code: 'INTERNAL',
      message: 'x is undefined',
      suggestion: 'Re-run with --verbose for per-file detail.',
    });
  });
});

describe('formatError', () => {
  it('renders the code, message and suggestion', () => {
    expect(formatError({ code: 'INTERNAL', message: 'boom', suggestion: 'Try again.' })).toBe(
      'Error [INTERNAL]: boom\n\nSuggestion: Try again.',
    );
    expect(formatError({ code: 'INTERNAL', message: 'boom' })).toBe('Error [INTERNAL]: boom');
  });

  it('wraps the envelope for JSON output', () => {
    expect(JSON.parse(formatErrorJson({ code: 'INTERNAL', message: 'boom' }))).toEqual({
      error: { code: 'INTERNAL', message: 'boom' },
    });
  });

  it('exposes the suggestion on CliError', () => {
    expect(new CliError('bad', 'INVALID_ARGUMENT', 'Fix it.').suggestion).toBe('Fix it.');
  });
});
