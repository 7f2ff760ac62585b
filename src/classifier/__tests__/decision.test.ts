import { describe, it, expect } from 'vitest';
import { decide } from '../decision.js';
import type { CorruptionFacts } from '../../types.js';

function facts(overrides: Partial<CorruptionFacts>): CorruptionFacts {
  return { needed: false, provides: false, requires: false, sharedLibs: false, executables: false, ...overrides };
}

describe('decide', () => {
  it('accepts packages with both NEEDED and PROVIDES', () => {
    expect(decide(facts({ needed: true, provides: true, sharedLibs: true }))).toEqual({
      kind: 'fine',
      reason: 'complete',
    });
  });

  it('accepts packages with no dynamic ELF objects whatever their records', () => {
    expect(decide(facts({}))).toEqual({ kind: 'fine', reason: 'no-binaries' });
    expect(decide(facts({ provides: true }))).toEqual({ kind: 'fine', reason: 'no-binaries' });
    expect(decide(facts({ requires: true }))).toEqual({ kind: 'fine', reason: 'no-binaries' });
  });

  it('accepts executables with NEEDED and no PROVIDES', () => {
    expect(decide(facts({ needed: true, executables: true }))).toEqual({ kind: 'fine', reason: 'executables-only' });
    expect(decide(facts({ needed: true, requires: true, executables: true }))).toEqual({
      kind: 'fine',
      reason: 'executables-only',
    });
  });

  it('flags shared libraries with NEEDED but no PROVIDES', () => {
    expect(decide(facts({ needed: true, sharedLibs: true }))).toEqual({
      kind: 'broken',
      reason: 'shared-libs-missing-provides',
    });
    expect(decide(facts({ needed: true, requires: true, sharedLibs: true, executables: true }))).toEqual({
      kind: 'broken',
      reason: 'shared-libs-missing-provides',
    });
  });

  it('flags PROVIDES without NEEDED when binaries are installed', () => {
    expect(decide(facts({ provides: true, executables: true }))).toEqual({
      kind: 'broken',
      reason: 'provides-without-needed',
    });
    expect(decide(facts({ provides: true, requires: true, sharedLibs: true }))).toEqual({
      kind: 'broken',
      reason: 'provides-without-needed',
    });
  });

  it('flags binaries with no records at all', () => {
    expect(decide(facts({ sharedLibs: true }))).toEqual({ kind: 'broken', reason: 'all-records-missing' });
    expect(decide(facts({ executables: true }))).toEqual({ kind: 'broken', reason: 'all-records-missing' });
  });

  it('returns the facts for combinations it will not guess at', () => {
    const onlyRequires = facts({ requires: true, executables: true });

    const verdict = decide(onlyRequires);

    expect(verdict).toEqual({ kind: 'ambiguous', facts: onlyRequires });
    expect(decide(facts({ requires: true, sharedLibs: true })).kind).toBe('ambiguous');
  });

  it('never calls a package without binaries broken', () => {
    for (const needed of [false, true]) {
      for (const provides of [false, true]) {
        for (const requires of [false, true]) {
          expect(decide(facts({ needed, provides, requires })).kind).toBe('fine');
        }
      }
    }
  });

  it('hands each package its own verdict object', () => {
    const first = decide(facts({ sharedLibs: true }));
    const second = decide(facts({ sharedLibs: true }));

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
  });
});
