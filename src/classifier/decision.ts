/**
 * @fileoverview Corruption decision table
 *
 * | NEEDED | PROVIDES | REQUIRES | sharedLibs | executables | verdict |
 * |--------|----------|----------|------------|-------------|---------|
 * | yes    | yes      | any      | any        | any         | fine    |
 * | any    | any      | any      | no         | no          | fine    |
 * | yes    | no       | any      | no         | yes         | fine    |
 * | yes    | no       | any      | yes        | any         | broken  |
 * | no     | yes      | any      | any        | any         | broken  |
 * | no     | no       | no       | either yes              | broken  |
 * | anything else                                          | ambiguous |
 *
 * Ambiguous combinations are never guessed at: they carry the facts back to
 * the operator.
 */

import type { CorruptionFacts, Verdict } from '../types.js';

interface Rule {
  matches(facts: CorruptionFacts): boolean;
  verdict: Verdict;
}

const RULES: readonly Rule[] = [
  {
    matches: (f) => f.needed && f.provides,
    verdict: { kind: 'fine', reason: 'complete' },
  },
  {
    matches: (f) => !f.sharedLibs && !f.executables,
    verdict: { kind: 'fine', reason: 'no-binaries' },
  },
  {
    matches: (f) => f.needed && !f.provides && !f.sharedLibs && f.executables,
    verdict: { kind: 'fine', reason: 'executables-only' },
  },
  {
    matches: (f) => f.needed && !f.provides && f.sharedLibs,
    verdict: { kind: 'broken', reason: 'shared-libs-missing-provides' },
  },
  {
    matches: (f) => !f.needed && f.provides,
    verdict: { kind: 'broken', reason: 'provides-without-needed' },
  },
  {
    matches: (f) => !f.needed && !f.provides && !f.requires && (f.sharedLibs || f.executables),
    verdict: { kind: 'broken', reason: 'all-records-missing' },
  },
];

export function decide(facts: CorruptionFacts): Verdict {
  for (const rule of RULES) {
    if (rule.matches(facts)) return { ...rule.verdict };
  }
  return { kind: 'ambiguous', facts: { ...facts } };
}
