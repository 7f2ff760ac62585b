/**
 * @fileoverview Soname dependency synthesis
 *
 * Folds per-binary linkage records into the package-level PROVIDES and
 * REQUIRES relations, following the package manager's own aggregation:
 *
 * - a record's soname is provided under its multilib category;
 * - each needed soname is required under the same category;
 * - a requirement the package satisfies itself is dropped when every binary
 *   that needs it can reach an in-package provider through its runpath.
 *
 * Tuples are keyed by (category, soname), so the same soname needed by many
 * binaries, or the same record folded twice, collapses to one entry.
 */

import * as path from 'path';
import { SynthesisInvariantError } from '../core/errors.js';
import { approximateMultilibCategory } from './multilib.js';
import type { DependencySets, LinkageRecord, SonameMap } from '../types.js';

export type CategorizedLinkageRecord = LinkageRecord & { readonly multilibCategory: string };

/**
 * Copy of the record with a multilib category, approximated from the
 * architecture when the record carries none.
 */
export function withMultilibCategory(record: LinkageRecord): CategorizedLinkageRecord {
  return {
    ...record,
    multilibCategory: record.multilibCategory ?? approximateMultilibCategory(record.arch),
  };
}

/**
 * Expand `$ORIGIN` / `${ORIGIN}` against the requiring object's directory and
 * normalise, so runpaths compare against provider directories.
 */
export function expandRunpath(runpath: string, filename: string): string {
  const origin = path.posix.dirname(filename);
  const expanded = runpath.replace(/\$\{ORIGIN\}|\$ORIGIN/g, origin);
  const normalized = path.posix.normalize(expanded);
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function runpathKey(runpaths: ReadonlySet<string>): string {
  return [...runpaths].sort().join(':');
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

export function synthesize(records: readonly LinkageRecord[]): DependencySets {
  const provides = new Map<string, Set<string>>();
  // category → soname → distinct runpath sets it was required under
  const requires = new Map<string, Map<string, Map<string, ReadonlySet<string>>>>();
  // category → soname → directories of the in-package objects providing it
  const providerDirs = new Map<string, Map<string, Set<string>>>();

  for (const record of records.map(withMultilibCategory)) {
    const category = record.multilibCategory;

    if (record.needed.length > 0) {
      const runpaths = new Set(record.runpaths.map((runpath) => expandRunpath(runpath, record.filename)));
      const key = runpathKey(runpaths);
      const required = getOrCreate(requires, category, () => new Map<string, Map<string, ReadonlySet<string>>>());
      for (const soname of record.needed) {
        getOrCreate(required, soname, () => new Map<string, ReadonlySet<string>>()).set(key, runpaths);
      }
    }

    if (record.soname) {
      getOrCreate(provides, category, () => new Set<string>()).add(record.soname);
      const dirs = getOrCreate(providerDirs, category, () => new Map<string, Set<string>>());
      getOrCreate(dirs, record.soname, () => new Set<string>()).add(path.posix.dirname(record.filename));
    }
  }

  return {
    provides,
    requires: pruneInternalRequirements(requires, provides, providerDirs),
  };
}

function pruneInternalRequirements(
  requires: Map<string, Map<string, Map<string, ReadonlySet<string>>>>,
  provides: Map<string, Set<string>>,
  providerDirs: Map<string, Map<string, Set<string>>>,
): SonameMap {
  const result = new Map<string, Set<string>>();

  for (const [category, required] of requires) {
    const provided = provides.get(category);
    const kept = new Set<string>();

    for (const [soname, runpathSets] of required) {
      const dirs = provided?.has(soname) ? providerDirs.get(category)?.get(soname) : undefined;
      const unresolved = dirs
        ? [...runpathSets.values()].filter((runpaths) => ![...runpaths].some((dir) => dirs.has(dir)))
        : [...runpathSets.values()];
      if (unresolved.length > 0) kept.add(soname);
    }

    if (kept.size > 0) result.set(category, kept);
  }

  return result;
}

/**
 * Render a soname map in the PROVIDES/REQUIRES file format:
 * `<category>: <soname> <soname>...` per line, categories and sonames sorted.
 */
export function formatSonameMap(map: SonameMap): string {
  return [...map.keys()]
    .sort()
    .map((category) => {
      const sonames = [...(map.get(category) ?? [])].sort();
      return `${category}: ${sonames.join(' ')}\n`;
    })
    .join('');
}

export function countEntries(map: SonameMap): number {
  let count = 0;
  for (const sonames of map.values()) count += sonames.size;
  return count;
}

/**
 * A package that installs shared libraries must provide at least one soname;
 * an empty PROVIDES for it means synthesis went wrong, not that there is
 * nothing to record.
 */
export function assertProvidesInvariant(sets: DependencySets, installsSharedLib: boolean, cpf: string): void {
  if (installsSharedLib && countEntries(sets.provides) === 0) {
    throw new SynthesisInvariantError(cpf);
  }
}
