/**
 * @fileoverview Installed-package database layout
 *
 * The database is a two-level tree, `<root>/<category>/<PF>/`, with one
 * directory per installed package holding CONTENTS and the metadata records.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { hasErrorCode } from '../utils/errors.js';
import type { MetadataRecordName, PackageEntry, RecordPresence, SkipReason } from '../types.js';

export const DEFAULT_VDB_ROOT = '/var/db/pkg';

const MERGING_MARKER = '-MERGING-';
const LOCKFILE_MARKER = '.portage_lockfile';

/**
 * Enumerate every `category/PF` directory under the database root, sorted by
 * `category/PF`.
 */
export async function listPackageEntries(vdbRoot: string): Promise<PackageEntry[]> {
  const root = path.resolve(vdbRoot);
  const matches = await glob('*/*', { cwd: root, withFileTypes: true, dot: true });

  const entries: PackageEntry[] = [];
  for (const match of matches) {
    if (!match.isDirectory()) continue;
    const category = match.parent?.name;
    if (!category) continue;
    const pf = match.name;
    entries.push({
      dir: path.join(root, category, pf),
      cpf: `${category}/${pf}`,
      category,
      pf,
    });
  }

  entries.sort((a, b) => (a.cpf < b.cpf ? -1 : a.cpf > b.cpf ? 1 : 0));
  return entries;
}

/**
 * Why an entry is not a real installed package, or null when it is one.
 */
export function skipReason(entry: PackageEntry): SkipReason | null {
  if (entry.category === 'virtual') return 'virtual';
  if (entry.category.startsWith('acct-')) return 'account';
  if (entry.pf.includes(MERGING_MARKER)) return 'merging';
  if (entry.pf.includes(LOCKFILE_MARKER)) return 'lockfile';
  return null;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) return false;
    throw error;
  }
}

export async function hasRecord(entry: PackageEntry, record: MetadataRecordName): Promise<boolean> {
  return isFile(path.join(entry.dir, record));
}

export async function readRecordPresence(entry: PackageEntry): Promise<RecordPresence> {
  const [needed, neededElf2, provides, requires] = await Promise.all([
    hasRecord(entry, 'NEEDED'),
    hasRecord(entry, 'NEEDED.ELF.2'),
    hasRecord(entry, 'PROVIDES'),
    hasRecord(entry, 'REQUIRES'),
  ]);
  return { needed, neededElf2, provides, requires };
}

/**
 * `=category/PF`, the exact-version atom the package manager accepts for a
 * rebuild.
 */
export function toEmergeAtom(cpf: string): string {
  return `=${cpf}`;
}
