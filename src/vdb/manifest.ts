/**
 * @fileoverview CONTENTS manifest reader
 *
 * CONTENTS lists what a package installed, one `<type> <path> [extra...]`
 * record per line (`obj`, `dir`, `sym`, `fif`, `dev`). Only the first path
 * token is kept; `obj` lines carry an md5 and an mtime after it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ManifestMissingError } from '../core/errors.js';
import { hasErrorCode } from '../utils/errors.js';
import type { InstalledFileRecord, PackageEntry } from '../types.js';

export const MANIFEST_FILENAME = 'CONTENTS';

export function parseManifest(text: string): InstalledFileRecord[] {
  const records: InstalledFileRecord[] = [];
  for (const line of text.split('\n')) {
    if (!line) continue;
    const separator = line.indexOf(' ');
    if (separator === -1) continue;
    const type = line.slice(0, separator);
    const installedPath = line.slice(separator + 1).split(' ')[0];
    if (!installedPath) continue;
    records.push({ type, path: installedPath });
  }
  return records;
}

/**
 * The `obj` records: regular files, the only ones that can be ELF objects.
 */
export function objectRecords(records: readonly InstalledFileRecord[]): InstalledFileRecord[] {
  return records.filter((record) => record.type === 'obj');
}

export async function readManifest(entry: PackageEntry): Promise<InstalledFileRecord[]> {
  const manifestPath = path.join(entry.dir, MANIFEST_FILENAME);
  let text: string;
  try {
    text = await fs.readFile(manifestPath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      throw new ManifestMissingError(entry.cpf, manifestPath);
    }
    throw error;
  }
  return parseManifest(text);
}
