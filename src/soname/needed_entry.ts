/**
 * @fileoverview NEEDED.ELF.2 line grammar
 *
 *   arch;filename;soname;runpath[:runpath...];needed[,needed...][;multilib_category]
 */

import { InvalidNeededEntryError } from '../core/errors.js';
import type { LinkageRecord } from '../types.js';

const MIN_FIELDS = 5;
const MAX_FIELDS = 6;

export function parseNeededEntry(line: string): LinkageRecord {
  const fields = line.split(';');
  if (fields.length < MIN_FIELDS || fields.length > MAX_FIELDS) {
    throw new InvalidNeededEntryError(line, fields.length);
  }
  const [arch, filename, soname, runpaths, needed, multilibCategory] = fields;
  return {
    arch,
    filename,
    soname,
    runpaths: runpaths.split(':').filter(Boolean),
    needed: needed.split(',').filter(Boolean),
    multilibCategory: multilibCategory ? multilibCategory : null,
  };
}

export function parseNeededElf2(text: string): LinkageRecord[] {
  return text
    .split('\n')
    .filter((line) => line.length > 0)
    .map(parseNeededEntry);
}
