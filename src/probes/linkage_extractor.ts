/**
 * @fileoverview Linkage fact extraction
 *
 * Regenerates a package's raw NEEDED and NEEDED.ELF.2 records by running
 * scanelf over its binaries, with the same line layout the package manager
 * writes at install time:
 *
 *   NEEDED        `<obj> <needed,...>`
 *   NEEDED.ELF.2  `<arch>;<obj>;<soname>;<rpath>;<needed,...>`
 *
 * Both land in `<workdir>/build-info/`. When scanelf reports nothing, no file
 * is written; callers treat a missing NEEDED as "nothing to extract".
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { execa } from 'execa';
import { ExtractionError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { resolveInstallPath, toInstallPath } from '../vdb/install_root.js';
import type { ContentTypeProbe } from './content_type.js';

export const BUILD_INFO_DIR = 'build-info';

export interface LinkageExtractor {
  extract(workdir: string, binaryPaths: readonly string[]): Promise<void>;
}

export interface ScanelfLine {
  arch: string;
  obj: string;
  soname: string;
  rpath: string;
  needed: string;
}

const SCANELF_FORMAT = '%a;%p;%S;%r;%n';
// scanelf prints this for a field with no value.
const EMPTY_FIELD = '  -  ';

function fieldValue(raw: string | undefined): string {
  if (raw === undefined || raw === EMPTY_FIELD) return '';
  return raw;
}

export function parseScanelfLine(line: string): ScanelfLine | null {
  const fields = line.split(';');
  if (fields.length < 5) return null;
  const obj = fieldValue(fields[1]);
  if (!obj) return null;
  return {
    arch: fieldValue(fields[0]).replace(/^EM_/, ''),
    obj,
    soname: fieldValue(fields[2]),
    rpath: fieldValue(fields[3]),
    needed: fieldValue(fields[4]),
  };
}

export function formatNeededLine(entry: ScanelfLine): string {
  return `${entry.obj} ${entry.needed}`;
}

export function formatNeededElf2Line(entry: ScanelfLine): string {
  return `${entry.arch};${entry.obj};${entry.soname};${entry.rpath};${entry.needed}`;
}

export interface ScanelfExtractorOptions {
  /** Install root the binary paths are relative to. */
  root?: string;
  command?: string;
}

export class ScanelfExtractor implements LinkageExtractor {
  private readonly root: string;
  private readonly command: string;

  constructor(
    private readonly probe: ContentTypeProbe,
    options: ScanelfExtractorOptions = {},
  ) {
    this.root = options.root ?? '/';
    this.command = options.command ?? 'scanelf';
  }

  async extract(workdir: string, binaryPaths: readonly string[]): Promise<void> {
    if (binaryPaths.length === 0) return;

    const absolutePaths = binaryPaths.map((installedPath) => resolveInstallPath(this.root, installedPath));
    const result = await execa(this.command, ['-yRBF', SCANELF_FORMAT, ...absolutePaths], { reject: false });
    if (result.failed || result.exitCode !== 0) {
      throw new ExtractionError(binaryPaths, result.stderr || `${this.command} exited with ${String(result.exitCode)}`);
    }

    const neededLines: string[] = [];
    const neededElf2Lines: string[] = [];
    for (const line of String(result.stdout).split('\n')) {
      const parsed = parseScanelfLine(line);
      if (!parsed) continue;
      const entry = { ...parsed, obj: toInstallPath(this.root, parsed.obj) };
      if (!entry.soname) {
        entry.soname = await this.inferSoname(parsed.obj);
      }
      neededLines.push(formatNeededLine(entry));
      neededElf2Lines.push(formatNeededElf2Line(entry));
    }

    if (neededLines.length === 0) return;

    const buildInfo = path.join(workdir, BUILD_INFO_DIR);
    await fs.mkdir(buildInfo, { recursive: true });
    await fs.writeFile(path.join(buildInfo, 'NEEDED'), `${neededLines.join('\n')}\n`);
    await fs.writeFile(path.join(buildInfo, 'NEEDED.ELF.2'), `${neededElf2Lines.join('\n')}\n`);
  }

  /**
   * Shared objects linked without -soname still get one: the file's
   * basename, which is what the dynamic linker will look up.
   */
  private async inferSoname(absolutePath: string): Promise<string> {
    try {
      const description = await this.probe.describe(absolutePath);
      return description.includes('SB shared object') ? path.basename(absolutePath) : '';
    } catch (error) {
      logDebug('Could not probe object for an implicit soname', { path: absolutePath, error: getErrorMessage(error) });
      return '';
    }
  }
}
