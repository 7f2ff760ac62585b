/**
 * @fileoverview Test fixtures: on-disk databases and in-process probe fakes
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProbeError } from '../core/errors.js';
import type { ContentTypeProbe } from '../probes/content_type.js';
import {
  BUILD_INFO_DIR,
  formatNeededElf2Line,
  formatNeededLine,
  type LinkageExtractor,
  type ScanelfLine,
} from '../probes/linkage_extractor.js';
import type { MetadataRecordName } from '../types.js';

export const ELF_EXECUTABLE =
  'ELF 64-bit LSB pie executable, x86-64, version 1 (SYSV), dynamically linked, interpreter /lib64/ld-linux-x86-64.so.2, stripped';
export const ELF_SHARED_OBJECT =
  'ELF 64-bit LSB shared object, x86-64, version 1 (SYSV), dynamically linked, stripped';
export const ELF_STATIC_EXECUTABLE = 'ELF 64-bit LSB executable, x86-64, version 1 (SYSV), statically linked, stripped';
export const TEXT_FILE = 'ASCII text';

export function createTempDir(prefix = 'vdb-elf-recover-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface FixturePackage {
  cpf: string;
  /** CONTENTS lines; omit to leave CONTENTS out entirely. */
  contents?: string[];
  records?: Partial<Record<MetadataRecordName, string>>;
}

/**
 * Build a database tree under `vdbRoot` and return the package directories.
 */
export function writeVdb(vdbRoot: string, packages: FixturePackage[]): string[] {
  return packages.map((pkg) => {
    const dir = path.join(vdbRoot, pkg.cpf);
    fs.mkdirSync(dir, { recursive: true });
    if (pkg.contents) {
      fs.writeFileSync(path.join(dir, 'CONTENTS'), `${pkg.contents.join('\n')}\n`);
    }
    for (const [name, content] of Object.entries(pkg.records ?? {})) {
      fs.writeFileSync(path.join(dir, name), content ?? '');
    }
    return dir;
  });
}

export function obj(installedPath: string): string {
  return `obj ${installedPath} d41d8cd98f00b204e9800998ecf8427e 1700000000`;
}

/**
 * Content probe answering from a fixed table; unknown paths fail like a
 * missing file would.
 */
export class FakeProbe implements ContentTypeProbe {
  readonly calls: string[] = [];

  constructor(private readonly descriptions: Record<string, string>) {}

  async describe(absolutePath: string): Promise<string> {
    this.calls.push(absolutePath);
    const description = this.descriptions[absolutePath];
    if (description === undefined) {
      throw new ProbeError('file', absolutePath, 'No such file or directory');
    }
    return description;
  }
}

/**
 * Linkage extractor writing build-info records from a fixed table keyed by
 * install path, in the same layout as the scanelf-backed extractor.
 */
export class FakeExtractor implements LinkageExtractor {
  readonly calls: Array<readonly string[]> = [];

  constructor(private readonly objects: Record<string, Omit<ScanelfLine, 'obj'>>) {}

  async extract(workdir: string, binaryPaths: readonly string[]): Promise<void> {
    this.calls.push([...binaryPaths]);
    const lines = binaryPaths.flatMap((binaryPath) => {
      const facts = this.objects[binaryPath];
      return facts ? [{ ...facts, obj: binaryPath }] : [];
    });
    if (lines.length === 0) return;
    const buildInfo = path.join(workdir, BUILD_INFO_DIR);
    fs.mkdirSync(buildInfo, { recursive: true });
    fs.writeFileSync(path.join(buildInfo, 'NEEDED'), lines.map((line) => `${formatNeededLine(line)}\n`).join(''));
    fs.writeFileSync(path.join(buildInfo, 'NEEDED.ELF.2'), lines.map((line) => `${formatNeededElf2Line(line)}\n`).join(''));
  }
}
