/**
 * @fileoverview Binary classifier
 *
 * Decides whether an installed file is an ELF object worth re-scanning,
 * using the human-readable description from `file(1)`. The probe itself is an
 * injected capability so classification can be tested without spawning
 * processes.
 */

import { execa } from 'execa';
import { ProbeError } from '../core/errors.js';
import type { BinaryKind } from '../types.js';

export interface ContentTypeProbe {
  /** Human-readable content description of the file at an absolute path. */
  describe(absolutePath: string): Promise<string>;
}

/**
 * `file -b <path>`.
 */
export class FileCommandProbe implements ContentTypeProbe {
  constructor(private readonly command = 'file') {}

  async describe(absolutePath: string): Promise<string> {
    // reject: false also covers spawn failures (missing binary), which come
    // back as a failed result instead of a rejection.
    const result = await execa(this.command, ['-b', absolutePath], { reject: false });
    if (result.failed || result.exitCode !== 0) {
      throw new ProbeError(this.command, absolutePath, result.stderr || `exit code ${String(result.exitCode)}`);
    }
    return String(result.stdout).trim();
  }
}

// ============================================================================
// DESCRIPTION MATCHING
// ============================================================================

const SONAME_PATTERN = /^.*\.so($|\..*)/;
const FALSE_POSITIVE_PATTERN = /^\/usr\/(share|include)\//;

/**
 * Interpret a probe description. Only dynamically linked ELF objects are of
 * interest: static binaries carry no linkage metadata to regenerate.
 */
export function classifyDescription(description: string): BinaryKind | null {
  if (!description.includes('ELF') || !description.includes('dynamically linked')) {
    return null;
  }
  if (description.includes('shared object')) return 'shared-object';
  if (description.includes('executable')) return 'executable';
  return null;
}

/** `libfoo.so`, `libfoo.so.1`, `libfoo.so.1.2.3` */
export function looksLikeSoname(installedPath: string): boolean {
  return SONAME_PATTERN.test(installedPath);
}

export function looksLikeBinaryPath(installedPath: string): boolean {
  return installedPath.includes('bin') || installedPath.includes('libexec');
}

/** Man pages, headers and other data that happen to match the name heuristics. */
export function isFalsePositivePath(installedPath: string): boolean {
  return FALSE_POSITIVE_PATTERN.test(installedPath);
}

/**
 * Whether an `obj` path is worth a probe call. Deep mode probes everything;
 * otherwise only soname-like or bin-like paths, which bounds the number of
 * `file` invocations on large trees.
 */
export function isProbeCandidate(installedPath: string, deep: boolean): boolean {
  if (!deep && !looksLikeSoname(installedPath) && !looksLikeBinaryPath(installedPath)) {
    return false;
  }
  return !isFalsePositivePath(installedPath);
}
