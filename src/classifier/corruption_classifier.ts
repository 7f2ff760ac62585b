/**
 * @fileoverview Corruption classifier
 *
 * Phase one of a recovery run: walk every package directory, work out which
 * installed files are dynamically linked ELF objects, and decide from the
 * metadata records present whether the package is fine, broken or needs an
 * operator to look at it. Nothing is written here.
 */

import { readManifest, objectRecords } from '../vdb/manifest.js';
import { listPackageEntries, readRecordPresence, skipReason } from '../vdb/database.js';
import { resolveInstallPath } from '../vdb/install_root.js';
import { classifyDescription, isProbeCandidate, type ContentTypeProbe } from '../probes/content_type.js';
import { decide } from './decision.js';
import { logDebug, logError, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type {
  ClassifiedPackage,
  CorruptionFacts,
  PackageEntry,
  RecordPresence,
  ScanReport,
  SkippedEntry,
} from '../types.js';

export interface ClassifierOptions {
  probe: ContentTypeProbe;
  /** Probe every `obj` entry instead of only soname-like and bin-like paths. */
  deep?: boolean;
  /** Install root the CONTENTS paths are relative to. */
  root?: string;
}

export interface ScanOptions extends ClassifierOptions {
  onProgress?: (completed: number, total: number, cpf: string) => void;
}

interface BinaryScan {
  installsSharedLib: boolean;
  installsExecutable: boolean;
  binaryPaths: string[];
}

async function scanBinaries(entry: PackageEntry, options: ClassifierOptions): Promise<BinaryScan> {
  const scan: BinaryScan = { installsSharedLib: false, installsExecutable: false, binaryPaths: [] };
  const root = options.root ?? '/';
  const deep = options.deep ?? false;

  for (const record of objectRecords(await readManifest(entry))) {
    if (!isProbeCandidate(record.path, deep)) continue;

    let description: string;
    try {
      description = await options.probe.describe(resolveInstallPath(root, record.path));
    } catch (error) {
      logWarning(`Skipping ${entry.cpf}'s ${record.path}: content probe failed`, { error: getErrorMessage(error) });
      continue;
    }

    const kind = classifyDescription(description);
    if (!kind) {
      logDebug(`Skipping ${entry.cpf}'s ${record.path}: not a dynamically linked ELF object`, { description });
      continue;
    }

    if (kind === 'shared-object') scan.installsSharedLib = true;
    else scan.installsExecutable = true;
    scan.binaryPaths.push(record.path);
  }

  return scan;
}

function toFacts(records: RecordPresence, scan: BinaryScan): CorruptionFacts {
  return {
    needed: records.needed,
    provides: records.provides,
    requires: records.requires,
    sharedLibs: scan.installsSharedLib,
    executables: scan.installsExecutable,
  };
}

/**
 * Classify one real package directory. Raises ManifestMissingError when the
 * manifest has to be read and is absent.
 */
export async function classifyPackage(entry: PackageEntry, options: ClassifierOptions): Promise<ClassifiedPackage> {
  const records = await readRecordPresence(entry);

  // Only cheap success path: both relations present means the package went
  // through a correct merge; CONTENTS is not opened.
  if (records.needed && records.provides) {
    logDebug(`Skipping ${entry.cpf}: NEEDED and PROVIDES present`);
    return {
      entry,
      records,
      installsSharedLib: false,
      installsExecutable: false,
      binaryPaths: [],
      manifestRead: false,
      verdict: { kind: 'fine', reason: 'complete' },
    };
  }

  const scan = await scanBinaries(entry, options);
  const verdict = decide(toFacts(records, scan));

  if (verdict.kind === 'broken') {
    logWarning(`${entry.cpf} installs dynamic ELF objects with incomplete metadata`, { reason: verdict.reason });
  } else if (verdict.kind === 'ambiguous') {
    logError(`${entry.cpf} has an unexpected metadata combination; not repairing automatically`, {
      ...verdict.facts,
      neededElf2: records.neededElf2,
      binaryPaths: scan.binaryPaths,
    });
  }

  return {
    entry,
    records,
    installsSharedLib: scan.installsSharedLib,
    installsExecutable: scan.installsExecutable,
    binaryPaths: scan.binaryPaths,
    manifestRead: true,
    verdict,
  };
}

/**
 * Classify every package under the database root, in `category/PF` order.
 * Ambiguous packages are collected, not thrown, so the report covers the
 * whole database; deciding to abort is the caller's job.
 */
export async function scanDatabase(vdbRoot: string, options: ScanOptions): Promise<ScanReport> {
  const entries = await listPackageEntries(vdbRoot);
  const packages: ClassifiedPackage[] = [];
  const skipped: SkippedEntry[] = [];

  for (const [index, entry] of entries.entries()) {
    const reason = skipReason(entry);
    if (reason) {
      skipped.push({ entry, reason });
    } else {
      packages.push(await classifyPackage(entry, options));
    }
    options.onProgress?.(index + 1, entries.length, entry.cpf);
  }

  return {
    vdbRoot,
    deep: options.deep ?? false,
    packages,
    skipped,
    broken: packages.filter((pkg) => pkg.verdict.kind === 'broken'),
    ambiguous: packages.filter((pkg) => pkg.verdict.kind === 'ambiguous'),
  };
}
