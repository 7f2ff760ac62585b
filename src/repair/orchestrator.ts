/**
 * @fileoverview Repair orchestrator
 *
 * Phase two of a recovery run, per broken package: re-extract linkage facts
 * from the package's binaries, synthesize PROVIDES/REQUIRES from them, and
 * write all four records into the staging tree.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  EmptyRecordError,
  ExtractionError,
  InvalidNeededEntryError,
  SynthesisInvariantError,
} from '../core/errors.js';
import { BUILD_INFO_DIR, type LinkageExtractor } from '../probes/linkage_extractor.js';
import { parseNeededElf2 } from '../soname/needed_entry.js';
import { assertProvidesInvariant, formatSonameMap, synthesize } from '../soname/synthesizer.js';
import type { StagingWriter } from '../staging/staging_writer.js';
import { logDebug, logError, logInfo, logWarning } from '../telemetry/logger.js';
import { hasErrorCode } from '../utils/errors.js';
import {
  METADATA_RECORDS,
  type ClassifiedPackage,
  type MetadataRecordName,
  type RepairOutcome,
  type RepairReport,
} from '../types.js';

export interface RepairDependencies {
  extractor: LinkageExtractor;
  writer: StagingWriter;
}

interface RawLinkage {
  needed: string;
  neededElf2: string;
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

async function readBuildInfo(workdir: string): Promise<RawLinkage | null> {
  const buildInfo = path.join(workdir, BUILD_INFO_DIR);
  const needed = await readOptional(path.join(buildInfo, 'NEEDED'));
  if (needed === null) return null;
  const neededElf2 = (await readOptional(path.join(buildInfo, 'NEEDED.ELF.2'))) ?? '';
  return { needed, neededElf2 };
}

async function regenerate(pkg: ClassifiedPackage, deps: RepairDependencies, workdir: string): Promise<RepairOutcome> {
  const cpf = pkg.entry.cpf;

  try {
    await deps.extractor.extract(workdir, pkg.binaryPaths);
  } catch (error) {
    if (error instanceof ExtractionError) {
      logWarning(`Skipping ${cpf}: ${error.message}`);
      return { status: 'nothing-to-fix', cpf, reason: 'extractor-failed', message: error.message };
    }
    throw error;
  }

  const raw = await readBuildInfo(workdir);
  if (!raw) {
    // Static or stripped objects give scanelf nothing to report.
    logInfo(`Nothing to fix for ${cpf}, blank NEEDED`);
    return { status: 'nothing-to-fix', cpf, reason: 'no-linkage' };
  }

  const sets = synthesize(parseNeededElf2(raw.neededElf2));
  assertProvidesInvariant(sets, pkg.installsSharedLib, cpf);

  const contents: Record<MetadataRecordName, string> = {
    NEEDED: raw.needed,
    'NEEDED.ELF.2': raw.neededElf2,
    PROVIDES: formatSonameMap(sets.provides),
    REQUIRES: formatSonameMap(sets.requires),
  };

  const written: MetadataRecordName[] = [];
  const skipped: MetadataRecordName[] = [];
  for (const record of METADATA_RECORDS) {
    const content = contents[record];
    // Past the invariant check, an empty PROVIDES means executables only.
    if (record === 'PROVIDES' && content.length === 0) {
      skipped.push(record);
      continue;
    }
    logDebug(`${record} for ${cpf}`, { content });
    try {
      await deps.writer.write(pkg.entry.dir, record, content);
      written.push(record);
    } catch (error) {
      if (error instanceof EmptyRecordError) {
        logInfo(`${error.message} (likely harmless, skipping)`);
        skipped.push(record);
        continue;
      }
      throw error;
    }
  }

  logInfo(`Generated fixed VDB files for ${cpf}`, { written });
  return { status: 'repaired', cpf, written, skipped };
}

/**
 * Regenerate one broken package's records. Per-package failures come back as
 * a `failed` outcome; staging-path violations and I/O errors propagate.
 */
export async function repairPackage(pkg: ClassifiedPackage, deps: RepairDependencies): Promise<RepairOutcome> {
  const cpf = pkg.entry.cpf;
  logInfo(`Fixing VDB for ${cpf}`);

  const workdir = await fs.mkdtemp(path.join(os.tmpdir(), 'vdb-elf-recover-scan-'));
  try {
    return await regenerate(pkg, deps, workdir);
  } catch (error) {
    if (error instanceof SynthesisInvariantError || error instanceof InvalidNeededEntryError) {
      logError(error.message, { cpf, code: error.code });
      return { status: 'failed', cpf, code: error.code, message: error.message };
    }
    throw error;
  } finally {
    await fs.rm(workdir, { recursive: true, force: true });
  }
}

export async function repairPackages(
  packages: readonly ClassifiedPackage[],
  deps: RepairDependencies,
): Promise<RepairReport> {
  const outcomes: RepairOutcome[] = [];
  for (const pkg of packages) {
    outcomes.push(await repairPackage(pkg, deps));
  }

  const failed = outcomes.filter((outcome) => outcome.status === 'failed');
  if (failed.length > 0) {
    logError(`${failed.length} package(s) could not be repaired`, { packages: failed.map((outcome) => outcome.cpf) });
  }

  return { stagingRoot: deps.writer.root, outcomes };
}
