/**
 * @fileoverview vdb-elf-recover: audit and repair ELF metadata in the
 * installed-package database
 *
 * Packages that install shared objects or dynamically linked executables must
 * carry NEEDED, NEEDED.ELF.2, PROVIDES and REQUIRES records. This library
 * finds the packages that do not, and regenerates the missing records from
 * the binaries on disk into a staging tree.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { runRecovery, FileCommandProbe, ScanelfExtractor } from 'vdb-elf-recover';
 *
 * const probe = new FileCommandProbe();
 * const result = await runRecovery(
 *   { vdbRoot: '/var/db/pkg', outputRoot: '/root/vdb-fixed' },
 *   { probe, extractor: new ScanelfExtractor(probe) },
 * );
 * if (result.status === 'aborted') {
 *   // result.scan.ambiguous lists the packages needing a human
 * }
 * ```
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

export * from './types.js';

// Database
export { parseManifest, readManifest, objectRecords, MANIFEST_FILENAME } from './vdb/manifest.js';
export {
  DEFAULT_VDB_ROOT,
  listPackageEntries,
  skipReason,
  hasRecord,
  readRecordPresence,
  toEmergeAtom,
} from './vdb/database.js';
export { resolveInstallPath, toInstallPath } from './vdb/install_root.js';

// Probes
export {
  FileCommandProbe,
  classifyDescription,
  looksLikeSoname,
  looksLikeBinaryPath,
  isFalsePositivePath,
  isProbeCandidate,
  type ContentTypeProbe,
} from './probes/content_type.js';
export {
  ScanelfExtractor,
  BUILD_INFO_DIR,
  parseScanelfLine,
  type LinkageExtractor,
  type ScanelfExtractorOptions,
} from './probes/linkage_extractor.js';

// Classification
export { decide } from './classifier/decision.js';
export {
  classifyPackage,
  scanDatabase,
  type ClassifierOptions,
  type ScanOptions,
} from './classifier/corruption_classifier.js';

// Synthesis
export { parseNeededEntry, parseNeededElf2 } from './soname/needed_entry.js';
export {
  APPROX_MULTILIB_CATEGORIES,
  ELF_ARCHITECTURES,
  approximateMultilibCategory,
  type ElfArchitecture,
} from './soname/multilib.js';
export {
  synthesize,
  formatSonameMap,
  assertProvidesInvariant,
  withMultilibCategory,
  type CategorizedLinkageRecord,
} from './soname/synthesizer.js';

// Staging and repair
export { StagingWriter, type StagingWriterOptions } from './staging/staging_writer.js';
export { repairPackage, repairPackages, type RepairDependencies } from './repair/orchestrator.js';
export {
  runRecovery,
  type RecoveryOptions,
  type RecoveryDependencies,
} from './repair/recovery.js';

// Configuration and errors
export { resolveRunConfig, RunConfigSchema, type RunConfig, type RunConfigInput } from './config/index.js';
export * from './core/errors.js';
export { configureLogger, logInfo, logWarning, logError, logDebug } from './telemetry/logger.js';
