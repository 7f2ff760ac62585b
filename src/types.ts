/**
 * @fileoverview Core types for the VDB audit and recovery pipeline
 */

// ============================================================================
// DATABASE TYPES
// ============================================================================

/** The metadata records a correctly installed ELF package carries. */
export const METADATA_RECORDS = ['NEEDED', 'NEEDED.ELF.2', 'PROVIDES', 'REQUIRES'] as const;

export type MetadataRecordName = (typeof METADATA_RECORDS)[number];

/** One `category/PF` directory found under the database root. */
export interface PackageEntry {
  /** Absolute path of the package directory. */
  dir: string;
  /** `category/PF`, e.g. `net-misc/openssh-9.6_p1-r2`. */
  cpf: string;
  category: string;
  pf: string;
}

export type SkipReason = 'virtual' | 'account' | 'merging' | 'lockfile';

/** `type path [extra...]` line from CONTENTS. */
export interface InstalledFileRecord {
  readonly type: string;
  readonly path: string;
}

export interface RecordPresence {
  needed: boolean;
  neededElf2: boolean;
  provides: boolean;
  requires: boolean;
}

// ============================================================================
// BINARY TYPES
// ============================================================================

export type BinaryKind = 'shared-object' | 'executable';

// ============================================================================
// CLASSIFICATION TYPES
// ============================================================================

/** Inputs of the decision table. */
export interface CorruptionFacts {
  needed: boolean;
  provides: boolean;
  requires: boolean;
  sharedLibs: boolean;
  executables: boolean;
}

export type FineReason =
  | 'complete'
  | 'no-binaries'
  | 'executables-only';

export type BrokenReason =
  | 'shared-libs-missing-provides'
  | 'provides-without-needed'
  | 'all-records-missing';

export type Verdict =
  | { readonly kind: 'fine'; readonly reason: FineReason }
  | { readonly kind: 'broken'; readonly reason: BrokenReason }
  | { readonly kind: 'ambiguous'; readonly facts: Readonly<CorruptionFacts> };

export type VerdictKind = Verdict['kind'];

/** A package after the scan pass; never mutated afterwards. */
export interface ClassifiedPackage {
  readonly entry: PackageEntry;
  readonly records: Readonly<RecordPresence>;
  readonly installsSharedLib: boolean;
  readonly installsExecutable: boolean;
  /** Install paths (relative to the install root) that need a linkage re-scan. */
  readonly binaryPaths: readonly string[];
  /** False when the fast path decided the verdict without opening CONTENTS. */
  readonly manifestRead: boolean;
  readonly verdict: Verdict;
}

export interface SkippedEntry {
  entry: PackageEntry;
  reason: SkipReason;
}

export interface ScanReport {
  vdbRoot: string;
  deep: boolean;
  packages: ClassifiedPackage[];
  skipped: SkippedEntry[];
  broken: ClassifiedPackage[];
  ambiguous: ClassifiedPackage[];
}

// ============================================================================
// LINKAGE TYPES
// ============================================================================

/** One NEEDED.ELF.2 line. */
export interface LinkageRecord {
  readonly arch: string;
  readonly filename: string;
  /** Empty when the object advertises no soname (executables). */
  readonly soname: string;
  readonly runpaths: readonly string[];
  readonly needed: readonly string[];
  readonly multilibCategory: string | null;
}

/** category → sonames */
export type SonameMap = ReadonlyMap<string, ReadonlySet<string>>;

export interface DependencySets {
  provides: SonameMap;
  requires: SonameMap;
}

// ============================================================================
// REPAIR TYPES
// ============================================================================

export type RepairOutcome =
  | { status: 'repaired'; cpf: string; written: MetadataRecordName[]; skipped: MetadataRecordName[] }
  | { status: 'nothing-to-fix'; cpf: string; reason: 'no-linkage' | 'extractor-failed'; message?: string }
  | { status: 'failed'; cpf: string; code: string; message: string };

export interface RepairReport {
  stagingRoot: string;
  outcomes: RepairOutcome[];
}

export type RecoveryResult =
  | { status: 'aborted'; scan: ScanReport }
  | { status: 'completed'; scan: ScanReport; repair: RepairReport };
