/**
 * @fileoverview Recovery error hierarchy
 *
 * Every failure the scan or repair pass can raise is a typed error with a
 * stable code, so the CLI can map it to an exit code and the orchestrator can
 * tell per-package failures from run-level aborts.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  fatal: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class RecoveryError extends Error {
  abstract readonly code: string;
  /** Fatal errors abort the whole run; the rest are scoped to one package or file. */
  abstract readonly fatal: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      fatal: this.fatal,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// DATABASE ERRORS
// ============================================================================

export class ManifestMissingError extends RecoveryError {
  readonly code = 'MANIFEST_MISSING';
  readonly fatal = true;

  constructor(
    readonly cpf: string,
    readonly manifestPath: string,
  ) {
    super(`${cpf} has no CONTENTS file`);
    this.name = 'ManifestMissingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { cpf: this.cpf, manifestPath: this.manifestPath },
    };
  }
}

// ============================================================================
// PROBE ERRORS
// ============================================================================

export class ProbeError extends RecoveryError {
  readonly code = 'PROBE_FAILED';
  readonly fatal = false;

  constructor(
    readonly command: string,
    readonly path: string,
    message: string,
  ) {
    super(`${command} failed for ${path}: ${message}`);
    this.name = 'ProbeError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { command: this.command, path: this.path },
    };
  }
}

export class ExtractionError extends RecoveryError {
  readonly code = 'EXTRACTION_FAILED';
  readonly fatal = false;

  constructor(
    readonly paths: readonly string[],
    message: string,
  ) {
    super(`Linkage extraction failed: ${message}`);
    this.name = 'ExtractionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { paths: [...this.paths] },
    };
  }
}

// ============================================================================
// SYNTHESIS ERRORS
// ============================================================================

export class InvalidNeededEntryError extends RecoveryError {
  readonly code = 'INVALID_NEEDED_ENTRY';
  readonly fatal = false;

  constructor(
    readonly line: string,
    readonly fieldCount: number,
  ) {
    super(`NEEDED.ELF.2 line has ${fieldCount} fields, expected 5 or 6: ${line}`);
    this.name = 'InvalidNeededEntryError';
  }
}

export class SynthesisInvariantError extends RecoveryError {
  readonly code = 'SYNTHESIS_INVARIANT';
  readonly fatal = false;

  constructor(readonly cpf: string) {
    super(`${cpf} installed dynamic libraries but no PROVIDES was generated`);
    this.name = 'SynthesisInvariantError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { cpf: this.cpf },
    };
  }
}

// ============================================================================
// STAGING ERRORS
// ============================================================================

export class StagingPathError extends RecoveryError {
  readonly code = 'STAGING_PATH';
  readonly fatal = true;

  constructor(
    readonly requestedPath: string,
    readonly stagingRoot: string,
    message = `Refusing to write outside the staging root ${stagingRoot}: ${requestedPath}`,
  ) {
    super(message);
    this.name = 'StagingPathError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { requestedPath: this.requestedPath, stagingRoot: this.stagingRoot },
    };
  }
}

export class EmptyRecordError extends RecoveryError {
  readonly code = 'EMPTY_RECORD';
  readonly fatal = false;

  constructor(
    readonly cpf: string,
    readonly recordName: string,
  ) {
    super(`Refusing to write empty ${recordName} for ${cpf}`);
    this.name = 'EmptyRecordError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class InvalidConfigError extends RecoveryError {
  readonly code = 'INVALID_CONFIG';
  readonly fatal = true;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: [...this.issues] },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isRecoveryError(error: unknown): error is RecoveryError {
  return error instanceof RecoveryError;
}

export function isFatalError(error: unknown): boolean {
  return isRecoveryError(error) && error.fatal;
}
