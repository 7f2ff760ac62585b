/**
 * @fileoverview Two-phase recovery run
 *
 * Phase 1 classifies the whole database. Phase 2 (staging writes) only runs
 * when phase 1 found no ambiguous package, so an operator always sees the
 * complete picture before anything is written.
 */

import { scanDatabase } from '../classifier/corruption_classifier.js';
import type { ContentTypeProbe } from '../probes/content_type.js';
import type { LinkageExtractor } from '../probes/linkage_extractor.js';
import { StagingWriter } from '../staging/staging_writer.js';
import { logError, logInfo } from '../telemetry/logger.js';
import type { RecoveryResult } from '../types.js';
import { repairPackages } from './orchestrator.js';

export interface RecoveryOptions {
  vdbRoot: string;
  /** Staging root; a temporary directory when omitted. */
  outputRoot?: string;
  root?: string;
  deep?: boolean;
  onProgress?: (completed: number, total: number, cpf: string) => void;
}

export interface RecoveryDependencies {
  probe: ContentTypeProbe;
  extractor: LinkageExtractor;
}

export async function runRecovery(options: RecoveryOptions, deps: RecoveryDependencies): Promise<RecoveryResult> {
  const scan = await scanDatabase(options.vdbRoot, {
    probe: deps.probe,
    deep: options.deep,
    root: options.root,
    onProgress: options.onProgress,
  });

  if (scan.ambiguous.length > 0) {
    logError(`${scan.ambiguous.length} package(s) need operator attention; not writing anything`, {
      packages: scan.ambiguous.map((pkg) => pkg.entry.cpf),
    });
    return { status: 'aborted', scan };
  }

  const writer = await StagingWriter.create({ databaseRoot: options.vdbRoot, root: options.outputRoot });
  logInfo(`Writing to output directory: ${writer.root}`);

  const repair = await repairPackages(scan.broken, { extractor: deps.extractor, writer });
  logInfo(`Written to output directory: ${writer.root}`);

  return { status: 'completed', scan, repair };
}
