import { scanDatabase } from '../../classifier/corruption_classifier.js';
import type { RunConfig } from '../../config/index.js';
import { FileCommandProbe, type ContentTypeProbe } from '../../probes/content_type.js';
import { printScanReport, scanReportToJson } from '../report.js';
import { EXIT_FAILURE } from '../errors.js';
import { ambiguousPackagesEnvelope, printReport, withScanProgress } from './shared.js';

export interface ScanCommandOptions {
  config: RunConfig;
  probe?: ContentTypeProbe;
}

/**
 * Classify the database and report; never writes. Resolves to the exit code:
 * EXIT_FAILURE when any package is ambiguous.
 */
export async function scanCommand(options: ScanCommandOptions): Promise<number> {
  const { config } = options;
  const probe = options.probe ?? new FileCommandProbe();

  const report = await withScanProgress(config, (onProgress) =>
    scanDatabase(config.vdb, { probe, deep: config.deep, root: config.root, onProgress }),
  );

  const error = ambiguousPackagesEnvelope(report);
  printReport(config, scanReportToJson(report), () => printScanReport(report), error);
  return error ? EXIT_FAILURE : 0;
}
