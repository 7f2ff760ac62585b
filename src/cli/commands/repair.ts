import type { RunConfig } from '../../config/index.js';
import { FileCommandProbe, type ContentTypeProbe } from '../../probes/content_type.js';
import { ScanelfExtractor, type LinkageExtractor } from '../../probes/linkage_extractor.js';
import { runRecovery } from '../../repair/recovery.js';
import { printRepairReport, printScanReport, scanReportToJson } from '../report.js';
import { EXIT_FAILURE } from '../errors.js';
import { ambiguousPackagesEnvelope, printReport, withScanProgress } from './shared.js';

export interface RepairCommandOptions {
  config: RunConfig;
  probe?: ContentTypeProbe;
  extractor?: LinkageExtractor;
}

export async function repairCommand(options: RepairCommandOptions): Promise<number> {
  const { config } = options;
  const probe = options.probe ?? new FileCommandProbe();
  const extractor = options.extractor ?? new ScanelfExtractor(probe, { root: config.root });

  const result = await withScanProgress(config, (onProgress) =>
    runRecovery(
      { vdbRoot: config.vdb, outputRoot: config.output, root: config.root, deep: config.deep, onProgress },
      { probe, extractor },
    ),
  );

  const error = result.status === 'aborted' ? ambiguousPackagesEnvelope(result.scan) : null;
  printReport(
    config,
    {
      status: result.status,
      scan: scanReportToJson(result.scan),
      repair: result.status === 'completed' ? result.repair : null,
    },
    () => {
      printScanReport(result.scan);
      if (result.status === 'completed') printRepairReport(result.repair);
    },
    error,
  );
  return error ? EXIT_FAILURE : 0;
}
