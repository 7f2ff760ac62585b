import type { RunConfig } from '../../config/index.js';
import { classifyError, createError, formatError, type ErrorEnvelope } from '../errors.js';
import { createScanProgress } from '../progress.js';
import type { ScanReport } from '../../types.js';

export type ProgressCallback = (completed: number, total: number, cpf: string) => void;

/**
 * Run a scan with a progress bar when a human is watching: a TTY on stderr,
 * no --json, no --verbose (log lines would tear the bar).
 */
export async function withScanProgress<T>(config: RunConfig, run: (onProgress?: ProgressCallback) => Promise<T>): Promise<T> {
  if (config.json || config.verbose || !process.stderr.isTTY) {
    return run();
  }
  const progress = createScanProgress();
  try {
    return await run(progress.onProgress);
  } finally {
    progress.stop();
  }
}

export function ambiguousPackagesError(report: ScanReport): Error {
  const packages = report.ambiguous.map((pkg) => pkg.entry.cpf);
  return createError(
    'AMBIGUOUS_PACKAGES',
    `${packages.length} package(s) have an unexpected metadata combination: ${packages.join(', ')}`,
    { packages },
  );
}

/**
 * The AMBIGUOUS_PACKAGES envelope for a scan that found ambiguous packages,
 * or null when there were none.
 */
export function ambiguousPackagesEnvelope(report: ScanReport): ErrorEnvelope | null {
  return report.ambiguous.length > 0 ? classifyError(ambiguousPackagesError(report)) : null;
}

/**
 * Print a command's report followed by its error, if any. In JSON mode both
 * go into one document on stdout; otherwise the error goes to stderr after
 * the human-readable report.
 */
export function printReport(
  config: RunConfig,
  document: Record<string, unknown>,
  printText: () => void,
  error: ErrorEnvelope | null,
): void {
  if (config.json) {
    console.log(JSON.stringify(error ? { ...document, error } : document, null, 2));
    return;
  }
  printText();
  if (error) console.error(formatError(error));
}
