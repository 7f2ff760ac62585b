/**
 * @fileoverview Progress and report output for CLI operations
 *
 * The progress bar draws on stderr (cli-progress's default stream), leaving
 * stdout to the report tables.
 */

import cliProgress from 'cli-progress';

export interface ProgressBarHandle {
  update(current: number, task: string): void;
  stop(): void;
}

export interface ProgressBarOptions {
  total: number;
  format?: string;
  etaBuffer?: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarHandle {
  const { total, etaBuffer = 10 } = options;

  const format = options.format || '{bar} {percentage}% | {value}/{total} | {task} | ETA: {eta_formatted}';

  const bar = new cliProgress.SingleBar(
    {
      format,
      barCompleteChar: '=',
      barIncompleteChar: '-',
      hideCursor: true,
      clearOnComplete: true,
      stopOnComplete: true,
      etaBuffer,
    },
    cliProgress.Presets.shades_classic,
  );

  bar.start(total, 0, { task: 'Scanning...' });

  return {
    update(current: number, task: string): void {
      bar.update(current, { task });
    },

    stop(): void {
      bar.stop();
    },
  };
}

/**
 * Progress callback for a package scan: the bar is created on the first
 * report, once the total is known.
 */
export function createScanProgress(): {
  onProgress: (completed: number, total: number, cpf: string) => void;
  stop: () => void;
} {
  let bar: ProgressBarHandle | null = null;
  return {
    onProgress(completed, total, cpf) {
      bar ??= createProgressBar({ total });
      bar.update(completed, cpf);
    },
    stop() {
      bar?.stop();
      bar = null;
    },
  };
}

/**
 * Display a simple table in the terminal
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRowWidth = Math.max(...rows.map((row) => (row[i] || '').length));
    return Math.max(h.length, maxRowWidth);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  console.log(headerLine);
  console.log(separator);

  // Print rows
  for (const row of rows) {
    const line = row.map((cell, i) => (cell || '').padEnd(widths[i])).join(' | ');
    console.log(line);
  }
}

/**
 * Print a key-value list
 */
export function printKeyValue(items: Array<{ key: string; value: string | number | boolean | null }>): void {
  const maxKeyLength = Math.max(...items.map((item) => item.key.length));

  for (const item of items) {
    const value = item.value === null ? 'N/A' : String(item.value);
    console.log(`  ${item.key.padEnd(maxKeyLength)}: ${value}`);
  }
}
