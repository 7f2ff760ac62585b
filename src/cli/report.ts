/**
 * @fileoverview Scan and repair report rendering
 */

import { toEmergeAtom } from '../vdb/database.js';
import type { ClassifiedPackage, RepairReport, ScanReport } from '../types.js';
import { printKeyValue, printTable } from './progress.js';

export interface ScanSummary {
  vdbRoot: string;
  deep: boolean;
  packages: number;
  skipped: number;
  fine: number;
  broken: number;
  ambiguous: number;
}

export function summarizeScan(report: ScanReport): ScanSummary {
  return {
    vdbRoot: report.vdbRoot,
    deep: report.deep,
    packages: report.packages.length,
    skipped: report.skipped.length,
    fine: report.packages.filter((pkg) => pkg.verdict.kind === 'fine').length,
    broken: report.broken.length,
    ambiguous: report.ambiguous.length,
  };
}

function packageJson(pkg: ClassifiedPackage): Record<string, unknown> {
  return {
    cpf: pkg.entry.cpf,
    verdict: pkg.verdict,
    installsSharedLib: pkg.installsSharedLib,
    installsExecutable: pkg.installsExecutable,
    binaryPaths: pkg.binaryPaths,
    records: pkg.records,
  };
}

export function scanReportToJson(report: ScanReport): Record<string, unknown> {
  return {
    summary: summarizeScan(report),
    broken: report.broken.map(packageJson),
    ambiguous: report.ambiguous.map(packageJson),
    skipped: report.skipped.map((skip) => ({ cpf: skip.entry.cpf, reason: skip.reason })),
  };
}

export function printScanReport(report: ScanReport): void {
  const summary = summarizeScan(report);
  console.log('VDB Scan');
  console.log('========\n');
  printKeyValue([
    { key: 'Database', value: summary.vdbRoot },
    { key: 'Deep scan', value: summary.deep },
    { key: 'Packages', value: summary.packages },
    { key: 'Skipped', value: summary.skipped },
    { key: 'Fine', value: summary.fine },
    { key: 'Broken', value: summary.broken },
    { key: 'Ambiguous', value: summary.ambiguous },
  ]);
  console.log();

  if (report.ambiguous.length > 0) {
    console.log('Packages needing attention:');
    printTable(
      ['Package', 'NEEDED', 'PROVIDES', 'REQUIRES', 'Shared libs', 'Executables'],
      report.ambiguous.map((pkg) => [
        pkg.entry.cpf,
        String(pkg.records.needed),
        String(pkg.records.provides),
        String(pkg.records.requires),
        String(pkg.installsSharedLib),
        String(pkg.installsExecutable),
      ]),
    );
    console.log();
  }

  if (report.broken.length > 0) {
    console.log('Broken packages:');
    for (const pkg of report.broken) {
      console.log(toEmergeAtom(pkg.entry.cpf));
    }
  }
}

export function printRepairReport(report: RepairReport): void {
  console.log('\nVDB Repair');
  console.log('==========\n');
  printKeyValue([{ key: 'Output directory', value: report.stagingRoot }]);
  console.log();
  if (report.outcomes.length === 0) {
    console.log('No broken packages; nothing written.');
    return;
  }
  printTable(
    ['Package', 'Status', 'Detail'],
    report.outcomes.map((outcome) => {
      switch (outcome.status) {
        case 'repaired':
          return [outcome.cpf, outcome.status, outcome.written.join(', ')];
        case 'nothing-to-fix':
          return [outcome.cpf, outcome.status, outcome.reason];
        case 'failed':
          return [outcome.cpf, outcome.status, outcome.message];
      }
    }),
  );
}
