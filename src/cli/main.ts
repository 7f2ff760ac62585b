/**
 * @fileoverview vdb-elf-recover CLI
 *
 * Commands:
 *   vdb-elf-recover repair   - Scan, then regenerate missing records into a staging tree
 *   vdb-elf-recover scan     - Scan only; list broken packages
 *   vdb-elf-recover help     - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { resolveRunConfig } from '../config/index.js';
import type { ContentTypeProbe } from '../probes/content_type.js';
import type { LinkageExtractor } from '../probes/linkage_extractor.js';
import { configureLogger } from '../telemetry/logger.js';
import { VERSION } from '../index.js';
import { showHelp } from './help.js';
import { repairCommand } from './commands/repair.js';
import { scanCommand } from './commands/scan.js';
import {
  EXIT_FAILURE,
  classifyError,
  createError,
  formatError,
  formatErrorJson,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'repair' | 'scan' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  repair: {
    description: 'Scan the database and regenerate missing ELF metadata into a staging tree',
    usage: 'vdb-elf-recover repair [--vdb <path>] [--output <path>] [--root <path>] [--deep]',
  },
  scan: {
    description: 'Scan the database and list broken packages',
    usage: 'vdb-elf-recover scan [--vdb <path>] [--root <path>] [--deep]',
  },
  help: {
    description: 'Show help information',
    usage: 'vdb-elf-recover help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/** Probe and extractor overrides, for tests. */
export interface CliDependencies {
  probe?: ContentTypeProbe;
  extractor?: LinkageExtractor;
}

/**
 * Output a structured error: JSON on stdout alongside the JSON report, or a
 * human-readable message with a suggestion on stderr.
 */
function outputError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.log(formatErrorJson(envelope));
  } else {
    console.error(formatError(envelope));
  }
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const jsonMode = args.includes('--json');

  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        vdb: { type: 'string' },
        output: { type: 'string' },
        root: { type: 'string' },
        deep: { type: 'boolean' },
        verbose: { type: 'boolean' },
        json: { type: 'boolean' },
      },
      allowPositionals: true,
      strict: true,
    });

    if (values.version) {
      console.log(`vdb-elf-recover ${VERSION}`);
      return 0;
    }

    const command = positionals[0];
    if (values.help || !command || command === 'help') {
      showHelp(command === 'help' ? positionals[1] : command);
      return 0;
    }

    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
        available: Object.keys(COMMANDS),
      });
    }

    const config = resolveRunConfig({
      vdb: values.vdb,
      output: values.output,
      root: values.root,
      deep: values.deep,
      verbose: values.verbose,
      json: values.json,
    });
    configureLogger({ verbose: config.verbose });

    switch (command) {
      case 'repair':
        return await repairCommand({ config, probe: deps.probe, extractor: deps.extractor });
      case 'scan':
        return await scanCommand({ config, probe: deps.probe });
      case 'help':
        showHelp();
        return 0;
    }
  } catch (error) {
    outputError(classifyError(error), jsonMode);
    return EXIT_FAILURE;
  }
}
