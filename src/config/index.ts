/**
 * @fileoverview Run configuration
 *
 * Merges command-line flags, environment overrides and defaults into one
 * validated RunConfig. Flags win over the environment.
 *
 * Environment:
 * - `VDB_ELF_RECOVER_VDB`: database root (default `/var/db/pkg`)
 * - `VDB_ELF_RECOVER_ROOT`: install root the database describes (default `/`)
 * - `VDB_ELF_RECOVER_OUTPUT`: staging root (default: a fresh temp directory)
 */

import { z } from 'zod';
import { InvalidConfigError } from '../core/errors.js';
import { DEFAULT_VDB_ROOT } from '../vdb/database.js';

export const DEFAULT_INSTALL_ROOT = '/';

export const RunConfigSchema = z.object({
  vdb: z.string().min(1).describe('Path to the installed-package database'),
  output: z.string().min(1).optional().describe('Staging root for regenerated records'),
  root: z.string().min(1).describe('Install root the database describes'),
  deep: z.boolean().describe('Probe every installed object, not only soname-like and bin-like paths'),
  verbose: z.boolean().describe('Log per-file decisions and record contents'),
  json: z.boolean().describe('Print the report and errors as JSON'),
}).strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

export interface RunConfigInput {
  vdb?: string;
  output?: string;
  root?: string;
  deep?: boolean;
  verbose?: boolean;
  json?: boolean;
}

export function resolveRunConfig(input: RunConfigInput, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const parsed = RunConfigSchema.safeParse({
    vdb: input.vdb ?? env.VDB_ELF_RECOVER_VDB ?? DEFAULT_VDB_ROOT,
    output: input.output ?? env.VDB_ELF_RECOVER_OUTPUT,
    root: input.root ?? env.VDB_ELF_RECOVER_ROOT ?? DEFAULT_INSTALL_ROOT,
    deep: input.deep ?? false,
    verbose: input.verbose ?? false,
    json: input.json ?? false,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidConfigError(issues);
  }
  return parsed.data;
}
