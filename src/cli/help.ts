/**
 * @fileoverview Help text for vdb-elf-recover CLI commands
 */

const HELP_TEXT = {
  main: `
vdb-elf-recover - Find and regenerate missing ELF metadata in the installed-package database

USAGE:
    vdb-elf-recover <command> [options]

COMMANDS:
    repair              Classify every package, then regenerate NEEDED, NEEDED.ELF.2,
                        PROVIDES and REQUIRES for broken ones into a staging tree
    scan                Classify every package and list the broken ones; writes nothing
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --vdb <path>        Installed-package database (default: /var/db/pkg)
    --root <path>       Install root the database describes (default: /)
    --deep              Probe every installed file, not only .so-like and bin/libexec paths
    --verbose           Log per-file decisions and the records being written
    --json              Print the report and errors as JSON

ENVIRONMENT:
    VDB_ELF_RECOVER_VDB, VDB_ELF_RECOVER_ROOT, VDB_ELF_RECOVER_OUTPUT
    override the defaults of --vdb, --root and --output.

EXIT CODES:
    0   Scan (and repair) finished, including when nothing is broken
    1   A package has no CONTENTS, a package could not be classified,
        or the arguments were invalid

The live database is never modified.
`,

  repair: `
vdb-elf-recover repair - Regenerate missing ELF metadata into a staging tree

USAGE:
    vdb-elf-recover repair [--vdb <path>] [--output <path>] [--root <path>] [--deep] [--verbose] [--json]

OPTIONS:
    --output <path>     Staging root for the regenerated records
                        (default: a fresh temporary directory)

DESCRIPTION:
    Runs in two phases. Phase one classifies every package as fine, broken or
    ambiguous. If any package is ambiguous the run stops there and nothing is
    written. Otherwise phase two re-scans each broken package's binaries with
    scanelf and writes the four records under <output>/<category>/<PF>/.

    Review the staging tree, then copy the records into the database.

EXAMPLES:
    vdb-elf-recover repair
    vdb-elf-recover repair --output /root/vdb-fixed --verbose
`,

  scan: `
vdb-elf-recover scan - List packages with missing ELF metadata

USAGE:
    vdb-elf-recover scan [--vdb <path>] [--root <path>] [--deep] [--verbose] [--json]

DESCRIPTION:
    Classifies every package and prints the broken ones as =category/PF atoms,
    ready to hand to the package manager for a rebuild. Exits with 1 when a
    package could not be classified.

EXAMPLES:
    vdb-elf-recover scan
    vdb-elf-recover scan --deep --json
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(topic: string): topic is HelpTopic {
  return Object.hasOwn(HELP_TEXT, topic);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
