/**
 * CLI flag parsing for resub.
 */

/**
 * Parsed CLI flags from command line arguments
 */
export interface ParsedFlags {
  /** Glob query (comma separated, "!" negates) */
  glob?: string;
  /** Pattern to find; also the content filter */
  from?: string;
  /** Replacement template */
  to?: string;
  /** Root directory */
  cwd?: string;
  /** Only list filtered files */
  list: boolean;
  /** Write changes to disk */
  apply: boolean;
  /** Skip the confirmation prompt */
  yes: boolean;
  /** Re-run on file changes */
  watch: boolean;
  /** Show debug output */
  verbose: boolean;
  /** Show version */
  version: boolean;
  /** Show help message */
  help: boolean;
  /** First problem found in the arguments */
  error?: string;
}

export const HELP_TEXT = `
resub - Preview and apply regex substitutions across a directory tree

Usage:
  resub [options]

Options:
  -g, --glob <query>      Glob query, comma separated ("!" excludes)
  -f, --from <regex>      Pattern to find (files without a match are skipped)
  -t, --to <template>     Replacement template ($1, $2, ... insert groups)
  -l, --list              Only list filtered files and their matching lines
  -a, --apply             Write changes to every filtered file
  -y, --yes               Do not ask before applying
  -w, --watch             Re-run when files change (Ctrl+C to stop)
  -C, --cwd <dir>         Root directory (default: current directory)
  -v, --verbose           Show debug output
  -V, --version           Show version number
  -h, --help              Show this help message

Config:
  resub.config.json (or .resub.config.json) in the root or any parent:
  { "files": { "globFilter": ["*.ts", "!*.test.ts"] }, "ignorePaths": [".git"] }

Examples:
  resub -g "*.rs,!mod.rs" -f "fn (\\w+)" -t "pub fn $1"
  resub -f "TODO" --list
  resub -f "oldName" -t "newName" --apply --yes
`;

const VALUE_FLAGS: Record<string, "glob" | "from" | "to" | "cwd"> = {
  "-g": "glob",
  "--glob": "glob",
  "-f": "from",
  "--from": "from",
  "-t": "to",
  "--to": "to",
  "-C": "cwd",
  "--cwd": "cwd",
};

/**
 * Parse CLI flags from command line arguments
 * @param args - Arguments after the executable and script
 */
export function parseFlags(args: readonly string[]): ParsedFlags {
  const flags: ParsedFlags = {
    list: false,
    apply: false,
    yes: false,
    watch: false,
    verbose: false,
    version: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const valueKey = VALUE_FLAGS[arg];

    if (valueKey) {
      const value = args[++i];
      if (value === undefined) {
        flags.error = `${arg} requires a value`;
        return flags;
      }
      flags[valueKey] = value;
    } else if (arg === "--list" || arg === "-l") {
      flags.list = true;
    } else if (arg === "--apply" || arg === "-a") {
      flags.apply = true;
    } else if (arg === "--yes" || arg === "-y") {
      flags.yes = true;
    } else if (arg === "--watch" || arg === "-w") {
      flags.watch = true;
    } else if (arg === "--verbose" || arg === "-v") {
      flags.verbose = true;
    } else if (arg === "--version" || arg === "-V") {
      flags.version = true;
    } else if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg.startsWith("-")) {
      flags.error = `Unknown option: ${arg}`;
      return flags;
    } else {
      flags.error = `Unexpected argument: ${arg}`;
      return flags;
    }
  }

  if (!flags.error && flags.apply && flags.watch) {
    flags.error = "--apply cannot be combined with --watch";
  }

  return flags;
}
