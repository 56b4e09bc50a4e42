import { CliArgsError } from "./errors.js";

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "list"; projectsDir?: string };

/**
 * Parse command line arguments (without the node and script entries).
 * No arguments means `list`.
 *
 * @throws {CliArgsError} on unknown arguments or a missing option value
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const args = [...argv];

  if (args.includes("--help") || args.includes("-h")) {
    return { kind: "help" };
  }

  if (args.includes("--version") || args.includes("-v")) {
    return { kind: "version" };
  }

  // Parse --dir option
  let projectsDir: string | undefined;
  const dirIndex = args.findIndex((arg) => arg === "--dir" || arg === "-d");
  if (dirIndex !== -1) {
    const dirValue = args[dirIndex + 1];
    if (!dirValue || dirValue.startsWith("-")) {
      throw new CliArgsError(
        "--dir requires a value (e.g., --dir ~/code/rust)",
      );
    }
    projectsDir = dirValue;
    args.splice(dirIndex, 2);
  }

  // --list is the default action; accept it explicitly too
  for (const flag of ["--list", "-l"]) {
    const index = args.indexOf(flag);
    if (index !== -1) {
      args.splice(index, 1);
    }
  }

  if (args.length > 0) {
    throw new CliArgsError(`Unknown arguments: ${args.join(" ")}`);
  }

  return projectsDir !== undefined
    ? { kind: "list", projectsDir }
    : { kind: "list" };
}

export const HELP_TEXT = `
crate-shelf - Browse the Rust projects in a directory

USAGE:
  crate-shelf [OPTIONS]

OPTIONS:
  --help, -h            Show this help message
  --version, -v         Show version number
  --list, -l            List projects and choose one to inspect (default)
  --dir, -d <path>      Directory to scan (default: ~/rust)

ENVIRONMENT VARIABLES:
  CRATE_SHELF_DIR                  Directory to scan (default: ~/rust)
  CRATE_SHELF_MANIFEST_FALLBACK    What to do with an unparsable Cargo.toml:
                                   directory-name (default) or skip
  LOG_LEVEL                        Log level: fatal, error, warn, info, debug, trace, silent

EXAMPLES:
  # List the projects in ~/rust
  crate-shelf

  # List the projects somewhere else
  crate-shelf --dir ~/work/crates

At the prompt, enter a project number to see its details, or 'q' to quit.
`;
