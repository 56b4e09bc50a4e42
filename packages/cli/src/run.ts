import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { type CliCommand, HELP_TEXT, parseCliArgs } from "./args.js";
import { type Config, loadConfig } from "./config.js";
import { CliArgsError, DirectoryAccessError } from "./errors.js";
import { getLogger } from "./logging/logger.js";
import { MenuController } from "./menu/MenuController.js";
import { type Project, ProjectScanner } from "./projects/index.js";

export interface CliIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  errorOutput: NodeJS.WritableStream;
  /** Interrupt flag; aborted on SIGINT/SIGTERM */
  signal?: AbortSignal;
  config?: Config;
}

export function getVersion(): string {
  try {
    // Read package.json from the package root (one level up from src/ or dist/)
    const dirname = path.dirname(fileURLToPath(import.meta.url));
    const packageJsonPath = path.resolve(dirname, "../package.json");
    const packageJson: unknown = JSON.parse(
      fs.readFileSync(packageJsonPath, "utf-8"),
    );
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
  } catch (error) {
    getLogger().debug({ err: error }, "Could not read package version");
  }
  return "unknown";
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
): Promise<number> {
  const { output, errorOutput } = io;

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliArgsError) {
      errorOutput.write(`Error: ${error.message}\n\n`);
      errorOutput.write("Run 'crate-shelf --help' for usage information.\n");
      return 1;
    }
    throw error;
  }

  switch (command.kind) {
    case "help":
      output.write(HELP_TEXT);
      return 0;
    case "version":
      output.write(`crate-shelf v${getVersion()}\n`);
      return 0;
    case "list":
      break;
  }

  const config = io.config ?? loadConfig();
  const log = getLogger();
  const scanner = new ProjectScanner({
    projectsDir: command.projectsDir ?? config.projectsDir,
    manifestFallback: config.manifestFallback,
    logger: log,
  });

  let projects: Project[];
  try {
    projects = await scanner.scan();
  } catch (error) {
    if (error instanceof DirectoryAccessError) {
      log.debug({ err: error.cause }, "Scan failed");
      errorOutput.write(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const menu = new MenuController(projects, {
    input: io.input,
    output,
    signal: io.signal,
    logger: log,
  });
  await menu.run();
  return 0;
}
