import * as os from "node:os";
import * as path from "node:path";
import { type LogLevel, isLogLevel } from "./logging/logger.js";

/** What the scanner does with a Cargo.toml that is not valid TOML */
export type ManifestFallback = "directory-name" | "skip";

/**
 * Configuration loaded from environment variables.
 */
export interface Config {
  /** Directory whose immediate subdirectories are scanned for projects */
  projectsDir: string;
  /** Policy for manifests that fail to parse */
  manifestFallback: ManifestFallback;
  /** pino log level */
  logLevel: LogLevel;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    projectsDir: env.CRATE_SHELF_DIR ?? path.join(os.homedir(), "rust"),
    manifestFallback: parseManifestFallback(
      env.CRATE_SHELF_MANIFEST_FALLBACK,
    ),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "warn",
  };
}

/**
 * Parse manifest fallback policy from string or return default.
 */
function parseManifestFallback(value: string | undefined): ManifestFallback {
  if (value === "skip") {
    return value;
  }
  return "directory-name";
}
