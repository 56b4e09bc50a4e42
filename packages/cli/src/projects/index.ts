/**
 * Rust project discovery
 *
 * Key exports:
 * - ProjectScanner for listing the projects under a directory
 * - Manifest (Cargo.toml) parsing
 * - Project type and derived paths
 */

export {
  BUILD_OUTPUT_SUBPATH,
  MANIFEST_FILE_NAME,
  NO_DESCRIPTION,
  describeProject,
  getBuildOutputPath,
} from "./types.js";
export type { Project } from "./types.js";

export { parseManifest, readManifest } from "./manifest.js";
export type { ManifestMetadata } from "./manifest.js";

export { ProjectScanner } from "./scanner.js";
export type { ScannerOptions } from "./scanner.js";
