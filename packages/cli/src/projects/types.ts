import { join } from "node:path";

/** Manifest file that marks a directory as a Rust project */
export const MANIFEST_FILE_NAME = "Cargo.toml";

/** Where `cargo build --release` puts its artifacts, relative to the project */
export const BUILD_OUTPUT_SUBPATH = join("target", "release");

export const NO_DESCRIPTION = "No description";

export interface Project {
  readonly name: string;
  readonly description?: string;
  /** Absolute path to the project directory */
  readonly path: string;
}

export function getBuildOutputPath(project: Project): string {
  return join(project.path, BUILD_OUTPUT_SUBPATH);
}

export function describeProject(project: Project): string {
  return project.description ?? NO_DESCRIPTION;
}
