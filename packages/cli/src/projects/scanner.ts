import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { Logger } from "pino";
import type { ManifestFallback } from "../config.js";
import { DirectoryAccessError, ManifestParseError } from "../errors.js";
import { getLogger } from "../logging/logger.js";
import { type ManifestMetadata, readManifest } from "./manifest.js";
import { MANIFEST_FILE_NAME, type Project } from "./types.js";

export interface ScannerOptions {
  projectsDir: string;
  /** What to do with a Cargo.toml that is not valid TOML (default: directory-name) */
  manifestFallback?: ManifestFallback;
  logger?: Logger;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

export class ProjectScanner {
  readonly projectsDir: string;
  private manifestFallback: ManifestFallback;
  private log: Logger;

  constructor(options: ScannerOptions) {
    this.projectsDir = resolve(options.projectsDir);
    this.manifestFallback = options.manifestFallback ?? "directory-name";
    this.log = (options.logger ?? getLogger()).child({
      component: "scanner",
    });
  }

  /**
   * List the Rust projects directly under the projects directory.
   *
   * Order is whatever `readdir` yields (lexical on common Unix platforms);
   * no sorting is applied. Subdirectories without a Cargo.toml are left out.
   *
   * @throws {DirectoryAccessError} when the projects directory can't be listed
   */
  async scan(): Promise<Project[]> {
    let entries: Dirent[];
    try {
      const info = await stat(this.projectsDir);
      if (!info.isDirectory()) {
        throw new DirectoryAccessError(this.projectsDir);
      }
      entries = await readdir(this.projectsDir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof DirectoryAccessError) throw error;
      throw new DirectoryAccessError(this.projectsDir, { cause: error });
    }

    const projects: Project[] = [];
    for (const entry of entries) {
      const dirPath = join(this.projectsDir, entry.name);
      if (!(await this.isDirectory(entry, dirPath))) continue;

      const project = await this.readProject(dirPath);
      if (project) {
        projects.push(project);
      }
    }

    this.log.debug(
      { projectsDir: this.projectsDir, count: projects.length },
      "Scan complete",
    );
    return projects;
  }

  private async isDirectory(entry: Dirent, dirPath: string): Promise<boolean> {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;

    // Follow links so a symlinked checkout still counts
    try {
      return (await stat(dirPath)).isDirectory();
    } catch (error) {
      this.log.debug({ dirPath, err: error }, "Skipping dangling symlink");
      return false;
    }
  }

  private async readProject(dirPath: string): Promise<Project | null> {
    const manifestPath = join(dirPath, MANIFEST_FILE_NAME);
    const dirName = basename(dirPath);

    let metadata: ManifestMetadata;
    try {
      metadata = await readManifest(manifestPath, dirName);
    } catch (error) {
      if (error instanceof ManifestParseError) {
        if (this.manifestFallback === "skip") {
          this.log.warn(
            { manifestPath, err: error.cause },
            "Skipping project with invalid manifest",
          );
          return null;
        }
        this.log.warn(
          { manifestPath, err: error.cause },
          "Invalid manifest, using directory name",
        );
        metadata = { name: dirName };
      } else if (isNotFound(error)) {
        this.log.debug({ dirPath }, "No manifest, not a project");
        return null;
      } else {
        this.log.warn(
          { manifestPath, err: error },
          "Skipping project with unreadable manifest",
        );
        return null;
      }
    }

    return Object.freeze({ ...metadata, path: dirPath });
  }
}
