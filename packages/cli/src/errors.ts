/**
 * The scan directory is missing, is not a directory, or cannot be listed.
 * Fatal: the CLI reports it and exits non-zero before showing the menu.
 */
export class DirectoryAccessError extends Error {
  constructor(
    public readonly directory: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not read directory: ${directory}`, options);
    this.name = "DirectoryAccessError";
  }
}

/**
 * A Cargo.toml exists but is not valid TOML.
 * Non-fatal: the scanner applies its fallback policy for that entry.
 */
export class ManifestParseError extends Error {
  constructor(
    public readonly manifestPath: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not parse manifest: ${manifestPath}`, options);
    this.name = "ManifestParseError";
  }
}

/** Bad command line arguments */
export class CliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliArgsError";
  }
}
