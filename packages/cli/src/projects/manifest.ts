import { readFile } from "node:fs/promises";
import { parse } from "smol-toml";
import { z } from "zod";
import { ManifestParseError } from "../errors.js";

export interface ManifestMetadata {
  name: string;
  description?: string;
}

// Fields of the wrong type are dropped rather than failing the whole manifest,
// so a manifest with a broken `description` still yields its `name`.
const PackageSectionSchema = z.object({
  name: z.string().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
});

const CargoManifestSchema = z.object({
  package: PackageSectionSchema.optional().catch(undefined),
});

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/**
 * Extract the package name and description from Cargo.toml content.
 *
 * A manifest without a usable `[package].name` (a virtual workspace root,
 * for instance) is named after its directory.
 *
 * @param fallbackName - used when the manifest declares no name
 * @param manifestPath - reported in the error when the TOML is invalid
 * @throws {ManifestParseError} when the content is not valid TOML
 */
export function parseManifest(
  content: string,
  fallbackName: string,
  manifestPath = "Cargo.toml",
): ManifestMetadata {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new ManifestParseError(manifestPath, { cause: error });
  }

  const result = CargoManifestSchema.safeParse(document);
  const section = result.success ? result.data.package : undefined;

  const description = nonBlank(section?.description);
  return {
    name: nonBlank(section?.name) ?? fallbackName,
    ...(description !== undefined ? { description } : {}),
  };
}

/**
 * Read and parse a Cargo.toml from disk.
 * Filesystem errors propagate unchanged; invalid TOML throws ManifestParseError.
 */
export async function readManifest(
  manifestPath: string,
  fallbackName: string,
): Promise<ManifestMetadata> {
  const content = await readFile(manifestPath, "utf-8");
  return parseManifest(content, fallbackName, manifestPath);
}
