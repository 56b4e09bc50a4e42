import { randomUUID } from "node:crypto";
import { mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DirectoryAccessError } from "../../src/errors.js";
import {
  ProjectScanner,
  getBuildOutputPath,
} from "../../src/projects/index.js";

describe("ProjectScanner", () => {
  let testDir: string;

  async function addProject(dir: string, manifest?: string): Promise<string> {
    const dirPath = join(testDir, dir);
    await mkdir(dirPath, { recursive: true });
    if (manifest !== undefined) {
      await writeFile(join(dirPath, "Cargo.toml"), manifest);
    }
    return dirPath;
  }

  beforeEach(async () => {
    testDir = join(tmpdir(), `crate-shelf-scanner-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("returns one project per subdirectory with a manifest", async () => {
    await addProject("one", '[package]\nname = "one"\n');
    await addProject("two", '[package]\nname = "two"\n');
    await addProject("three", '[package]\nname = "three"\n');
    await addProject("notes");
    await addProject("scratch");

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects.map((p) => p.name).sort()).toEqual([
      "one",
      "three",
      "two",
    ]);
    for (const project of projects) {
      expect(project.path).not.toBe("");
    }
  });

  it("reads name, description and absolute path", async () => {
    const dirPath = await addProject(
      "foo-dir",
      '[package]\nname = "foo"\ndescription = "bar"\n',
    );

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects).toEqual([
      { name: "foo", description: "bar", path: dirPath },
    ]);
    const [project] = projects;
    expect(project && getBuildOutputPath(project)).toBe(
      join(dirPath, "target", "release"),
    );
  });

  it("ignores files next to project directories", async () => {
    await writeFile(join(testDir, "Cargo.toml"), '[package]\nname = "root"\n');
    await writeFile(join(testDir, "README.md"), "hello");
    await addProject("real", '[package]\nname = "real"\n');

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects.map((p) => p.name)).toEqual(["real"]);
  });

  it("does not look inside nested directories", async () => {
    await addProject(join("group", "nested"), '[package]\nname = "nested"\n');

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects).toEqual([]);
  });

  it("follows symlinks to project directories", async () => {
    const target = join(tmpdir(), `crate-shelf-link-target-${randomUUID()}`);
    await mkdir(target, { recursive: true });
    try {
      await writeFile(join(target, "Cargo.toml"), '[package]\nname = "linked"\n');
      await symlink(target, join(testDir, "linked"));
      await symlink(join(testDir, "missing"), join(testDir, "dangling"));

      const projects = await new ProjectScanner({
        projectsDir: testDir,
      }).scan();

      expect(projects).toEqual([
        { name: "linked", path: join(testDir, "linked") },
      ]);
    } finally {
      await rm(target, { recursive: true, force: true });
    }
  });

  it("names an unparsable manifest after its directory by default", async () => {
    const dirPath = await addProject("broken", "[package\nname = ");
    await addProject("fine", '[package]\nname = "fine"\n');

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects).toEqual([
      { name: "broken", path: dirPath },
      { name: "fine", path: join(testDir, "fine") },
    ]);
  });

  it("drops an unparsable manifest under the skip policy", async () => {
    await addProject("broken", "[package\nname = ");
    await addProject("fine", '[package]\nname = "fine"\n');

    const projects = await new ProjectScanner({
      projectsDir: testDir,
      manifestFallback: "skip",
    }).scan();

    expect(projects.map((p) => p.name)).toEqual(["fine"]);
  });

  it("skips a Cargo.toml that is a directory", async () => {
    await mkdir(join(testDir, "odd", "Cargo.toml"), { recursive: true });

    const projects = await new ProjectScanner({ projectsDir: testDir }).scan();

    expect(projects).toEqual([]);
  });

  it("returns frozen projects", async () => {
    await addProject("frozen", '[package]\nname = "frozen"\n');

    const [project] = await new ProjectScanner({
      projectsDir: testDir,
    }).scan();

    expect(Object.isFrozen(project)).toBe(true);
  });

  it("returns an empty list for an empty directory", async () => {
    await expect(
      new ProjectScanner({ projectsDir: testDir }).scan(),
    ).resolves.toEqual([]);
  });

  it("throws DirectoryAccessError when the directory is missing", async () => {
    const missing = join(testDir, "nope");
    const scanner = new ProjectScanner({ projectsDir: missing });

    await expect(scanner.scan()).rejects.toBeInstanceOf(DirectoryAccessError);
    await expect(scanner.scan()).rejects.toMatchObject({
      directory: missing,
      message: `Could not read directory: ${missing}`,
    });
  });

  it("throws DirectoryAccessError when the path is a file", async () => {
    const file = join(testDir, "file.txt");
    await writeFile(file, "not a directory");

    await expect(
      new ProjectScanner({ projectsDir: file }).scan(),
    ).rejects.toBeInstanceOf(DirectoryAccessError);
  });
});
