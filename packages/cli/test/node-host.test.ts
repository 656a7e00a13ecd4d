/**
 * CLI - Node File System Host Tests
 *
 * Runs against a temporary directory.
 */

import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FileIoError, FileIoErrorCode, createNodeHost } from "@reimport/cli";

describe("createNodeHost", () => {
  const host = createNodeHost();
  let root = "";

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "reimport-host-"));
    await mkdir(join(root, "src", "nested"), { recursive: true });
    await mkdir(join(root, "target", "debug"), { recursive: true });
    await writeFile(join(root, "src", "main.rs"), "fn main() {}\n");
    await writeFile(join(root, "src", "nested", "lib.rs"), "pub fn f() {}\n");
    await writeFile(join(root, "src", "README.md"), "# notes\n");
    await writeFile(join(root, "target", "debug", "build.rs"), "fn b() {}\n");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("lists matching files in sorted order, skipping ignored directories", async () => {
    const files = await host.listFiles(root, { extensions: [".rs"], ignore: ["target"] });
    expect(files).toEqual([join(root, "src", "main.rs"), join(root, "src", "nested", "lib.rs")]);
  });

  it("fails to list a missing directory", async () => {
    const missing = join(root, "missing");
    const error = await host.listFiles(missing, { extensions: [".rs"], ignore: [] }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(FileIoError);
    expect(error instanceof FileIoError ? [error.code, error.path] : null).toEqual([FileIoErrorCode.LIST, missing]);
  });

  it("reads files as UTF-8", async () => {
    expect(await host.readFile(join(root, "src", "main.rs"))).toBe("fn main() {}\n");
  });

  it("wraps read failures", async () => {
    const error = await host.readFile(join(root, "nope.rs")).catch((err: unknown) => err);
    expect(error instanceof FileIoError ? error.code : null).toBe(FileIoErrorCode.READ);
  });

  it("replaces file content without leaving temporary files", async () => {
    const path = join(root, "src", "main.rs");
    await host.writeFile(path, "use ui::{Widget};\n\nfn main() {}\n");

    expect(await readFile(path, "utf8")).toBe("use ui::{Widget};\n\nfn main() {}\n");
    expect((await readdir(join(root, "src"))).sort()).toEqual(["README.md", "main.rs", "nested"]);
  });

  it("wraps write failures", async () => {
    const error = await host.writeFile(join(root, "missing", "x.rs"), "x").catch((err: unknown) => err);
    expect(error instanceof FileIoError ? error.code : null).toBe(FileIoErrorCode.WRITE);
  });
});
