/**
 * CLI - Entry Point Tests
 */

import { describe, it, expect } from "vitest";
import { ExitCode, USAGE, parseArgs, runCli } from "@reimport/cli";
import { MemoryHost, captureSinks } from "./_helpers/memory-host.js";

const CONFIG = JSON.stringify({
  packages: [
    { package: "ui", symbols: ["Widget"] },
    { package: "core", symbols: ["Gadget"] },
  ],
});

function repo(config: string = CONFIG): MemoryHost {
  return new MemoryHost({
    "/repo/reimport.config.json": config,
    "/repo/src/a.rs": "fn a() { Widget::new(); }\n",
    "/repo/src/b.rs": "use core::{Gadget};\nfn b() { Gadget::new(); }\n",
  });
}

describe("parseArgs", () => {
  it("reads flags and values in either form", () => {
    expect(parseArgs(["./repo", "--check", "--concurrency", "4", "--config=cfg.json"])).toEqual({
      kind: "run",
      args: { root: "./repo", config: "cfg.json", dryRun: false, check: true, verbose: false, concurrency: 4 },
    });
  });

  it("uses defaults", () => {
    expect(parseArgs(["src"])).toEqual({
      kind: "run",
      args: { root: "src", config: null, dryRun: false, check: false, verbose: false, concurrency: 8 },
    });
  });

  it("returns help wherever --help appears", () => {
    expect(parseArgs(["src", "-h"])).toEqual({ kind: "help" });
  });

  it.each([
    [[], "Missing <root> directory"],
    [["a", "b"], "Expected one <root>, got 2"],
    [["a", "--bogus"], "Unknown option --bogus"],
    [["a", "--concurrency", "0"], "--concurrency needs a positive integer"],
    [["a", "--concurrency=1.5"], "--concurrency needs a positive integer"],
    [["a", "--config"], "--config needs a file path"],
  ])("rejects %j", (argv, message) => {
    expect(parseArgs(argv)).toEqual({ kind: "error", message });
  });
});

describe("runCli", () => {
  it("prints usage for --help", async () => {
    const { out, sinks } = captureSinks();
    const code = await runCli(["--help"], { host: repo(), sinks, cwd: "/" });
    expect(code).toBe(ExitCode.OK);
    expect(out).toEqual([USAGE]);
  });

  it("exits 1 with usage on bad arguments", async () => {
    const { err, sinks } = captureSinks();
    const code = await runCli([], { host: repo(), sinks, cwd: "/" });
    expect(code).toBe(ExitCode.ERROR);
    expect(err).toEqual(["[error] Missing <root> directory", USAGE]);
  });

  it("rewrites the tree and reports each updated file", async () => {
    const host = repo();
    const { out, err, sinks } = captureSinks();
    const code = await runCli(["repo"], { host, sinks, cwd: "/" });

    expect(code).toBe(ExitCode.OK);
    expect(out).toEqual(["updated src/a.rs", "2 file(s) checked: 1 updated, 1 unchanged, 0 failed"]);
    expect(err).toEqual([]);
    expect(host.files.get("/repo/src/a.rs")).toBe("use ui::{Widget};\n\nfn a() { Widget::new(); }\n");
  });

  it("exits 2 under --check when files would change, writing nothing", async () => {
    const host = repo();
    const { out, sinks } = captureSinks();
    const code = await runCli(["/repo", "--check"], { host, sinks, cwd: "/" });

    expect(code).toBe(ExitCode.CHANGES_PENDING);
    expect(out).toEqual(["would update src/a.rs", "2 file(s) checked: 1 to update, 1 unchanged, 0 failed"]);
    expect(host.writes).toEqual([]);
  });

  it("exits 0 under --check for a settled tree", async () => {
    const host = repo();
    await runCli(["/repo"], { host, sinks: captureSinks().sinks, cwd: "/" });
    const code = await runCli(["/repo", "--check"], { host, sinks: captureSinks().sinks, cwd: "/" });
    expect(code).toBe(ExitCode.OK);
  });

  it("exits 0 on a dry run with pending changes", async () => {
    const host = repo();
    const code = await runCli(["/repo", "--dry-run"], { host, sinks: captureSinks().sinks, cwd: "/" });
    expect(code).toBe(ExitCode.OK);
    expect(host.writes).toEqual([]);
  });

  it("resolves --config against the working directory", async () => {
    const host = repo();
    host.files.set("/work/cfg/reimport.json", JSON.stringify({ packages: [{ package: "core", symbols: ["Gadget"] }] }));
    const { out, sinks } = captureSinks();
    const code = await runCli(["/repo", "--config", "cfg/reimport.json"], { host, sinks, cwd: "/work" });

    expect(code).toBe(ExitCode.OK);
    expect(out).toEqual(["2 file(s) checked: 0 updated, 2 unchanged, 0 failed"]);
  });

  it("exits 1 on a configuration error before touching files", async () => {
    const host = repo(
      JSON.stringify({
        packages: [
          { package: "a", symbols: ["Spinner"] },
          { package: "b", symbols: ["Spinner"] },
        ],
      }),
    );
    const { out, err, sinks } = captureSinks();
    const code = await runCli(["/repo"], { host, sinks, cwd: "/" });

    expect(code).toBe(ExitCode.ERROR);
    expect(out).toEqual([]);
    expect(err).toEqual(['[error] Invalid ownership registry: symbol "Spinner" is registered under "a" and "b"']);
    expect(host.writes).toEqual([]);
  });

  it("lists every registry problem", async () => {
    const host = repo(JSON.stringify({ packages: [{ package: "ui", symbols: ["1a", "2b"] }] }));
    const { err, sinks } = captureSinks();
    await runCli(["/repo"], { host, sinks, cwd: "/" });
    expect(err).toEqual([
      [
        '[error] Invalid ownership registry: 2 registry problems, first: "1a" (package "ui") is not an identifier',
        '  - "1a" (package "ui") is not an identifier',
        '  - "2b" (package "ui") is not an identifier',
      ].join("\n"),
    ]);
  });

  it("exits 1 when a file cannot be written", async () => {
    const host = repo();
    host.failingWrites.add("/repo/src/a.rs");
    const { out, sinks } = captureSinks();
    const code = await runCli(["/repo"], { host, sinks, cwd: "/" });

    expect(code).toBe(ExitCode.ERROR);
    expect(out).toEqual([
      "failed src/a.rs: Cannot write /repo/src/a.rs: disk full",
      "2 file(s) checked: 0 updated, 1 unchanged, 1 failed",
    ]);
  });

  it("exits 1 when the configuration is missing", async () => {
    const host = new MemoryHost({ "/repo/src/a.rs": "fn a() {}\n" });
    const { err, sinks } = captureSinks();
    const code = await runCli(["/repo"], { host, sinks, cwd: "/" });

    expect(code).toBe(ExitCode.ERROR);
    expect(err).toEqual([
      "[error] Cannot read configuration /repo/reimport.config.json: Cannot read /repo/reimport.config.json: not found",
    ]);
  });
});
