/**
 * CLI - Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, ReimportErrorCode, esmSyntax, useSyntax } from "@reimport/engine";
import { DEFAULT_IGNORE, createReimporterFromConfig, loadConfig, parseConfig } from "@reimport/cli";
import { MemoryHost } from "./_helpers/memory-host.js";

function rejection(fn: () => unknown): ConfigurationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseConfig", () => {
  it("fills defaults for the use syntax", () => {
    const config = parseConfig({ packages: [{ package: "ui", symbols: ["Widget"] }] });
    expect(config.syntax).toBe(useSyntax);
    expect(config.extensions).toEqual([".rs"]);
    expect(config.ignore).toEqual(DEFAULT_IGNORE);
    expect(config.template).toBe(useSyntax.defaultTemplate);
    expect(config.families).toEqual([]);
    expect(config.moves).toEqual([]);
    expect(config.packages).toEqual([{ package: "ui", symbols: ["Widget"] }]);
  });

  it("fills defaults for the esm syntax", () => {
    const config = parseConfig({ syntax: "esm", packages: [{ package: "@acme/ui", symbols: ["Widget"] }] });
    expect(config.syntax).toBe(esmSyntax);
    expect(config.extensions).toEqual([".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"]);
  });

  it("keeps every configured field", () => {
    const config = parseConfig({
      extensions: [".rs", ".rs.in"],
      ignore: ["vendor"],
      families: ["hojicha"],
      moves: [{ from: "hojicha::event", to: "hojicha_core::event" }],
      packages: [{ package: "ui", template: "use ${package}::{${symbols}};", symbols: ["Widget"] }],
    });
    expect(config.extensions).toEqual([".rs", ".rs.in"]);
    expect(config.ignore).toEqual(["vendor"]);
    expect(config.families).toEqual(["hojicha"]);
    expect(config.moves).toEqual([{ from: "hojicha::event", to: "hojicha_core::event" }]);
    expect(config.packages[0]?.template).toBe("use ${package}::{${symbols}};");
  });

  it.each([
    [[], "Invalid configuration: $ must be an object"],
    [{ packages: [] }, "Invalid configuration: $.packages must be a non-empty array"],
    [{ packages: [{ package: "ui", symbols: ["Widget", 3] }] }, "Invalid configuration: $.packages[0].symbols[1] must be a non-empty string"],
    [{ packages: [{ symbols: ["Widget"] }] }, "Invalid configuration: $.packages[0].package must be a non-empty string"],
    [{ moves: {}, packages: [{ package: "ui", symbols: ["Widget"] }] }, "Invalid configuration: $.moves must be an array"],
    [{ ignore: "target", packages: [{ package: "ui", symbols: ["Widget"] }] }, "Invalid configuration: $.ignore must be an array of strings"],
  ])("rejects %j", (json, message) => {
    const err = rejection(() => parseConfig(json));
    expect(err.code).toBe(ReimportErrorCode.CONFIG_INVALID);
    expect(err.message).toBe(message);
  });

  it("rejects an unknown syntax", () => {
    const err = rejection(() => parseConfig({ syntax: "cobol", packages: [{ package: "ui", symbols: ["Widget"] }] }));
    expect(err.code).toBe(ReimportErrorCode.CONFIG_UNKNOWN_SYNTAX);
    expect(err.message).toBe('Unknown declaration syntax "cobol" (expected one of: use, esm)');
  });
});

describe("loadConfig", () => {
  it("reads JSON through the host", async () => {
    const host = new MemoryHost({
      "/repo/reimport.config.json": JSON.stringify({ packages: [{ package: "ui", symbols: ["Widget"] }] }),
    });
    const config = await loadConfig("/repo/reimport.config.json", host);
    expect(config.packages).toEqual([{ package: "ui", symbols: ["Widget"] }]);
  });

  it("reports a missing file", async () => {
    const host = new MemoryHost({});
    await expect(loadConfig("/repo/reimport.config.json", host)).rejects.toThrow(
      "Cannot read configuration /repo/reimport.config.json: Cannot read /repo/reimport.config.json: not found",
    );
  });

  it("reports malformed JSON", async () => {
    const host = new MemoryHost({ "/repo/reimport.config.json": "{ packages: " });
    await expect(loadConfig("/repo/reimport.config.json", host)).rejects.toThrow(
      /^Configuration \/repo\/reimport\.config\.json is not valid JSON: /,
    );
  });
});

describe("createReimporterFromConfig", () => {
  it("builds a working pipeline", () => {
    const reimporter = createReimporterFromConfig(
      parseConfig({ packages: [{ package: "ui", symbols: ["Widget"] }] }),
    );
    const outcome = reimporter.processSource({ path: "a.rs", text: "fn a() { Widget::new(); }\n" });
    expect(outcome.change).toEqual({ kind: "changed", text: "use ui::{Widget};\n\nfn a() { Widget::new(); }\n" });
  });

  it("surfaces registry problems", () => {
    const config = parseConfig({
      packages: [
        { package: "a", symbols: ["Spinner"] },
        { package: "b", symbols: ["Spinner"] },
      ],
    });
    const err = rejection(() => createReimporterFromConfig(config));
    expect(err.code).toBe(ReimportErrorCode.CONFIG_AMBIGUOUS_SYMBOL);
  });
});
