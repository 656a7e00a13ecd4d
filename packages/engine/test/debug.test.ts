/**
 * Engine - Debug Channel Tests
 */

import { afterEach, describe, it, expect } from "vitest";
import { configureDebug, debug, enableDebugChannels, isDebugEnabled, refreshDebugChannels } from "@reimport/engine";

describe("debug channels", () => {
  const lines: string[] = [];

  afterEach(() => {
    lines.length = 0;
    configureDebug({ format: "pretty", output: (message) => console.error(message) });
    refreshDebugChannels();
  });

  it("stay silent until enabled", () => {
    configureDebug({ output: (message) => lines.push(message) });
    debug.reconcile("record.add", { package: "ui" });
    expect(lines).toEqual([]);
  });

  it("write pretty lines for enabled channels only", () => {
    configureDebug({ output: (message) => lines.push(message) });
    enableDebugChannels("reconcile");
    debug.reconcile("record.add", { package: "ui", symbols: ["Widget"], count: 1 });
    debug.scan("usage", { symbols: [] });

    expect(lines).toEqual(['[reconcile.record.add] { package="ui", symbols=["Widget"], count=1 }']);
    expect(isDebugEnabled("reconcile")).toBe(true);
    expect(isDebugEnabled("scan")).toBe(false);
  });

  it("write JSON when asked", () => {
    configureDebug({ format: "json", output: (message) => lines.push(message) });
    enableDebugChannels("*");
    debug.run("file", { path: "a.rs" });
    expect(lines).toEqual(['{"channel":"run","point":"file","data":{"path":"a.rs"}}']);
  });
});
