/**
 * Engine - Idempotency Guard
 */

import type { ContentChange } from "../model/types.js";

/**
 * Compare rewritten content against the original. Only `changed` results are
 * handed to a writer.
 */
export function diffContent(original: string, next: string): ContentChange {
  return original === next ? { kind: "unchanged" } : { kind: "changed", text: next };
}

export function isChanged(change: ContentChange): change is { kind: "changed"; text: string } {
  return change.kind === "changed";
}
