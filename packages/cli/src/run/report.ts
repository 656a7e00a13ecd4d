/**
 * CLI - Run Summary
 */

import { relative, sep } from "node:path";
import type { RunReport } from "./run.js";

/**
 * Render a run as report lines: one per updated or failed file, then a count.
 * Paths are relative to the run root, with `/` separators.
 */
export function formatReport(report: RunReport): string[] {
  const lines: string[] = [];
  const verb = report.wrote ? "updated" : "would update";
  let updated = 0;
  let unchanged = 0;
  let failed = 0;

  for (const result of report.results) {
    const path = displayPath(report.root, result.path);
    switch (result.kind) {
      case "updated":
        updated++;
        lines.push(`${verb} ${path}`);
        break;
      case "unchanged":
        unchanged++;
        break;
      case "failed":
        failed++;
        lines.push(`failed ${path}: ${result.message}`);
        break;
    }
  }

  const counted = report.wrote ? `${updated} updated` : `${updated} to update`;
  lines.push(`${report.results.length} file(s) checked: ${counted}, ${unchanged} unchanged, ${failed} failed`);
  return lines;
}

export function displayPath(root: string, path: string): string {
  const rel = relative(root, path);
  return (rel === "" ? path : rel).split(sep).join("/");
}
