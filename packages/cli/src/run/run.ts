/**
 * CLI - Batch Runner
 *
 * Lists the files under a root, runs each through the file pipeline with
 * bounded concurrency, and writes back the ones that changed. A failure on one
 * file is recorded and the batch moves on.
 */

import pMap from "p-map";
import { ReimportError } from "@reimport/engine";
import type { Diagnostic, Reimporter } from "@reimport/engine";
import type { FileSystemHost } from "../host/types.js";
import type { CliLogger } from "../logger.js";
import { describeError } from "../errors.js";

export const DEFAULT_CONCURRENCY = 8;

export interface RunOptions {
  root: string;
  host: FileSystemHost;
  reimporter: Reimporter;
  extensions: readonly string[];
  ignore: readonly string[];

  /** Compute changes without writing them */
  dryRun?: boolean;

  /** Files in flight at once (default 8) */
  concurrency?: number;

  logger?: CliLogger;
}

export type FileResult =
  | { kind: "updated"; path: string; diagnostics: readonly Diagnostic[] }
  | { kind: "unchanged"; path: string; diagnostics: readonly Diagnostic[] }
  | { kind: "failed"; path: string; message: string; code: string | null };

export interface RunReport {
  root: string;

  /** One entry per listed file, in listing order */
  results: readonly FileResult[];

  /** False under dry run */
  wrote: boolean;
}

/**
 * Process every matching file under `options.root`.
 *
 * @throws FileIoError when the root cannot be listed
 */
export async function runReimport(options: RunOptions): Promise<RunReport> {
  const { root, host, reimporter, logger } = options;
  const dryRun = options.dryRun ?? false;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  const files = await host.listFiles(root, { extensions: options.extensions, ignore: options.ignore });
  logger?.detail(`${files.length} file(s) under ${root}`);

  const processFile = async (path: string): Promise<FileResult> => {
    try {
      const text = await host.readFile(path);
      const outcome = reimporter.processSource({ path, text });
      for (const diagnostic of outcome.diagnostics) {
        logger?.detail(`${path}: ${diagnostic.message}`);
      }
      if (outcome.change.kind === "unchanged") {
        return { kind: "unchanged", path, diagnostics: outcome.diagnostics };
      }
      if (!dryRun) {
        await host.writeFile(path, outcome.change.text);
      }
      return { kind: "updated", path, diagnostics: outcome.diagnostics };
    } catch (err) {
      return {
        kind: "failed",
        path,
        message: describeError(err),
        code: err instanceof ReimportError ? err.code : null,
      };
    }
  };

  const results = await pMap(files, processFile, { concurrency });
  return { root, results, wrote: !dryRun };
}

export function updatedFiles(report: RunReport): string[] {
  return report.results.filter((r) => r.kind === "updated").map((r) => r.path);
}

export function failedFiles(report: RunReport): Extract<FileResult, { kind: "failed" }>[] {
  return report.results.filter((r): r is Extract<FileResult, { kind: "failed" }> => r.kind === "failed");
}
