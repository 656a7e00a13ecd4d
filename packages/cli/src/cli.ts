/**
 * reimport CLI
 *
 * Usage:
 *   reimport ./crates/app
 *   reimport ./src --config ./reimport.config.json --check
 *
 * Exit codes:
 *   0  Completed (whether or not files changed)
 *   1  Usage, configuration or file I/O error
 *   2  --check found files that would change
 */

import { join, resolve } from "node:path";
import { configureDebug, enableDebugChannels, isConfigurationError } from "@reimport/engine";
import type { ConfigurationError } from "@reimport/engine";
import { DEFAULT_CONFIG_FILE, createReimporterFromConfig, loadConfig } from "./config/config.js";
import { describeError } from "./errors.js";
import type { FileSystemHost } from "./host/types.js";
import { CliLogger } from "./logger.js";
import type { LoggerSinks } from "./logger.js";
import { formatReport } from "./run/report.js";
import { DEFAULT_CONCURRENCY, failedFiles, runReimport, updatedFiles } from "./run/run.js";

export const ExitCode = {
  OK: 0,
  ERROR: 1,
  CHANGES_PENDING: 2,
} as const;

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIo {
  host: FileSystemHost;
  sinks: LoggerSinks;
  /** Base for relative paths on the command line */
  cwd: string;
}

export interface CliArgs {
  root: string;
  config: string | null;
  dryRun: boolean;
  check: boolean;
  verbose: boolean;
  concurrency: number;
}

export type ParsedArgs =
  | { kind: "run"; args: CliArgs }
  | { kind: "help" }
  | { kind: "error"; message: string };

/* =============================================================================
 * ARGUMENTS
 * ============================================================================= */

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  let config: string | null = null;
  let dryRun = false;
  let check = false;
  let verbose = false;
  let concurrency = DEFAULT_CONCURRENCY;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("-")) return undefined;
      i++;
      return next;
    };

    switch (name) {
      case "--help":
      case "-h":
        return { kind: "help" };
      case "--dry-run":
        dryRun = true;
        break;
      case "--check":
        check = true;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--config": {
        const value = takeValue();
        if (value === undefined || value === "") return { kind: "error", message: "--config needs a file path" };
        config = value;
        break;
      }
      case "--concurrency": {
        const value = takeValue();
        const n = value === undefined ? NaN : Number(value);
        if (!Number.isInteger(n) || n < 1) {
          return { kind: "error", message: "--concurrency needs a positive integer" };
        }
        concurrency = n;
        break;
      }
      default:
        if (arg.startsWith("-")) return { kind: "error", message: `Unknown option ${arg}` };
        positional.push(arg);
    }
  }

  if (positional.length === 0) return { kind: "error", message: "Missing <root> directory" };
  if (positional.length > 1) return { kind: "error", message: `Expected one <root>, got ${positional.length}` };

  const root = positional[0] ?? "";
  return { kind: "run", args: { root, config, dryRun, check, verbose, concurrency } };
}

export const USAGE = `
reimport - Rewrite import declarations so every symbol comes from the package that owns it

Usage:
  reimport <root> [options]

Arguments:
  root                 Directory to process

Options:
  --config <file>      Configuration file (default: <root>/${DEFAULT_CONFIG_FILE})
  --dry-run            Report what would change without writing
  --check              Like --dry-run; exit 2 when any file would change
  --concurrency <n>    Files processed at once (default: ${DEFAULT_CONCURRENCY})
  --verbose, -v        Print diagnostics and engine debug output
  --help, -h           Show this help message

Exit codes:
  0  Completed
  1  Error (invalid arguments, configuration, unreadable or unwritable files)
  2  --check found files that would change
`.trim();

/* =============================================================================
 * ENTRY
 * ============================================================================= */

export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCodeType> {
  const parsed = parseArgs(argv);
  const bootstrap = new CliLogger(io.sinks);

  if (parsed.kind === "help") {
    bootstrap.info(USAGE);
    return ExitCode.OK;
  }
  if (parsed.kind === "error") {
    bootstrap.error(parsed.message);
    io.sinks.err(USAGE);
    return ExitCode.ERROR;
  }

  const args = parsed.args;
  const logger = new CliLogger(io.sinks, args.verbose);
  if (args.verbose) {
    configureDebug({ output: io.sinks.err });
    enableDebugChannels("*");
  }

  const root = resolve(io.cwd, args.root);
  const configPath = args.config === null ? join(root, DEFAULT_CONFIG_FILE) : resolve(io.cwd, args.config);

  try {
    const config = await loadConfig(configPath, io.host);
    const reimporter = createReimporterFromConfig(config);
    logger.detail(`config ${configPath}: ${config.packages.length} package(s), syntax ${config.syntax.id}`);

    const report = await runReimport({
      root,
      host: io.host,
      reimporter,
      extensions: config.extensions,
      ignore: config.ignore,
      dryRun: args.dryRun || args.check,
      concurrency: args.concurrency,
      logger,
    });

    for (const line of formatReport(report)) {
      logger.info(line);
    }

    if (failedFiles(report).length > 0) return ExitCode.ERROR;
    if (args.check && updatedFiles(report).length > 0) return ExitCode.CHANGES_PENDING;
    return ExitCode.OK;
  } catch (err) {
    logger.error(isConfigurationError(err) ? describeConfigurationError(err) : describeError(err));
    return ExitCode.ERROR;
  }
}

function describeConfigurationError(err: ConfigurationError): string {
  if (err.problems.length <= 1) return err.message;
  return [err.message, ...err.problems.map((problem) => `  - ${problem}`)].join("\n");
}
