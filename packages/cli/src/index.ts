/**
 * @reimport/cli
 *
 * Runs the import engine over a directory tree from a configuration file.
 */

export { runCli, parseArgs, USAGE, ExitCode } from "./cli.js";
export type { CliArgs, CliIo, ExitCodeType, ParsedArgs } from "./cli.js";

export {
  loadConfig,
  parseConfig,
  createReimporterFromConfig,
  DEFAULT_CONFIG_FILE,
  DEFAULT_IGNORE,
} from "./config/config.js";
export type { ReimportConfig } from "./config/config.js";

export { runReimport, updatedFiles, failedFiles, DEFAULT_CONCURRENCY } from "./run/run.js";
export type { RunOptions, RunReport, FileResult } from "./run/run.js";
export { formatReport, displayPath } from "./run/report.js";

export { createNodeHost } from "./host/node-host.js";
export { hasExtension } from "./host/types.js";
export type { FileSystemHost, ListFilesOptions } from "./host/types.js";

export { CliLogger, consoleSinks } from "./logger.js";
export type { LineSink, LoggerSinks } from "./logger.js";

export { FileIoError, FileIoErrorCode, describeError } from "./errors.js";
export type { FileIoErrorCodeType } from "./errors.js";
