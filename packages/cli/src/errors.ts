/**
 * CLI - Errors
 */

import { ReimportError } from "@reimport/engine";

/** Error codes */
export const FileIoErrorCode = {
  LIST: "REIMPORT_IO_LIST",
  READ: "REIMPORT_IO_READ",
  WRITE: "REIMPORT_IO_WRITE",
} as const;

export type FileIoErrorCodeType = (typeof FileIoErrorCode)[keyof typeof FileIoErrorCode];

/**
 * A read, write or directory listing failed. Per-file failures are reported
 * and the batch continues; a listing failure ends the run.
 */
export class FileIoError extends ReimportError {
  constructor(
    message: string,
    code: FileIoErrorCodeType,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, code);
    this.name = "FileIoError";
    if (options && "cause" in options) {
      this.cause = options.cause;
    }
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
