/**
 * CLI - Logger
 *
 * Report lines go to `out`; warnings, errors and verbose detail go to `err`.
 */

export type LineSink = (line: string) => void;

export interface LoggerSinks {
  out: LineSink;
  err: LineSink;
}

export class CliLogger {
  #sinks: LoggerSinks;
  #verbose: boolean;

  constructor(sinks: LoggerSinks, verbose = false) {
    this.#sinks = sinks;
    this.#verbose = verbose;
  }

  get verbose(): boolean {
    return this.#verbose;
  }

  log(message: string) {
    this.#sinks.out(message);
  }

  info(message: string) {
    this.log(message);
  }

  detail(message: string) {
    if (this.#verbose) this.#sinks.err(message);
  }

  warn(message: string) {
    this.#sinks.err(`[warn] ${message}`);
  }

  error(message: string) {
    this.#sinks.err(`[error] ${message}`);
  }
}

export function consoleSinks(): LoggerSinks {
  return {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
  };
}
