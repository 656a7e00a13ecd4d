/**
 * Engine - Errors
 */

/** Error codes */
export const ReimportErrorCode = {
  CONFIG_AMBIGUOUS_SYMBOL: "REIMPORT_CONFIG_AMBIGUOUS_SYMBOL",
  CONFIG_INVALID_SYMBOL: "REIMPORT_CONFIG_INVALID_SYMBOL",
  CONFIG_INVALID_PACKAGE: "REIMPORT_CONFIG_INVALID_PACKAGE",
  CONFIG_TEMPLATE_CONFLICT: "REIMPORT_CONFIG_TEMPLATE_CONFLICT",
  CONFIG_INVALID_TEMPLATE: "REIMPORT_CONFIG_INVALID_TEMPLATE",
  CONFIG_INVALID_MOVE: "REIMPORT_CONFIG_INVALID_MOVE",
  CONFIG_UNKNOWN_SYNTAX: "REIMPORT_CONFIG_UNKNOWN_SYNTAX",
  CONFIG_INVALID: "REIMPORT_CONFIG_INVALID",
  EDIT_CONFLICT: "REIMPORT_EDIT_CONFLICT",
} as const;

export type ReimportErrorCodeType = (typeof ReimportErrorCode)[keyof typeof ReimportErrorCode];

/**
 * Base class for errors raised by the engine and its collaborators.
 */
export class ReimportError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "ReimportError";
  }
}

/**
 * The registry or configuration cannot be used. Raised before any file is read.
 */
export class ConfigurationError extends ReimportError {
  constructor(
    message: string,
    code: ReimportErrorCodeType,
    /** One line per problem, when several were found at once */
    public readonly problems: readonly string[] = [],
  ) {
    super(message, code);
    this.name = "ConfigurationError";
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}
