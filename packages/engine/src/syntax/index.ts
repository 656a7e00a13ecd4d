/**
 * Engine - Declaration Syntaxes
 */

import { ConfigurationError, ReimportErrorCode } from "../shared/errors.js";
import { esmSyntax } from "./esm-syntax.js";
import { useSyntax } from "./use-syntax.js";
import type { DeclarationSyntax, SyntaxId } from "./types.js";

export type { DeclarationSyntax, StatementMatch, SyntaxId } from "./types.js";
export { TokenCursor, isIdent, isKeyword, isPunct, isString, skipBalanced } from "./cursor.js";
export { useSyntax } from "./use-syntax.js";
export { esmSyntax } from "./esm-syntax.js";

const SYNTAXES: Record<SyntaxId, DeclarationSyntax> = {
  use: useSyntax,
  esm: esmSyntax,
};

export function isSyntaxId(value: string): value is SyntaxId {
  return Object.prototype.hasOwnProperty.call(SYNTAXES, value);
}

/**
 * @throws ConfigurationError for an unknown syntax name
 */
export function getSyntax(id: string): DeclarationSyntax {
  if (!isSyntaxId(id)) {
    throw new ConfigurationError(
      `Unknown declaration syntax "${id}" (expected one of: ${Object.keys(SYNTAXES).join(", ")})`,
      ReimportErrorCode.CONFIG_UNKNOWN_SYNTAX,
    );
  }
  return SYNTAXES[id];
}
