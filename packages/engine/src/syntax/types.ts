/**
 * Engine - Declaration Syntax Types
 *
 * A declaration syntax describes the one fixed import shape the engine reads
 * and writes for a family of languages, plus the lexical rules needed to find
 * identifiers, comments and strings in those languages.
 */

import type { LexerOptions, Token } from "../lexer/lexer.js";
import type { Binding, PackageId, SymbolName } from "../model/types.js";
import type { TokenCursor } from "./cursor.js";

export type SyntaxId = "use" | "esm";

/**
 * Result of matching the statement at the cursor.
 *
 * `end` is the index of the first significant token after the statement.
 */
export type StatementMatch =
  | { kind: "record"; package: PackageId; symbols: SymbolName[]; end: number }
  | { kind: "skipped"; reason: string; bindings: Binding[]; end: number }
  | { kind: "preamble"; end: number }
  | { kind: "other" };

export interface DeclarationSyntax {
  readonly id: SyntaxId;

  readonly lexer: LexerOptions;

  /** Template used by registry entries that do not name one */
  readonly defaultTemplate: string;

  /** File extensions handled by default, with leading dot */
  readonly extensions: readonly string[];

  /**
   * Classify the statement starting at the cursor's current token.
   * Must not move the cursor.
   */
  matchStatement(cursor: TokenCursor): StatementMatch;

  /**
   * An identifier right after this token is a qualified access
   * (`a::Widget`, `a.Widget`) and needs no import of its own.
   */
  isQualifier(token: Token): boolean;
}
