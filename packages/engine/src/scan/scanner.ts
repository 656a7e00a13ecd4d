/**
 * Engine - Symbol Usage Scanner
 *
 * Finds the registry symbols a file uses outside its import section.
 *
 * This is lexical, not semantic: an identifier counts as a use when it is not
 * inside a comment or string literal, not inside the import section and not
 * the right-hand side of a qualified access (`pkg::Widget`, `obj.Widget`).
 * Local definitions that shadow a registry name still count.
 */

import { TokenKind, isTrivia, tokenize } from "../lexer/lexer.js";
import type { Token } from "../lexer/lexer.js";
import type { ImportSection, Span, SymbolName } from "../model/types.js";
import type { OwnershipRegistry } from "../registry/registry.js";
import type { DeclarationSyntax } from "../syntax/types.js";
import { parseImportSection } from "../parse/import-section.js";
import { debug } from "../shared/debug.js";

/**
 * Collect registry symbols used in `text`.
 *
 * @param section - The file's parsed import section, when the caller already
 * has it; identifiers inside its span are declarations, not usage evidence.
 */
export function scanUsage(
  text: string,
  registry: OwnershipRegistry,
  syntax: DeclarationSyntax,
  section: ImportSection = parseImportSection(text, syntax),
): Set<SymbolName> {
  return scanTokens(tokenize(text, syntax.lexer), registry, syntax, section.span);
}

/**
 * Same as `scanUsage`, over tokens that were already produced.
 */
export function scanTokens(
  tokens: readonly Token[],
  registry: OwnershipRegistry,
  syntax: DeclarationSyntax,
  excluded: Span | null,
): Set<SymbolName> {
  const used = new Set<SymbolName>();
  let previous: Token | undefined;

  for (const token of tokens) {
    if (isTrivia(token)) continue;

    if (
      token.kind === TokenKind.Identifier &&
      !within(token, excluded) &&
      !(previous !== undefined && syntax.isQualifier(previous)) &&
      registry.has(token.value)
    ) {
      used.add(token.value);
    }
    previous = token;
  }

  debug.scan("usage", { symbols: [...used] });
  return used;
}

function within(token: Token, span: Span | null): boolean {
  return span !== null && token.start >= span.start && token.end <= span.end;
}
