/**
 * ES module named imports: `import { X, Y } from "pkg";`
 */

import type { Token } from "../lexer/lexer.js";
import type { Binding, SymbolName } from "../model/types.js";
import { isIdent, isKeyword, isPunct, isString } from "./cursor.js";
import type { TokenCursor } from "./cursor.js";
import type { DeclarationSyntax, StatementMatch } from "./types.js";

export const esmSyntax: DeclarationSyntax = {
  id: "esm",
  lexer: {
    singleQuoteStrings: true,
    templateStrings: true,
    rustLiterals: false,
    nestedBlockComments: false,
    dollarInIdentifiers: true,
  },
  defaultTemplate: 'import { ${symbols} } from "${package}";',
  extensions: [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"],

  matchStatement(cursor: TokenCursor): StatementMatch {
    const start = cursor.index;
    const head = cursor.at(start);

    // "use strict" and other directives
    if (isString(head)) {
      const next = cursor.at(start + 1);
      if (isPunct(next, ";")) return { kind: "preamble", end: start + 2 };
      if (next === undefined || cursor.newlineBetween(head, next)) return { kind: "preamble", end: start + 1 };
      return { kind: "other" };
    }

    if (!isKeyword(head, "import")) return { kind: "other" };
    // import("x") and import.meta are expressions
    const after = cursor.at(start + 1);
    if (isPunct(after, "(") || isPunct(after, ".")) return { kind: "other" };

    const end = statementEnd(cursor, start);
    const clause = cursor.tokens.slice(start + 1, end);
    const shape = matchShape(clause);
    if (typeof shape === "string") return { kind: "skipped", reason: shape, bindings: namedBindings(clause), end };
    return { kind: "record", package: shape.package, symbols: shape.symbols, end };
  },

  isQualifier(token: Token): boolean {
    return isPunct(token, ".");
  },
};

/**
 * Index past the statement starting at `index`: its `;`, or, without one, the
 * last token before a line break once the module specifier has been read.
 */
function statementEnd(cursor: TokenCursor, index: number): number {
  let depth = 0;
  let sawSpecifier = false;
  for (let i = index + 1; i < cursor.tokens.length; i++) {
    const token = cursor.tokens[i];
    if (token === undefined) break;
    if (isPunct(token, "{") || isPunct(token, "(")) depth++;
    else if (isPunct(token, "}") || isPunct(token, ")")) depth = Math.max(0, depth - 1);
    else if (depth === 0 && isPunct(token, ";")) return i + 1;
    else if (isString(token)) sawSpecifier = true;

    const next = cursor.at(i + 1);
    if (sawSpecifier && depth === 0 && (next === undefined || cursor.newlineBetween(token, next)) && !isPunct(next, ";")) {
      return i + 1;
    }
  }
  return cursor.tokens.length;
}

/**
 * Match `{ A, B } from "pkg" ;?` (tokens after `import`).
 * Returns the reason for rejecting anything else.
 */
function matchShape(tokens: readonly Token[]): { package: string; symbols: SymbolName[] } | string {
  const first = tokens[0];
  if (isString(first)) return "side-effect import";
  if (isKeyword(first, "type")) return "type-only import";
  if (isPunct(first, "*")) return "namespace import";
  if (!isPunct(first, "{")) return "default import";

  const symbols: SymbolName[] = [];
  let i = 1;
  while (i < tokens.length && !isPunct(tokens[i], "}")) {
    const name = tokens[i];
    if (!isIdent(name)) return "malformed symbol list";
    const after = tokens[i + 1];
    if (isKeyword(name, "type") && isIdent(after)) return "type-only specifier";
    if (isKeyword(after, "as")) return "renamed import";
    if (!symbols.includes(name.value)) symbols.push(name.value);
    i++;
    if (isPunct(tokens[i], ",")) i++;
    else if (!isPunct(tokens[i], "}")) return "malformed symbol list";
  }
  if (i >= tokens.length) return "unterminated symbol list";
  if (symbols.length === 0) return "empty symbol list";

  const from = tokens[i + 1];
  const specifier = tokens[i + 2];
  if (!isKeyword(from, "from") || !isString(specifier) || specifier.unterminated) return "malformed module specifier";

  const rest = tokens.slice(i + 3);
  if (rest.length > 1 || (rest.length === 1 && !isPunct(rest[0], ";"))) return "import attributes";
  return { package: specifier.value, symbols };
}

/**
 * Named specifiers a skipped import still binds under their own name
 * (`import D, { X, type Y, Z as W } from "pkg"` binds `X` and `Y`).
 */
function namedBindings(tokens: readonly Token[]): Binding[] {
  const open = tokens.findIndex((t) => isPunct(t, "{"));
  const close = tokens.findIndex((t) => isPunct(t, "}"));
  const specifier = tokens[close + 2];
  if (open < 0 || close < open) return [];
  if (!isKeyword(tokens[close + 1], "from") || !isString(specifier) || specifier.unterminated) return [];

  const bindings: Binding[] = [];
  let member: Token[] = [];
  for (const token of [...tokens.slice(open + 1, close), undefined]) {
    if (token !== undefined && !isPunct(token, ",")) {
      member.push(token);
      continue;
    }
    if (member.length === 2 && isKeyword(member[0], "type")) member = member.slice(1);
    const name = member[0];
    if (member.length === 1 && isIdent(name)) bindings.push({ package: specifier.value, symbol: name.value });
    member = [];
  }
  return bindings;
}
