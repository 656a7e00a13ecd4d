/**
 * `use` declarations: `use a::b::{X, Y};` and `use a::b::X;`
 */

import type { Token } from "../lexer/lexer.js";
import type { Binding, SymbolName } from "../model/types.js";
import { isIdent, isKeyword, isPunct, skipBalanced } from "./cursor.js";
import type { TokenCursor } from "./cursor.js";
import type { DeclarationSyntax, StatementMatch } from "./types.js";

/** Path segments that never name an importable symbol */
const PATH_KEYWORDS = new Set(["self", "super", "crate", "Self"]);

export const useSyntax: DeclarationSyntax = {
  id: "use",
  lexer: {
    singleQuoteStrings: false,
    templateStrings: false,
    rustLiterals: true,
    nestedBlockComments: true,
    dollarInIdentifiers: false,
  },
  defaultTemplate: "use ${package}::{${symbols}};",
  extensions: [".rs"],

  matchStatement(cursor: TokenCursor): StatementMatch {
    const start = cursor.index;
    const first = cursor.at(start);

    // #![inner_attribute] belongs to the file header
    if (isPunct(first, "#") && isPunct(cursor.at(start + 1), "!") && isPunct(cursor.at(start + 2), "[")) {
      return { kind: "preamble", end: skipBalanced(cursor, start + 2, "[", "]") };
    }

    let index = start;
    let attributed = false;
    while (isPunct(cursor.at(index), "#") && isPunct(cursor.at(index + 1), "[")) {
      index = skipBalanced(cursor, index + 1, "[", "]");
      attributed = true;
    }

    let visible = false;
    if (isKeyword(cursor.at(index), "pub")) {
      visible = true;
      index++;
      if (isPunct(cursor.at(index), "(")) index = skipBalanced(cursor, index, "(", ")");
    }

    const head = cursor.at(index);
    if (isKeyword(head, "extern") && isKeyword(cursor.at(index + 1), "crate")) {
      return { kind: "skipped", reason: "extern crate declaration", bindings: [], end: statementEnd(cursor, index) };
    }
    if (isKeyword(head, "mod") && isIdent(cursor.at(index + 1)) && isPunct(cursor.at(index + 2), ";")) {
      return { kind: "skipped", reason: "module declaration", bindings: [], end: index + 3 };
    }
    if (!isKeyword(head, "use")) {
      return { kind: "other" };
    }

    const end = statementEnd(cursor, index);
    const tree = cursor.tokens.slice(index + 1, end);
    const skip = (reason: string): StatementMatch => ({
      kind: "skipped",
      reason,
      bindings: collectBindings(tree),
      end,
    });
    if (attributed) return skip("attribute on declaration");
    if (visible) return skip("re-export");
    if (!isPunct(cursor.at(end - 1), ";")) return skip("unterminated declaration");

    const shape = matchShape(cursor.tokens.slice(index + 1, end - 1));
    if (typeof shape === "string") return skip(shape);
    return { kind: "record", package: shape.package, symbols: shape.symbols, end };
  },

  isQualifier(token: Token): boolean {
    return isPunct(token, "::") || isPunct(token, ".");
  },
};

/**
 * Index past the `;` ending the statement that starts at `index`, ignoring
 * semicolons inside braces.
 */
function statementEnd(cursor: TokenCursor, index: number): number {
  let depth = 0;
  for (let i = index; i < cursor.tokens.length; i++) {
    const token = cursor.tokens[i];
    if (isPunct(token, "{")) depth++;
    else if (isPunct(token, "}")) depth = Math.max(0, depth - 1);
    else if (depth === 0 && isPunct(token, ";")) return i + 1;
  }
  return cursor.tokens.length;
}

/**
 * Match `path::Name` or `path::{A, B}` (tokens between `use` and `;`).
 * Returns the reason for rejecting anything else.
 */
function matchShape(tokens: readonly Token[]): { package: string; symbols: SymbolName[] } | string {
  const segments: string[] = [];
  let i = 0;
  for (;;) {
    const segment = tokens[i];
    if (!isIdent(segment)) return segments.length === 0 ? "path does not start with a name" : "unsupported path";
    segments.push(segment.value);
    i++;
    if (!isPunct(tokens[i], "::")) break;
    i++;
    if (isPunct(tokens[i], "{")) return matchGroup(segments.join("::"), tokens, i);
    if (isPunct(tokens[i], "*")) return "glob import";
  }

  if (i < tokens.length) {
    return isKeyword(tokens[i], "as") ? "renamed import" : "unsupported path";
  }
  if (segments.length < 2) return "no symbol list";

  const symbol = segments[segments.length - 1] ?? "";
  if (PATH_KEYWORDS.has(symbol)) return "module import";
  return { package: segments.slice(0, -1).join("::"), symbols: [symbol] };
}

function matchGroup(
  pkg: string,
  tokens: readonly Token[],
  open: number,
): { package: string; symbols: SymbolName[] } | string {
  const symbols: SymbolName[] = [];
  let i = open + 1;
  while (i < tokens.length && !isPunct(tokens[i], "}")) {
    const name = tokens[i];
    if (!isIdent(name)) return "nested or glob group";
    if (PATH_KEYWORDS.has(name.value)) return "module import in group";
    const after = tokens[i + 1];
    if (isKeyword(after, "as")) return "renamed import";
    if (isPunct(after, "::")) return "nested or glob group";
    if (!symbols.includes(name.value)) symbols.push(name.value);
    i++;
    if (isPunct(tokens[i], ",")) i++;
    else if (!isPunct(tokens[i], "}")) return "malformed symbol list";
  }
  if (i !== tokens.length - 1) return "unsupported path";
  if (symbols.length === 0) return "empty symbol list";
  return { package: pkg, symbols };
}

/**
 * Names a use tree binds under their own name, nested groups included.
 * Renamed members bind only their alias and globs bind nothing nameable.
 */
function collectBindings(tokens: readonly Token[]): Binding[] {
  const bindings: Binding[] = [];
  walkTree(tokens, isPunct(tokens[0], "::") ? 1 : 0, [], bindings);
  return bindings;
}

/** Returns the index after the tree starting at `start`. */
function walkTree(tokens: readonly Token[], start: number, prefix: readonly string[], out: Binding[]): number {
  const path = [...prefix];
  let i = start;
  for (;;) {
    const token = tokens[i];
    if (isPunct(token, "{")) return walkGroup(tokens, i, path, out);
    if (isPunct(token, "*")) return i + 1;
    if (!isIdent(token)) return i;
    path.push(token.value);
    i++;
    if (isPunct(tokens[i], "::")) {
      i++;
      continue;
    }
    if (isKeyword(tokens[i], "as")) return i + 2;

    const symbol = token.value;
    if (path.length >= 2 && !PATH_KEYWORDS.has(symbol)) {
      out.push({ package: path.slice(0, -1).join("::"), symbol });
    }
    return i;
  }
}

function walkGroup(tokens: readonly Token[], open: number, path: readonly string[], out: Binding[]): number {
  let i = open + 1;
  while (i < tokens.length && !isPunct(tokens[i], "}")) {
    const next = walkTree(tokens, i, path, out);
    if (next === i) return tokens.length;
    i = next;
    if (isPunct(tokens[i], ",")) i++;
  }
  return i + 1;
}
