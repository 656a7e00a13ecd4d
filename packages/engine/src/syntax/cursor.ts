/**
 * Engine - Token Cursor
 *
 * Random-access view over the significant (non-trivia) tokens of a file,
 * shared by the statement matchers of every syntax.
 */

import { TokenKind, isTrivia, tokenize } from "../lexer/lexer.js";
import type { LexerOptions, Token } from "../lexer/lexer.js";

export class TokenCursor {
  readonly source: string;

  /** Significant tokens only; comments and whitespace are dropped */
  readonly tokens: readonly Token[];

  index = 0;

  constructor(source: string, tokens: readonly Token[]) {
    this.source = source;
    this.tokens = tokens.filter((t) => !isTrivia(t));
  }

  static from(source: string, options: LexerOptions): TokenCursor {
    return new TokenCursor(source, tokenize(source, options));
  }

  get atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  /** Token at `index + offset`, or undefined past either end. */
  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  at(index: number): Token | undefined {
    return this.tokens[index];
  }

  /** Whether a line break separates two tokens in the source. */
  newlineBetween(before: Token, after: Token): boolean {
    return this.source.slice(before.end, after.start).includes("\n");
  }
}

export function isPunct(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === TokenKind.Punctuation && token.text === text;
}

export function isIdent(token: Token | undefined): token is Token {
  return token !== undefined && token.kind === TokenKind.Identifier;
}

/** An identifier with the given name (keywords lex as identifiers). */
export function isKeyword(token: Token | undefined, name: string): boolean {
  return isIdent(token) && token.value === name;
}

export function isString(token: Token | undefined): token is Token {
  return token !== undefined && token.kind === TokenKind.StringLiteral;
}

/**
 * Index just past the bracket that closes the one at `open`, counting nested
 * brackets of the same kind. Returns `tokens.length` when unbalanced.
 */
export function skipBalanced(cursor: TokenCursor, open: number, openText: string, closeText: string): number {
  let depth = 0;
  for (let i = open; i < cursor.tokens.length; i++) {
    const token = cursor.tokens[i];
    if (isPunct(token, openText)) depth++;
    else if (isPunct(token, closeText)) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return cursor.tokens.length;
}
