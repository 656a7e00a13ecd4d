/**
 * Token kinds produced by the Lexer.
 *
 * The lexer only needs to be precise about the things usage detection and the
 * import parser care about: where identifiers are, and which stretches of text
 * are comments or string literals. Everything else degrades to punctuation.
 */
export enum TokenKind {
  Identifier = "Identifier",
  StringLiteral = "StringLiteral",
  NumericLiteral = "NumericLiteral",
  Punctuation = "Punctuation",
  /** Rust lifetime or label (`'a`) */
  Lifetime = "Lifetime",
  LineComment = "LineComment",
  BlockComment = "BlockComment",
  Whitespace = "Whitespace",
  Newline = "Newline",
}

/**
 * Single lexical token.
 *
 * - `text`   : exact source slice
 * - `value`  : identifier name, string contents (quotes and raw markers
 *              stripped, escapes left as written), or `text` for everything else
 * - `start`  : inclusive UTF-16 offset
 * - `end`    : exclusive UTF-16 offset
 */
export interface Token {
  kind: TokenKind;
  text: string;
  value: string;
  start: number;
  end: number;
  /** Marked true for strings and block comments that reach end of input. */
  unterminated?: boolean;
}

/**
 * Per-language lexical rules.
 */
export interface LexerOptions {
  /** `'...'` is a string (JS) rather than a char literal or lifetime (Rust) */
  singleQuoteStrings: boolean;

  /** Backtick template literals with `${}` interpolation */
  templateStrings: boolean;

  /** Rust raw/byte strings (`r#"..."#`, `b"..."`), raw identifiers and char literals */
  rustLiterals: boolean;

  /** Block comments nest inside each other */
  nestedBlockComments: boolean;

  /** `$` may appear in identifiers */
  dollarInIdentifiers: boolean;
}

export function isTrivia(token: Token): boolean {
  return (
    token.kind === TokenKind.Whitespace ||
    token.kind === TokenKind.Newline ||
    token.kind === TokenKind.LineComment ||
    token.kind === TokenKind.BlockComment
  );
}

export function isComment(token: Token): boolean {
  return token.kind === TokenKind.LineComment || token.kind === TokenKind.BlockComment;
}

/**
 * Tokenize a whole source text, trivia included. Concatenating the `text` of
 * every token reproduces the input exactly.
 */
export function tokenize(source: string, options: LexerOptions): Token[] {
  const lexer = new Lexer(source, options);
  const tokens: Token[] = [];
  for (let token = lexer.next(); token !== null; token = lexer.next()) {
    tokens.push(token);
  }
  return tokens;
}

/**
 * Lexer for import-bearing source files.
 *
 * - Construct with the full source string and the language's rules.
 * - Call `next()` until it returns null.
 *
 * Offsets are 0-based UTF-16 code units into the original string.
 */
export class Lexer {
  private readonly source: string;
  private readonly length: number;
  private readonly options: LexerOptions;
  private index = 0;

  /** Open `${` interpolations, each holding its current brace depth */
  private readonly templateDepths: number[] = [];

  constructor(source: string, options: LexerOptions) {
    this.source = source;
    this.length = source.length;
    this.options = options;
  }

  /** Current scanning position (0-based UTF-16 offset). */
  get position(): number {
    return this.index;
  }

  /**
   * Consume and return the next token, or null at end of input.
   */
  next(): Token | null {
    if (this.index >= this.length) return null;

    const start = this.index;
    const ch = this.charCodeAt(start);

    if (ch === CharCode.LineFeed) {
      this.index++;
      return this.makeToken(TokenKind.Newline, start);
    }
    if (ch === CharCode.CarriageReturn && this.charCodeAt(start + 1) === CharCode.LineFeed) {
      this.index += 2;
      return this.makeToken(TokenKind.Newline, start);
    }
    if (this.isWhitespace(ch)) {
      while (this.index < this.length && this.isWhitespace(this.charCodeAt(this.index))) {
        this.index++;
      }
      return this.makeToken(TokenKind.Whitespace, start);
    }

    // Shebang line; `#![` is a Rust inner attribute, not a shebang
    if (
      start === 0 &&
      ch === CharCode.Hash &&
      this.charCodeAt(1) === CharCode.Exclamation &&
      this.charCodeAt(2) !== CharCode.OpenBracket
    ) {
      return this.scanLineComment();
    }

    if (ch === CharCode.Slash) {
      const next = this.charCodeAt(start + 1);
      if (next === CharCode.Slash) return this.scanLineComment();
      if (next === CharCode.Asterisk) return this.scanBlockComment();
    }

    if (this.options.rustLiterals) {
      const literal = this.scanRustPrefixedLiteral();
      if (literal) return literal;
    }

    if (this.isIdentifierStart(ch)) {
      return this.scanIdentifier();
    }

    if (this.isDigit(ch)) {
      return this.scanNumber();
    }

    if (ch === CharCode.DoubleQuote) {
      return this.scanQuoted(start, start + 1, CharCode.DoubleQuote, 0);
    }

    if (ch === CharCode.SingleQuote) {
      if (this.options.singleQuoteStrings) {
        return this.scanQuoted(start, start + 1, CharCode.SingleQuote, 0);
      }
      if (this.options.rustLiterals) {
        return this.scanCharOrLifetime();
      }
    }

    if (ch === CharCode.Backtick && this.options.templateStrings) {
      this.index++;
      return this.scanTemplatePart(start);
    }

    if (this.templateDepths.length > 0) {
      const top = this.templateDepths.length - 1;
      if (ch === CharCode.OpenBrace) {
        this.templateDepths[top] = (this.templateDepths[top] ?? 0) + 1;
      } else if (ch === CharCode.CloseBrace) {
        const depth = this.templateDepths[top] ?? 0;
        if (depth === 0) {
          // End of `${ ... }`: the rest of the template literal follows
          this.templateDepths.pop();
          this.index++;
          return this.scanTemplatePart(start);
        }
        this.templateDepths[top] = depth - 1;
      }
    }

    if (ch === CharCode.Colon && this.charCodeAt(start + 1) === CharCode.Colon) {
      this.index += 2;
      return this.makeToken(TokenKind.Punctuation, start);
    }

    // Surrogate pairs stay together so slices never split a code point
    this.index += this.codePointLength(start);
    return this.makeToken(TokenKind.Punctuation, start);
  }

  // --------------------------------------------------------------------------------------
  // Comments
  // --------------------------------------------------------------------------------------

  private scanLineComment(): Token {
    const start = this.index;
    while (this.index < this.length) {
      const c = this.charCodeAt(this.index);
      if (c === CharCode.LineFeed) break;
      if (c === CharCode.CarriageReturn && this.charCodeAt(this.index + 1) === CharCode.LineFeed) break;
      this.index++;
    }
    return this.makeToken(TokenKind.LineComment, start);
  }

  private scanBlockComment(): Token {
    const start = this.index;
    this.index += 2;
    let depth = 1;
    while (this.index < this.length) {
      const c = this.charCodeAt(this.index);
      const next = this.charCodeAt(this.index + 1);
      if (c === CharCode.Asterisk && next === CharCode.Slash) {
        this.index += 2;
        depth--;
        if (depth === 0) return this.makeToken(TokenKind.BlockComment, start);
        continue;
      }
      if (this.options.nestedBlockComments && c === CharCode.Slash && next === CharCode.Asterisk) {
        this.index += 2;
        depth++;
        continue;
      }
      this.index++;
    }
    const token = this.makeToken(TokenKind.BlockComment, start);
    token.unterminated = true;
    return token;
  }

  // --------------------------------------------------------------------------------------
  // Identifiers & numbers
  // --------------------------------------------------------------------------------------

  private scanIdentifier(): Token {
    const start = this.index;
    this.index += this.codePointLength(start);
    while (this.index < this.length && this.isIdentifierPart(this.charCodeAt(this.index))) {
      this.index += this.codePointLength(this.index);
    }
    return this.makeToken(TokenKind.Identifier, start);
  }

  private scanNumber(): Token {
    const start = this.index;
    while (this.index < this.length) {
      const c = this.charCodeAt(this.index);
      if (this.isDigit(c) || this.isAsciiLetter(c) || c === CharCode.Underscore) {
        this.index++;
        continue;
      }
      // Fractional part; `1..2` is a range, not a number
      if (c === CharCode.Dot && this.isDigit(this.charCodeAt(this.index + 1))) {
        this.index++;
        continue;
      }
      break;
    }
    return this.makeToken(TokenKind.NumericLiteral, start);
  }

  // --------------------------------------------------------------------------------------
  // Strings
  // --------------------------------------------------------------------------------------

  /**
   * Scan a quoted literal whose opening delimiter ends at `contentStart`.
   * `hashes` is the number of `#` closing a Rust raw string; raw strings have
   * no escapes.
   */
  private scanQuoted(start: number, contentStart: number, quote: number, hashes: number, raw = false): Token {
    this.index = contentStart;
    while (this.index < this.length) {
      const c = this.charCodeAt(this.index);
      if (c === CharCode.Backslash && !raw) {
        this.index += 2;
        continue;
      }
      if (c === quote && this.hashesFollow(this.index + 1, hashes)) {
        const contentEnd = this.index;
        this.index += 1 + hashes;
        return this.makeToken(TokenKind.StringLiteral, start, this.source.slice(contentStart, contentEnd));
      }
      // Char literals and JS strings stop at the end of the line
      if ((quote !== CharCode.DoubleQuote || this.options.singleQuoteStrings) && !raw && c === CharCode.LineFeed) break;
      this.index++;
    }
    this.index = Math.min(this.index, this.length);
    const token = this.makeToken(TokenKind.StringLiteral, start, this.source.slice(contentStart, this.index));
    token.unterminated = true;
    return token;
  }

  /**
   * Scan template text starting right after a backtick or the `}` closing an
   * interpolation, up to the closing backtick or the next `${`.
   */
  private scanTemplatePart(start: number): Token {
    const contentStart = this.index;
    while (this.index < this.length) {
      const c = this.charCodeAt(this.index);
      if (c === CharCode.Backslash) {
        this.index += 2;
        continue;
      }
      if (c === CharCode.Backtick) {
        const contentEnd = this.index;
        this.index++;
        return this.makeToken(TokenKind.StringLiteral, start, this.source.slice(contentStart, contentEnd));
      }
      if (c === CharCode.Dollar && this.charCodeAt(this.index + 1) === CharCode.OpenBrace) {
        const contentEnd = this.index;
        this.index += 2;
        this.templateDepths.push(0);
        return this.makeToken(TokenKind.StringLiteral, start, this.source.slice(contentStart, contentEnd));
      }
      this.index++;
    }
    this.index = Math.min(this.index, this.length);
    const token = this.makeToken(TokenKind.StringLiteral, start, this.source.slice(contentStart, this.index));
    token.unterminated = true;
    return token;
  }

  /**
   * Rust literals introduced by a letter: `r"..."`, `r#"..."#`, `b"..."`,
   * `br"..."`, `b'x'`, and raw identifiers `r#name`.
   */
  private scanRustPrefixedLiteral(): Token | null {
    const start = this.index;
    let cursor = start;
    let byte = false;
    if (this.charCodeAt(cursor) === CharCode.LowercaseB) {
      byte = true;
      cursor++;
      const c = this.charCodeAt(cursor);
      if (c === CharCode.DoubleQuote) {
        return this.scanQuoted(start, cursor + 1, CharCode.DoubleQuote, 0);
      }
      if (c === CharCode.SingleQuote) {
        this.index = cursor;
        const token = this.scanCharOrLifetime();
        return { ...token, start, text: this.source.slice(start, token.end) };
      }
    }
    if (this.charCodeAt(cursor) !== CharCode.LowercaseR) return null;
    cursor++;

    let hashes = 0;
    while (this.charCodeAt(cursor + hashes) === CharCode.Hash) hashes++;
    if (this.charCodeAt(cursor + hashes) === CharCode.DoubleQuote) {
      return this.scanQuoted(start, cursor + hashes + 1, CharCode.DoubleQuote, hashes, true);
    }

    // r#ident
    if (!byte && hashes === 1 && this.isIdentifierStart(this.charCodeAt(cursor + 1))) {
      this.index = cursor + 1;
      const ident = this.scanIdentifier();
      return { ...ident, start, text: this.source.slice(start, ident.end) };
    }
    return null;
  }

  /**
   * After a `'` in Rust: a char literal (`'x'`, `'\n'`) or a lifetime (`'a`).
   */
  private scanCharOrLifetime(): Token {
    const start = this.index;
    const first = this.charCodeAt(start + 1);

    if (first === CharCode.Backslash) {
      return this.scanQuoted(start, start + 1, CharCode.SingleQuote, 0);
    }

    const width = this.codePointLength(start + 1);
    if (first >= 0 && this.charCodeAt(start + 1 + width) === CharCode.SingleQuote) {
      this.index = start + 2 + width;
      return this.makeToken(TokenKind.StringLiteral, start, this.source.slice(start + 1, start + 1 + width));
    }

    this.index = start + 1;
    if (this.isIdentifierStart(first)) {
      while (this.index < this.length && this.isIdentifierPart(this.charCodeAt(this.index))) {
        this.index += this.codePointLength(this.index);
      }
      return this.makeToken(TokenKind.Lifetime, start);
    }
    return this.makeToken(TokenKind.Punctuation, start);
  }

  private hashesFollow(index: number, count: number): boolean {
    for (let i = 0; i < count; i++) {
      if (this.charCodeAt(index + i) !== CharCode.Hash) return false;
    }
    return true;
  }

  // --------------------------------------------------------------------------------------
  // Char helpers
  // --------------------------------------------------------------------------------------

  private charCodeAt(index: number): number {
    if (index < 0 || index >= this.length) return -1;
    return this.source.charCodeAt(index);
  }

  private codePointLength(index: number): number {
    const code = this.source.codePointAt(index);
    return code !== undefined && code > 0xffff ? 2 : 1;
  }

  private isWhitespace(ch: number): boolean {
    return (
      ch === CharCode.Space ||
      ch === CharCode.Tab ||
      ch === CharCode.CarriageReturn ||
      ch === CharCode.VerticalTab ||
      ch === CharCode.FormFeed ||
      ch === CharCode.NonBreakingSpace ||
      ch === CharCode.ByteOrderMark
    );
  }

  private isDigit(ch: number): boolean {
    return ch >= CharCode.Zero && ch <= CharCode.Nine;
  }

  private isAsciiLetter(ch: number): boolean {
    return (
      (ch >= CharCode.UppercaseA && ch <= CharCode.UppercaseZ) ||
      (ch >= CharCode.LowercaseA && ch <= CharCode.LowercaseZ)
    );
  }

  private isIdentifierStart(ch: number): boolean {
    if (this.isAsciiLetter(ch) || ch === CharCode.Underscore) return true;
    if (ch === CharCode.Dollar) return this.options.dollarInIdentifiers;
    // Non-ASCII letters are accepted wholesale; close enough for usage detection
    return ch > 0x7f && ch !== CharCode.NonBreakingSpace && ch !== CharCode.ByteOrderMark;
  }

  private isIdentifierPart(ch: number): boolean {
    return this.isIdentifierStart(ch) || this.isDigit(ch);
  }

  private makeToken(kind: TokenKind, start: number, value?: string): Token {
    const text = this.source.slice(start, this.index);
    return { kind, text, value: value ?? text, start, end: this.index };
  }
}

// ----------------------------------------------------------------------------------------
// CharCode constants
// ----------------------------------------------------------------------------------------

const enum CharCode {
  Tab = 0x0009,
  LineFeed = 0x000a,
  VerticalTab = 0x000b,
  FormFeed = 0x000c,
  CarriageReturn = 0x000d,
  Space = 0x0020,
  Exclamation = 0x0021,
  DoubleQuote = 0x0022,
  Hash = 0x0023,
  Dollar = 0x0024,
  SingleQuote = 0x0027,
  Asterisk = 0x002a,
  Dot = 0x002e,
  Slash = 0x002f,
  Zero = 0x0030,
  Nine = 0x0039,
  Colon = 0x003a,
  UppercaseA = 0x0041,
  UppercaseZ = 0x005a,
  OpenBracket = 0x005b,
  Backslash = 0x005c,
  Underscore = 0x005f,
  Backtick = 0x0060,
  LowercaseA = 0x0061,
  LowercaseB = 0x0062,
  LowercaseR = 0x0072,
  LowercaseZ = 0x007a,
  OpenBrace = 0x007b,
  CloseBrace = 0x007d,
  NonBreakingSpace = 0x00a0,
  ByteOrderMark = 0xfeff,
}
