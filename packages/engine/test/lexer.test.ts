/**
 * Engine - Lexer Tests
 */

import { describe, it, expect } from "vitest";
import { Lexer, TokenKind, esmSyntax, isTrivia, tokenize, useSyntax } from "@reimport/engine";
import type { LexerOptions, Token } from "@reimport/engine";

function significant(source: string, options: LexerOptions): Token[] {
  return tokenize(source, options).filter((t) => !isTrivia(t));
}

function texts(source: string, options: LexerOptions): string[] {
  return significant(source, options).map((t) => t.text);
}

describe("tokenize", () => {
  it("reproduces the source when token texts are joined", () => {
    const source = "use a::{B};\r\n// note\nfn main() { let s = \"x\"; }\n";
    const tokens = tokenize(source, useSyntax.lexer);
    expect(tokens.map((t) => t.text).join("")).toBe(source);
  });

  it("reads :: as one punctuation token", () => {
    const tokens = significant("a::B", useSyntax.lexer);
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      [TokenKind.Identifier, "a"],
      [TokenKind.Punctuation, "::"],
      [TokenKind.Identifier, "B"],
    ]);
  });

  it("keeps identifiers in strings and comments out of the identifier stream", () => {
    const tokens = tokenize('let s = "Widget"; // Widget', useSyntax.lexer);
    const identifiers = tokens.filter((t) => t.kind === TokenKind.Identifier).map((t) => t.text);
    expect(identifiers).toEqual(["let", "s"]);

    const literal = tokens.find((t) => t.kind === TokenKind.StringLiteral);
    expect(literal?.text).toBe('"Widget"');
    expect(literal?.value).toBe("Widget");

    const comment = tokens.find((t) => t.kind === TokenKind.LineComment);
    expect(comment?.text).toBe("// Widget");
  });

  it("splits CRLF into one newline token", () => {
    const tokens = tokenize("a\r\nb", useSyntax.lexer);
    expect(tokens.map((t) => t.kind)).toEqual([TokenKind.Identifier, TokenKind.Newline, TokenKind.Identifier]);
    expect(tokens[1]?.text).toBe("\r\n");
  });

  it("marks unterminated block comments", () => {
    const tokens = tokenize("/* open", useSyntax.lexer);
    expect(tokens).toHaveLength(1);
    expect(tokens[0]?.kind).toBe(TokenKind.BlockComment);
    expect(tokens[0]?.unterminated).toBe(true);
  });
});

describe("block comments", () => {
  const source = "/* a /* b */ c */ Widget";

  it("nest in use files", () => {
    const tokens = significant(source, useSyntax.lexer);
    expect(tokens.map((t) => t.text)).toEqual(["Widget"]);
  });

  it("do not nest in esm files", () => {
    expect(texts(source, esmSyntax.lexer)).toEqual(["c", "*", "/", "Widget"]);
  });
});

describe("rust literals", () => {
  it("reads raw strings with hashes", () => {
    const tokens = significant('r#"a "quoted" Widget"# X', useSyntax.lexer);
    expect(tokens[0]?.kind).toBe(TokenKind.StringLiteral);
    expect(tokens[0]?.text).toBe('r#"a "quoted" Widget"#');
    expect(tokens[0]?.value).toBe('a "quoted" Widget');
    expect(tokens[1]?.text).toBe("X");
  });

  it("tells char literals from lifetimes", () => {
    const tokens = significant("'a' 'b x", useSyntax.lexer);
    expect(tokens.map((t) => [t.kind, t.text])).toEqual([
      [TokenKind.StringLiteral, "'a'"],
      [TokenKind.Lifetime, "'b"],
      [TokenKind.Identifier, "x"],
    ]);
    expect(tokens[0]?.value).toBe("a");
  });

  it("reads raw identifiers by their name", () => {
    const tokens = significant("r#type", useSyntax.lexer);
    expect(tokens).toHaveLength(1);
    expect(tokens[0]?.kind).toBe(TokenKind.Identifier);
    expect(tokens[0]?.text).toBe("r#type");
    expect(tokens[0]?.value).toBe("type");
  });

  it("reads byte strings", () => {
    const tokens = significant('b"Widget" y', useSyntax.lexer);
    expect(tokens[0]?.kind).toBe(TokenKind.StringLiteral);
    expect(tokens[0]?.text).toBe('b"Widget"');
    expect(tokens[0]?.value).toBe("Widget");
  });

  it("treats #![ at offset 0 as an attribute, not a shebang", () => {
    expect(texts("#![allow(x)]", useSyntax.lexer)[0]).toBe("#");
  });
});

describe("esm literals", () => {
  it("reads single-quoted strings", () => {
    const tokens = significant("'Widget'", esmSyntax.lexer);
    expect(tokens[0]?.kind).toBe(TokenKind.StringLiteral);
    expect(tokens[0]?.value).toBe("Widget");
  });

  it("lexes template interpolations as code", () => {
    expect(texts("`a ${Widget} b`", esmSyntax.lexer)).toEqual(["`a ${", "Widget", "} b`"]);
  });

  it("ends an unterminated single-line string at the line break", () => {
    const tokens = significant("'open\nWidget", esmSyntax.lexer);
    expect(tokens[0]?.unterminated).toBe(true);
    expect(tokens[0]?.text).toBe("'open");
    expect(tokens[1]?.text).toBe("Widget");
  });

  it("accepts $ in identifiers", () => {
    expect(texts("$store.x", esmSyntax.lexer)).toEqual(["$store", ".", "x"]);
  });

  it("reads a shebang line as a comment", () => {
    const tokens = tokenize("#!/usr/bin/env node\nx", esmSyntax.lexer);
    expect(tokens[0]?.kind).toBe(TokenKind.LineComment);
    expect(tokens[0]?.text).toBe("#!/usr/bin/env node");
  });
});

describe("Lexer", () => {
  it("returns null at end of input", () => {
    const lexer = new Lexer("", useSyntax.lexer);
    expect(lexer.next()).toBeNull();
  });

  it("tracks its position", () => {
    const lexer = new Lexer("ab cd", useSyntax.lexer);
    lexer.next();
    expect(lexer.position).toBe(2);
  });
});
