/**
 * Engine - Import Section Parser
 *
 * Reads the leading contiguous run of import declarations of a file. Only the
 * syntax's fixed declaration shape becomes an ImportRecord; anything else that
 * looks like an import is recorded as skipped and left alone downstream.
 */

import type { ImportRecord, ImportSection, SectionMember, SkippedDeclaration } from "../model/types.js";
import type { DeclarationSyntax } from "../syntax/types.js";
import { TokenCursor } from "../syntax/cursor.js";
import { debug } from "../shared/debug.js";

/**
 * Parse the import section at the top of `text`.
 *
 * Blank lines and comments between declarations are skipped; parsing stops at
 * the first statement that is neither an import-like declaration nor part of
 * the file header.
 */
export function parseImportSection(text: string, syntax: DeclarationSyntax): ImportSection {
  const cursor = TokenCursor.from(text, syntax.lexer);
  const records: ImportRecord[] = [];
  const skipped: SkippedDeclaration[] = [];
  const members: SectionMember[] = [];

  for (let first = cursor.peek(); first !== undefined; first = cursor.peek()) {
    const match = syntax.matchStatement(cursor);
    if (match.kind === "other") break;

    const last = cursor.at(match.end - 1) ?? first;
    const span = { start: first.start, end: Math.max(first.end, last.end) };
    const declText = text.slice(span.start, span.end);

    switch (match.kind) {
      case "record": {
        const record: ImportRecord = { package: match.package, symbols: match.symbols, span, text: declText };
        records.push(record);
        members.push({ kind: "record", record });
        break;
      }
      case "skipped": {
        const declaration: SkippedDeclaration = {
          span,
          text: declText,
          reason: match.reason,
          bindings: match.bindings,
        };
        skipped.push(declaration);
        members.push({ kind: "skipped", declaration });
        debug.parse("skip", { reason: match.reason, text: declText });
        break;
      }
      case "preamble":
        members.push({ kind: "preamble", span });
        break;
    }

    cursor.index = Math.max(match.end, cursor.index + 1);
  }

  const firstMember = members[0];
  const lastMember = members[members.length - 1];
  const sectionSpan =
    firstMember && lastMember ? { start: memberSpan(firstMember).start, end: memberSpan(lastMember).end } : null;

  debug.parse("section", {
    records: records.length,
    skipped: skipped.length,
    preamble: members.length - records.length - skipped.length,
  });

  return {
    records,
    skipped,
    members,
    span: sectionSpan,
    end: cursor.peek()?.start ?? text.length,
  };
}

export function memberSpan(member: SectionMember): { start: number; end: number } {
  switch (member.kind) {
    case "record":
      return member.record.span;
    case "skipped":
      return member.declaration.span;
    case "preamble":
      return member.span;
  }
}
