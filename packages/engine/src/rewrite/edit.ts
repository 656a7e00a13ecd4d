/**
 * Engine - Source Editing
 *
 * Span edits over the original text. Every edit is a replacement of a
 * (possibly empty) range; positions always refer to the text before any edit.
 */

import type { Span } from "../model/types.js";

/* =============================================================================
 * EDIT TYPES
 * ============================================================================= */

export interface TypedTextEdit {
  type: "replace";
  span: Span;
  newText: string;
}

export interface TypedInsertion {
  type: "insert";
  position: number;
  text: string;
}

export interface TypedDeletion {
  type: "delete";
  span: Span;
}

export type TypedSourceEdit = TypedTextEdit | TypedInsertion | TypedDeletion;

/** An edit seen as "replace [start, end) with text" */
interface Range {
  start: number;
  end: number;
  text: string;
  insertion: boolean;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Apply edits against `source` in one pass from the top.
 * At a shared offset an insertion goes ahead of the replacement starting there.
 */
export function applyEdits(source: string, edits: readonly TypedSourceEdit[]): string {
  const ranges = sortRanges(edits);
  let result = "";
  let cursor = 0;
  for (const range of ranges) {
    result += source.slice(cursor, range.start) + range.text;
    cursor = Math.max(cursor, range.end);
  }
  return result + source.slice(cursor);
}

export function replace(span: Span, newText: string): TypedSourceEdit {
  return { type: "replace", span, newText };
}

export function insert(position: number, text: string): TypedSourceEdit {
  return { type: "insert", position, text };
}

/**
 * The span widened to its whole line: indentation before it, and trailing
 * blanks plus one line break (`\n` or `\r\n`) after it.
 */
export function extendSpanWithWhitespace(source: string, span: Span): Span {
  let start = span.start;
  while (start > 0 && isBlank(source[start - 1])) start--;

  let end = span.end;
  while (end < source.length && isBlank(source[end])) end++;
  if (source.startsWith("\r\n", end)) end += 2;
  else if (source[end] === "\n") end++;

  return { start, end };
}

/** Delete `span` together with the rest of its line. */
export function deleteWithWhitespace(source: string, span: Span): TypedSourceEdit {
  return { type: "delete", span: extendSpanWithWhitespace(source, span) };
}

/**
 * True when no two edits touch the same source text. Edits may meet at an
 * offset, and an insertion may sit where a replacement starts.
 */
export function validateEdits(edits: readonly TypedSourceEdit[]): boolean {
  let reached = 0;
  for (const range of sortRanges(edits)) {
    if (range.start < reached) return false;
    if (!range.insertion) reached = range.end;
  }
  return true;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function toRange(edit: TypedSourceEdit): Range {
  switch (edit.type) {
    case "replace":
      return { start: edit.span.start, end: edit.span.end, text: edit.newText, insertion: false };
    case "delete":
      return { start: edit.span.start, end: edit.span.end, text: "", insertion: false };
    case "insert":
      return { start: edit.position, end: edit.position, text: edit.text, insertion: true };
  }
}

/** Stable: edits at one offset keep their given order, insertions first. */
function sortRanges(edits: readonly TypedSourceEdit[]): Range[] {
  return edits.map(toRange).sort((a, b) => a.start - b.start || Number(b.insertion) - Number(a.insertion));
}

function isBlank(char: string | undefined): boolean {
  return char === " " || char === "\t";
}
