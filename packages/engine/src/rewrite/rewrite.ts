/**
 * Engine - Import Statement Rewriter
 *
 * Turns an EditPlan into text edits and applies them. Only spans of parsed
 * records and the insertion anchor are ever edited.
 */

import type { EditPlan, ImportRecord, PackageId, PlannedImport, SymbolName } from "../model/types.js";
import { PACKAGE_PLACEHOLDER, SYMBOLS_PLACEHOLDER } from "../registry/registry.js";
import { ReimportError, ReimportErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { applyEdits, deleteWithWhitespace, insert, replace, validateEdits } from "./edit.js";
import type { TypedSourceEdit } from "./edit.js";

/**
 * Render a declaration from its template.
 *
 * @example
 * renderDeclaration("use ${package}::{${symbols}};", "ui", ["Widget", "Button"])
 * // "use ui::{Widget, Button};"
 */
export function renderDeclaration(template: string, pkg: PackageId, symbols: readonly SymbolName[]): string {
  return template.replaceAll(PACKAGE_PLACEHOLDER, pkg).replaceAll(SYMBOLS_PLACEHOLDER, symbols.join(", "));
}

export function renderPlanned(planned: PlannedImport): string {
  return renderDeclaration(planned.template, planned.package, planned.symbols);
}

/** `\r\n` when the file already uses it, `\n` otherwise. */
export function detectLineEnding(text: string): string {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

/**
 * Build the text edits for a plan.
 *
 * Additions go one per line after the anchor, indented like the anchor's line.
 * When the anchor record is itself merged or removed, the additions are folded
 * into that record's edit so no two edits touch the same offset.
 */
export function planEdits(text: string, plan: EditPlan): TypedSourceEdit[] {
  const eol = detectLineEnding(text);
  const anchor = plan.anchor;
  const anchorRecord: ImportRecord | null = anchor.kind === "after" ? anchor.record : null;
  const indent = anchor.kind === "after" ? lineIndent(text, anchorRecord?.span.start ?? anchor.offset) : "";
  const added = plan.additions.map(renderPlanned).join(eol + indent);

  const edits: TypedSourceEdit[] = [];
  let additionsPlaced = plan.additions.length === 0;

  for (const merge of plan.merges) {
    let newText = renderPlanned(merge);
    if (merge.record === anchorRecord && !additionsPlaced) {
      newText += eol + indent + added;
      additionsPlaced = true;
    }
    edits.push(replace(merge.record.span, newText));
  }

  for (const record of plan.removals) {
    if (record === anchorRecord && !additionsPlaced) {
      edits.push(replace(record.span, added));
      additionsPlaced = true;
    } else {
      edits.push(deleteWithWhitespace(text, record.span));
    }
  }

  if (!additionsPlaced) {
    if (anchor.kind === "after") {
      edits.push(insert(anchor.offset, eol + indent + added));
    } else {
      // A blank line separates the new section from the code below it
      const trailing = anchor.offset >= text.length ? eol : eol + eol;
      edits.push(insert(anchor.offset, added + trailing));
    }
  }

  return edits;
}

/**
 * Apply a plan to `text`. An empty plan returns `text` unchanged.
 *
 * @throws ReimportError when the plan's edits overlap (a bug in the plan).
 */
export function rewriteImports(text: string, plan: EditPlan): string {
  const edits = planEdits(text, plan);
  if (edits.length === 0) return text;

  if (!validateEdits(edits)) {
    throw new ReimportError("Import edits overlap", ReimportErrorCode.EDIT_CONFLICT);
  }

  debug.rewrite("apply", {
    merges: plan.merges.length,
    removals: plan.removals.length,
    additions: plan.additions.length,
  });
  return applyEdits(text, edits);
}

function lineIndent(text: string, offset: number): string {
  const lineStart = text.lastIndexOf("\n", offset - 1) + 1;
  const match = /^[ \t]*/.exec(text.slice(lineStart, offset));
  return match ? match[0] : "";
}
