/**
 * Engine - Model Types
 *
 * Shared data shapes flowing between the scan, parse, reconcile and rewrite
 * stages. Everything here is plain data; behavior lives in the stage modules.
 */

/* =============================================================================
 * SOURCE LOCATION
 * ============================================================================= */

/**
 * A span in source text.
 */
export interface Span {
  /** Start offset in UTF-16 code units */
  start: number;

  /** End offset (exclusive) */
  end: number;
}

/* =============================================================================
 * SYMBOLS & PACKAGES
 * ============================================================================= */

/** An identifier that may be imported from a package. */
export type SymbolName = string;

/**
 * Package identifier as written in a declaration:
 * a `::` path for `use` declarations, a module specifier for `esm`.
 */
export type PackageId = string;

/**
 * Where a registry symbol lives.
 */
export interface Ownership {
  package: PackageId;

  /** Declaration template with `${package}` and `${symbols}` placeholders */
  template: string;
}

/* =============================================================================
 * IMPORT SECTION
 * ============================================================================= */

/**
 * One import declaration as written in a file.
 */
export interface ImportRecord {
  package: PackageId;

  /** Declaration order, deduplicated, never empty */
  symbols: readonly SymbolName[];

  /** Exact span of the declaration, terminator included */
  span: Span;

  /** Source text of the declaration */
  text: string;
}

/**
 * A name a declaration brings into scope under its own name, with the
 * package it comes from (`a::b::{X}` binds `X` from `a::b`).
 */
export interface Binding {
  package: PackageId;
  symbol: SymbolName;
}

/**
 * An import-like declaration the parser did not confidently understand.
 * Downstream stages never touch it.
 */
export interface SkippedDeclaration {
  span: Span;
  text: string;
  reason: string;

  /** Plain names it still binds; renamed and glob members are not listed */
  bindings: readonly Binding[];
}

export type SectionMember =
  | { kind: "record"; record: ImportRecord }
  | { kind: "skipped"; declaration: SkippedDeclaration }
  | { kind: "preamble"; span: Span };

/**
 * The leading run of import declarations in a file.
 */
export interface ImportSection {
  records: readonly ImportRecord[];
  skipped: readonly SkippedDeclaration[];

  /** Every statement read, in source order */
  members: readonly SectionMember[];

  /** From the first member's start to the last member's end; null when empty */
  span: Span | null;

  /** Offset of the first statement that is not part of the section */
  end: number;
}

/* =============================================================================
 * EDIT PLAN
 * ============================================================================= */

/**
 * A declaration that does not exist yet.
 */
export interface PlannedImport {
  package: PackageId;
  symbols: readonly SymbolName[];
  template: string;
}

/**
 * An existing record regenerated with a new package and/or symbol list.
 */
export interface RecordMerge extends PlannedImport {
  record: ImportRecord;
}

/**
 * Where additions go.
 *
 * - `after`: right after a declaration; each addition starts a new line
 * - `before`: ahead of the first statement of a file with no import section
 */
export type InsertionAnchor =
  | { kind: "after"; offset: number; record: ImportRecord | null }
  | { kind: "before"; offset: number };

export interface EditPlan {
  removals: readonly ImportRecord[];
  merges: readonly RecordMerge[];
  additions: readonly PlannedImport[];
  anchor: InsertionAnchor;
  diagnostics: readonly Diagnostic[];
}

/* =============================================================================
 * DIAGNOSTICS
 * ============================================================================= */

export type DiagnosticSeverity = "info" | "warning";

export const DiagnosticCode = {
  PARSE_SKIP: "parse-skip",
  FOREIGN_BINDING: "foreign-binding",
  STALE_RECORD: "stale-record",
  DUPLICATE_RECORD: "duplicate-record",
} as const;

export type DiagnosticCodeType = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export interface Diagnostic {
  code: DiagnosticCodeType;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
}

/* =============================================================================
 * FILE OUTCOME
 * ============================================================================= */

export type ContentChange =
  | { kind: "changed"; text: string }
  | { kind: "unchanged" };

/**
 * Input to a file pipeline. The text comes from an external reader.
 */
export interface SourceInput {
  path: string;
  text: string;
}

export interface FileOutcome {
  path: string;
  originalText: string;
  section: ImportSection;
  usedSymbols: ReadonlySet<SymbolName>;
  plan: EditPlan;
  change: ContentChange;
  diagnostics: readonly Diagnostic[];
}
