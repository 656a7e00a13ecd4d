/**
 * @reimport/engine
 *
 * Rewrite the import section of source files so every symbol a file uses is
 * imported from the package that owns it now.
 *
 * @example
 * ```typescript
 * import { OwnershipRegistry, createReimporter, useSyntax } from "@reimport/engine";
 *
 * const registry = OwnershipRegistry.create({
 *   defaultTemplate: useSyntax.defaultTemplate,
 *   entries: [{ package: "ui", symbols: ["Widget"] }],
 * });
 * const reimporter = createReimporter({ registry, syntax: useSyntax });
 *
 * const outcome = reimporter.processSource({ path: "src/main.rs", text });
 * if (outcome.change.kind === "changed") {
 *   // write outcome.change.text
 * }
 * ```
 */

// Pipeline
export { createReimporter } from "./pipeline/pipeline.js";
export type { Reimporter, ReimporterOptions } from "./pipeline/pipeline.js";

// Model types
export type {
  Span,
  SymbolName,
  PackageId,
  Ownership,
  ImportRecord,
  SkippedDeclaration,
  Binding,
  SectionMember,
  ImportSection,
  PlannedImport,
  RecordMerge,
  InsertionAnchor,
  EditPlan,
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticCodeType,
  ContentChange,
  SourceInput,
  FileOutcome,
} from "./model/types.js";
export { DiagnosticCode } from "./model/types.js";

// Registry
export { OwnershipRegistry, isPackageWithin, PACKAGE_PLACEHOLDER, SYMBOLS_PLACEHOLDER } from "./registry/registry.js";
export type { RegistryDefinition, RegistryEntryDefinition, PackageMove } from "./registry/registry.js";

// Stages (for advanced use)
export { parseImportSection, memberSpan } from "./parse/import-section.js";
export { scanUsage, scanTokens } from "./scan/scanner.js";
export { reconcile, isEmptyPlan } from "./reconcile/reconcile.js";
export type { ReconcileOptions } from "./reconcile/reconcile.js";
export { rewriteImports, planEdits, renderDeclaration, renderPlanned, detectLineEnding } from "./rewrite/rewrite.js";
export { diffContent, isChanged } from "./guard/guard.js";

// Edit utilities
export {
  applyEdits,
  replace,
  insert,
  deleteWithWhitespace,
  extendSpanWithWhitespace,
  validateEdits,
} from "./rewrite/edit.js";
export type { TypedSourceEdit, TypedTextEdit, TypedInsertion, TypedDeletion } from "./rewrite/edit.js";

// Syntaxes & lexer
export { getSyntax, isSyntaxId, useSyntax, esmSyntax, TokenCursor } from "./syntax/index.js";
export type { DeclarationSyntax, StatementMatch, SyntaxId } from "./syntax/index.js";
export { Lexer, TokenKind, tokenize, isTrivia, isComment } from "./lexer/lexer.js";
export type { Token, LexerOptions } from "./lexer/lexer.js";

// Errors & debugging
export { ReimportError, ConfigurationError, ReimportErrorCode, isConfigurationError } from "./shared/errors.js";
export type { ReimportErrorCodeType } from "./shared/errors.js";
export { debug, configureDebug, enableDebugChannels, refreshDebugChannels, isDebugEnabled } from "./shared/debug.js";
export type { DebugChannel, DebugChannelName, DebugConfig, DebugData } from "./shared/debug.js";
