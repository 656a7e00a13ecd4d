/**
 * Engine - File Pipeline
 *
 * Binds a registry and a declaration syntax, then runs
 * parse → scan → reconcile → rewrite → guard for one file at a time.
 * Each call is a pure function of the file text; pipelines for different
 * files share nothing but the read-only registry.
 */

import type { Diagnostic, FileOutcome, SourceInput } from "../model/types.js";
import { DiagnosticCode } from "../model/types.js";
import type { OwnershipRegistry } from "../registry/registry.js";
import type { DeclarationSyntax } from "../syntax/types.js";
import { parseImportSection } from "../parse/import-section.js";
import { scanUsage } from "../scan/scanner.js";
import { isEmptyPlan, reconcile } from "../reconcile/reconcile.js";
import { renderDeclaration, rewriteImports } from "../rewrite/rewrite.js";
import { diffContent } from "../guard/guard.js";
import { ConfigurationError, ReimportErrorCode } from "../shared/errors.js";
import { debug } from "../shared/debug.js";

export interface ReimporterOptions {
  registry: OwnershipRegistry;
  syntax: DeclarationSyntax;

  /** Template for managed packages without a registry entry (default: the syntax's) */
  defaultTemplate?: string;
}

export interface Reimporter {
  readonly registry: OwnershipRegistry;
  readonly syntax: DeclarationSyntax;

  /** Reconcile one file. Never throws for file content; bad content is skipped. */
  processSource(input: SourceInput): FileOutcome;
}

/**
 * Create a file pipeline.
 *
 * @throws ConfigurationError when a template renders something the parser
 * would not read back as the same declaration; such output would be rewritten
 * again on every run.
 */
export function createReimporter(options: ReimporterOptions): Reimporter {
  const { registry, syntax } = options;
  const defaultTemplate = options.defaultTemplate ?? syntax.defaultTemplate;

  for (const pkg of registry.packages) {
    assertTemplateRoundTrips(syntax, registry.templateFor(pkg) ?? defaultTemplate, pkg);
  }
  assertTemplateRoundTrips(syntax, defaultTemplate, registry.packages[0] ?? "pkg");

  return {
    registry,
    syntax,
    processSource(input: SourceInput): FileOutcome {
      const { path, text } = input;
      const section = parseImportSection(text, syntax);
      const usedSymbols = scanUsage(text, registry, syntax, section);
      const plan = reconcile(usedSymbols, section, registry, { defaultTemplate });
      const next = isEmptyPlan(plan) ? text : rewriteImports(text, plan);
      const change = diffContent(text, next);

      const diagnostics: Diagnostic[] = [
        ...section.skipped.map(
          (skip): Diagnostic => ({
            code: DiagnosticCode.PARSE_SKIP,
            severity: "info",
            message: `left ${JSON.stringify(skip.text)} as is (${skip.reason})`,
            span: skip.span,
          }),
        ),
        ...plan.diagnostics,
      ];

      debug.run("file", { path, change: change.kind, used: usedSymbols.size });
      return { path, originalText: text, section, usedSymbols, plan, change, diagnostics };
    },
  };
}

const SAMPLE_SYMBOLS = ["Alpha", "Beta"] as const;

function assertTemplateRoundTrips(syntax: DeclarationSyntax, template: string, pkg: string): void {
  const rendered = renderDeclaration(template, pkg, SAMPLE_SYMBOLS);
  const section = parseImportSection(rendered, syntax);
  const record = section.records[0];
  const ok =
    section.records.length === 1 &&
    section.skipped.length === 0 &&
    record !== undefined &&
    record.package === pkg &&
    record.symbols.length === SAMPLE_SYMBOLS.length &&
    record.symbols.every((symbol, i) => symbol === SAMPLE_SYMBOLS[i]);

  if (!ok) {
    throw new ConfigurationError(
      `Template for package "${pkg}" renders ${JSON.stringify(rendered)}, which is not a ${syntax.id} declaration of that package`,
      ReimportErrorCode.CONFIG_INVALID_TEMPLATE,
    );
  }
}
