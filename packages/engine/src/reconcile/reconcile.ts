/**
 * Engine - Reconciliation
 *
 * Pure planning step: given the symbols a file uses, its import section and
 * the registry, decide which records to merge, remove or add. Nothing here
 * touches text; the rewriter applies the plan.
 */

import type {
  Diagnostic,
  EditPlan,
  ImportRecord,
  ImportSection,
  InsertionAnchor,
  PackageId,
  PlannedImport,
  RecordMerge,
  SymbolName,
} from "../model/types.js";
import { DiagnosticCode } from "../model/types.js";
import type { OwnershipRegistry } from "../registry/registry.js";
import { debug } from "../shared/debug.js";

export interface ReconcileOptions {
  /** Template for managed packages the registry has no entry for (family members, move targets) */
  defaultTemplate: string;
}

/** A record seen through the configured package moves. */
interface EffectiveRecord {
  record: ImportRecord;
  package: PackageId;
  moved: boolean;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Compute the edits that make `section` consistent with `used` and the registry.
 *
 * - Records of unmanaged packages are never touched.
 * - Symbols declared but not used are never removed from a valid record.
 * - A managed record whose every symbol now belongs to another package is stale:
 *   it is removed, or rewritten to the required symbols if its package is still needed.
 * - Several records for one managed package collapse into the first valid one.
 * - Required packages without a record are added in registry package order.
 * - Symbols a skipped declaration binds from their owner count as imported.
 */
export function reconcile(
  used: ReadonlySet<SymbolName>,
  section: ImportSection,
  registry: OwnershipRegistry,
  options: ReconcileOptions,
): EditPlan {
  const diagnostics: Diagnostic[] = [];

  const effective: EffectiveRecord[] = section.records.map((record) => {
    const moved = registry.resolveMove(record.package);
    return { record, package: moved ?? record.package, moved: moved !== undefined };
  });

  const outside = collectOutsideBindings(effective, section, registry);
  const required = collectRequired(used, outside, registry, diagnostics);

  // Records the tool may edit, grouped by package in file order
  const groups = new Map<PackageId, EffectiveRecord[]>();
  for (const entry of effective) {
    if (!entry.moved && !registry.isManaged(entry.package)) continue;
    const group = groups.get(entry.package) ?? [];
    group.push(entry);
    groups.set(entry.package, group);
  }

  const removals: ImportRecord[] = [];
  const merges: RecordMerge[] = [];

  for (const [pkg, group] of groups) {
    const needed = required.get(pkg) ?? [];
    const valid = group.filter((entry) => !isStale(entry, registry));

    let target: EffectiveRecord | undefined;
    let symbols: SymbolName[] = [];
    if (valid.length > 0) {
      target = valid[0];
      for (const entry of valid) appendUnique(symbols, entry.record.symbols);
      appendUnique(symbols, needed);
    } else if (needed.length > 0) {
      // Nothing in these records is valid any more; reuse the first slot
      target = group[0];
      symbols = [...needed];
    }

    for (const entry of group) {
      if (entry === target) continue;
      removals.push(entry.record);
      const stale = !valid.includes(entry);
      diagnostics.push({
        code: stale ? DiagnosticCode.STALE_RECORD : DiagnosticCode.DUPLICATE_RECORD,
        severity: "info",
        message: stale
          ? `removed import of ${entry.record.package}: its symbols belong to other packages`
          : `merged duplicate import of ${pkg}`,
        span: entry.record.span,
      });
      debug.reconcile(stale ? "record.stale" : "record.duplicate", { package: entry.record.package });
    }

    if (target && (target.moved || !sameSymbols(target.record.symbols, symbols))) {
      merges.push({
        record: target.record,
        package: pkg,
        symbols,
        template: registry.templateFor(pkg) ?? options.defaultTemplate,
      });
      debug.reconcile("record.merge", { package: pkg, from: target.record.package, symbols });
    }
  }

  const additions: PlannedImport[] = [];
  for (const [pkg, symbols] of required) {
    if (groups.has(pkg)) continue;
    additions.push({ package: pkg, symbols, template: registry.templateFor(pkg) ?? options.defaultTemplate });
    debug.reconcile("record.add", { package: pkg, symbols });
  }

  return { removals, merges, additions, anchor: findAnchor(section), diagnostics };
}

/**
 * True when applying the plan would leave the text as it is.
 */
export function isEmptyPlan(plan: EditPlan): boolean {
  return plan.removals.length === 0 && plan.merges.length === 0 && plan.additions.length === 0;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

/**
 * Packages each symbol is bound from by declarations the tool does not edit:
 * records of unmanaged packages and skipped declarations.
 */
function collectOutsideBindings(
  effective: readonly EffectiveRecord[],
  section: ImportSection,
  registry: OwnershipRegistry,
): Map<SymbolName, PackageId[]> {
  const bindings = new Map<SymbolName, PackageId[]>();
  const bind = (symbol: SymbolName, pkg: PackageId): void => {
    const packages = bindings.get(symbol) ?? [];
    if (!packages.includes(pkg)) packages.push(pkg);
    bindings.set(symbol, packages);
  };

  for (const entry of effective) {
    if (entry.moved || registry.isManaged(entry.package)) continue;
    for (const symbol of entry.record.symbols) bind(symbol, entry.package);
  }
  for (const declaration of section.skipped) {
    for (const binding of declaration.bindings) bind(binding.symbol, binding.package);
  }
  return bindings;
}

/**
 * Owning package → used symbols, both in registry order.
 *
 * A symbol a skipped declaration already binds from its owner needs nothing.
 * One bound from any other package still gets the owner's import.
 */
function collectRequired(
  used: ReadonlySet<SymbolName>,
  outside: ReadonlyMap<SymbolName, readonly PackageId[]>,
  registry: OwnershipRegistry,
  diagnostics: Diagnostic[],
): Map<PackageId, SymbolName[]> {
  const ordered = [...used].sort((a, b) => registry.symbolRank(a) - registry.symbolRank(b));
  const byPackage = new Map<PackageId, SymbolName[]>();

  for (const symbol of ordered) {
    const owner = registry.resolve(symbol);
    if (!owner) continue;

    const boundFrom = outside.get(symbol) ?? [];
    if (boundFrom.includes(owner.package)) {
      debug.reconcile("symbol.bound", { symbol, package: owner.package });
      continue;
    }
    if (boundFrom.length > 0) {
      diagnostics.push({
        code: DiagnosticCode.FOREIGN_BINDING,
        severity: "info",
        message: `${symbol} is also imported from ${boundFrom.join(", ")}; adding the import from ${owner.package}`,
      });
    }

    const symbols = byPackage.get(owner.package) ?? [];
    symbols.push(symbol);
    byPackage.set(owner.package, symbols);
  }

  const packages = [...byPackage.keys()].sort((a, b) => registry.packageRank(a) - registry.packageRank(b));
  const required = new Map<PackageId, SymbolName[]>();
  for (const pkg of packages) {
    required.set(pkg, byPackage.get(pkg) ?? []);
  }
  return required;
}

function isStale(entry: EffectiveRecord, registry: OwnershipRegistry): boolean {
  return entry.record.symbols.every((symbol) => {
    const owner = registry.resolve(symbol);
    return owner !== undefined && owner.package !== entry.package;
  });
}

function findAnchor(section: ImportSection): InsertionAnchor {
  const lastRecord = section.records[section.records.length - 1];
  if (lastRecord) {
    return { kind: "after", offset: lastRecord.span.end, record: lastRecord };
  }
  if (section.span) {
    return { kind: "after", offset: section.span.end, record: null };
  }
  return { kind: "before", offset: section.end };
}

function appendUnique(target: SymbolName[], symbols: readonly SymbolName[]): void {
  for (const symbol of symbols) {
    if (!target.includes(symbol)) target.push(symbol);
  }
}

function sameSymbols(a: readonly SymbolName[], b: readonly SymbolName[]): boolean {
  return a.length === b.length && a.every((symbol, i) => symbol === b[i]);
}
