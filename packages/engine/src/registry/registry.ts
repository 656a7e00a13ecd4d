/**
 * Engine - Ownership Registry
 *
 * The authoritative symbol → package table. Built once per run, shared
 * read-only by every file pipeline.
 */

import type { Ownership, PackageId, SymbolName } from "../model/types.js";
import { ConfigurationError, ReimportErrorCode } from "../shared/errors.js";
import type { ReimportErrorCodeType } from "../shared/errors.js";
import { debug } from "../shared/debug.js";

/* =============================================================================
 * DEFINITION
 * ============================================================================= */

export interface RegistryEntryDefinition {
  package: PackageId;
  symbols: readonly SymbolName[];

  /** Declaration template; falls back to the definition's default */
  template?: string;
}

/**
 * A package rename applied to existing declarations
 * (e.g. `app::event` → `app_core::event`).
 */
export interface PackageMove {
  from: PackageId;
  to: PackageId;
}

export interface RegistryDefinition {
  entries: readonly RegistryEntryDefinition[];

  /** Package prefixes owned by the tool besides the registry's own packages */
  families?: readonly PackageId[];

  moves?: readonly PackageMove[];

  /** Template for entries that name none (usually the syntax default) */
  defaultTemplate?: string;
}

export const SYMBOLS_PLACEHOLDER = "${symbols}";
export const PACKAGE_PLACEHOLDER = "${package}";

const IDENTIFIER = /^[\p{L}_$][\p{L}\p{N}_$]*$/u;

/** Separators that continue a package path below a prefix */
const PATH_SEPARATORS = ["::", "/"] as const;

/**
 * Whether `pkg` is `prefix` itself or a path below it.
 * `a::b` is below `a`; `a_core` is not.
 */
export function isPackageWithin(pkg: PackageId, prefix: PackageId): boolean {
  if (pkg === prefix) return true;
  if (!pkg.startsWith(prefix)) return false;
  const rest = pkg.slice(prefix.length);
  return PATH_SEPARATORS.some((sep) => rest.startsWith(sep));
}

/* =============================================================================
 * REGISTRY
 * ============================================================================= */

export class OwnershipRegistry {
  readonly #owners: ReadonlyMap<SymbolName, Ownership>;
  readonly #symbolRanks: ReadonlyMap<SymbolName, number>;
  readonly #packageRanks: ReadonlyMap<PackageId, number>;
  readonly #templates: ReadonlyMap<PackageId, string>;
  readonly #families: readonly PackageId[];
  readonly #moves: readonly PackageMove[];

  private constructor(
    owners: Map<SymbolName, Ownership>,
    templates: Map<PackageId, string>,
    families: readonly PackageId[],
    moves: readonly PackageMove[],
  ) {
    this.#owners = owners;
    this.#templates = templates;
    this.#families = families;
    // Longest prefix first so the most specific move wins
    this.#moves = [...moves].sort((a, b) => b.from.length - a.from.length);

    const symbolRanks = new Map<SymbolName, number>();
    for (const symbol of owners.keys()) symbolRanks.set(symbol, symbolRanks.size);
    this.#symbolRanks = symbolRanks;

    const packageRanks = new Map<PackageId, number>();
    for (const pkg of templates.keys()) packageRanks.set(pkg, packageRanks.size);
    this.#packageRanks = packageRanks;
  }

  /**
   * Build a registry, collecting every configuration problem before failing.
   *
   * @throws ConfigurationError when a symbol belongs to two packages, a package
   * has two templates, or a name or template is malformed.
   */
  static create(definition: RegistryDefinition): OwnershipRegistry {
    const owners = new Map<SymbolName, Ownership>();
    const templates = new Map<PackageId, string>();
    const problems: { code: ReimportErrorCodeType; message: string }[] = [];
    const claims = new Map<SymbolName, PackageId[]>();

    for (const entry of definition.entries) {
      const pkg = entry.package.trim();
      if (!pkg) {
        problems.push({ code: ReimportErrorCode.CONFIG_INVALID_PACKAGE, message: "registry entry has an empty package name" });
        continue;
      }

      const template = entry.template ?? definition.defaultTemplate;
      if (template === undefined) {
        problems.push({ code: ReimportErrorCode.CONFIG_INVALID_TEMPLATE, message: `package "${pkg}" has no import template` });
        continue;
      }
      if (!template.includes(SYMBOLS_PLACEHOLDER)) {
        problems.push({
          code: ReimportErrorCode.CONFIG_INVALID_TEMPLATE,
          message: `template for package "${pkg}" does not contain ${SYMBOLS_PLACEHOLDER}`,
        });
        continue;
      }

      const existingTemplate = templates.get(pkg);
      if (existingTemplate !== undefined && existingTemplate !== template) {
        problems.push({
          code: ReimportErrorCode.CONFIG_TEMPLATE_CONFLICT,
          message: `package "${pkg}" is registered with two different templates`,
        });
        continue;
      }
      templates.set(pkg, template);

      for (const symbol of entry.symbols) {
        if (!IDENTIFIER.test(symbol)) {
          problems.push({
            code: ReimportErrorCode.CONFIG_INVALID_SYMBOL,
            message: `"${symbol}" (package "${pkg}") is not an identifier`,
          });
          continue;
        }
        const claimants = claims.get(symbol) ?? [];
        if (!claimants.includes(pkg)) claimants.push(pkg);
        claims.set(symbol, claimants);
        if (!owners.has(symbol)) owners.set(symbol, { package: pkg, template });
      }
    }

    for (const [symbol, packages] of claims) {
      if (packages.length > 1) {
        problems.push({
          code: ReimportErrorCode.CONFIG_AMBIGUOUS_SYMBOL,
          message: `symbol "${symbol}" is registered under ${packages.map((p) => `"${p}"`).join(" and ")}`,
        });
      }
    }

    const moves = definition.moves ?? [];
    for (const move of moves) {
      if (!move.from.trim() || !move.to.trim() || move.from === move.to) {
        problems.push({
          code: ReimportErrorCode.CONFIG_INVALID_MOVE,
          message: `invalid package move "${move.from}" -> "${move.to}"`,
        });
      }
    }

    const first = problems[0];
    if (first) {
      const summary =
        problems.length === 1
          ? first.message
          : `${problems.length} registry problems, first: ${first.message}`;
      throw new ConfigurationError(
        `Invalid ownership registry: ${summary}`,
        first.code,
        problems.map((p) => p.message),
      );
    }

    debug.registry("create", {
      symbols: owners.size,
      packages: templates.size,
      families: definition.families?.length ?? 0,
      moves: moves.length,
    });

    return new OwnershipRegistry(owners, templates, definition.families ?? [], moves);
  }

  /** Owning package of a symbol; undefined for symbols this tool does not manage. */
  resolve(symbol: SymbolName): Ownership | undefined {
    return this.#owners.get(symbol);
  }

  has(symbol: SymbolName): boolean {
    return this.#owners.has(symbol);
  }

  /** Every registered symbol, in registry order. */
  get symbols(): readonly SymbolName[] {
    return [...this.#owners.keys()];
  }

  /** Every registered package, in order of first appearance. */
  get packages(): readonly PackageId[] {
    return [...this.#templates.keys()];
  }

  templateFor(pkg: PackageId): string | undefined {
    return this.#templates.get(pkg);
  }

  ownsPackage(pkg: PackageId): boolean {
    return this.#templates.has(pkg);
  }

  /** Registered packages and members of a configured family. */
  isManaged(pkg: PackageId): boolean {
    return this.ownsPackage(pkg) || this.#families.some((family) => isPackageWithin(pkg, family));
  }

  /** Package after applying the most specific configured move, if any applies. */
  resolveMove(pkg: PackageId): PackageId | undefined {
    for (const move of this.#moves) {
      if (isPackageWithin(pkg, move.from)) {
        return move.to + pkg.slice(move.from.length);
      }
    }
    return undefined;
  }

  /** Sort key: registry order, unknown symbols last. */
  symbolRank(symbol: SymbolName): number {
    return this.#symbolRanks.get(symbol) ?? Number.MAX_SAFE_INTEGER;
  }

  /** Sort key: registry order, unknown packages last. */
  packageRank(pkg: PackageId): number {
    return this.#packageRanks.get(pkg) ?? Number.MAX_SAFE_INTEGER;
  }
}
