/**
 * CLI - Configuration
 *
 * Loads `reimport.config.json`, validates it, and builds the registry and file
 * pipeline from it. Any problem is a ConfigurationError raised before a single
 * source file is read.
 */

import {
  ConfigurationError,
  OwnershipRegistry,
  ReimportErrorCode,
  createReimporter,
  getSyntax,
} from "@reimport/engine";
import type {
  DeclarationSyntax,
  PackageMove,
  RegistryEntryDefinition,
  Reimporter,
} from "@reimport/engine";
import type { FileSystemHost } from "../host/types.js";
import { describeError } from "../errors.js";

export const DEFAULT_CONFIG_FILE = "reimport.config.json";

export const DEFAULT_IGNORE: readonly string[] = ["node_modules", ".git", "target", "dist"];

export interface ReimportConfig {
  syntax: DeclarationSyntax;
  extensions: readonly string[];
  ignore: readonly string[];
  /** Template for entries without their own; defaults to the syntax's */
  template: string;
  families: readonly string[];
  moves: readonly PackageMove[];
  packages: readonly RegistryEntryDefinition[];
}

/* =============================================================================
 * LOADING
 * ============================================================================= */

/**
 * Read and validate a configuration file.
 *
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export async function loadConfig(path: string, host: FileSystemHost): Promise<ReimportConfig> {
  let raw: string;
  try {
    raw = await host.readFile(path);
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration ${path}: ${describeError(err)}`, ReimportErrorCode.CONFIG_INVALID);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Configuration ${path} is not valid JSON: ${describeError(err)}`, ReimportErrorCode.CONFIG_INVALID);
  }

  return parseConfig(json);
}

/**
 * Validate an already-parsed configuration object.
 *
 * @throws ConfigurationError naming the offending JSON path
 */
export function parseConfig(json: unknown): ReimportConfig {
  const root = expectObject(json, "$");

  const syntaxId = optionalString(root["syntax"], "$.syntax") ?? "use";
  const syntax = getSyntax(syntaxId);

  const packagesValue = root["packages"];
  if (!Array.isArray(packagesValue) || packagesValue.length === 0) {
    fail("$.packages", "must be a non-empty array");
  }
  const packages = packagesValue.map((value: unknown, i): RegistryEntryDefinition => {
    const path = `$.packages[${i}]`;
    const entry = expectObject(value, path);
    const template = optionalString(entry["template"], `${path}.template`);
    return {
      package: expectString(entry["package"], `${path}.package`),
      symbols: expectStringArray(entry["symbols"], `${path}.symbols`),
      ...(template !== undefined ? { template } : {}),
    };
  });

  const movesValue = root["moves"] ?? [];
  if (!Array.isArray(movesValue)) fail("$.moves", "must be an array");
  const moves = movesValue.map((value: unknown, i): PackageMove => {
    const path = `$.moves[${i}]`;
    const move = expectObject(value, path);
    return { from: expectString(move["from"], `${path}.from`), to: expectString(move["to"], `${path}.to`) };
  });

  return {
    syntax,
    extensions: optionalStringArray(root["extensions"], "$.extensions") ?? syntax.extensions,
    ignore: optionalStringArray(root["ignore"], "$.ignore") ?? DEFAULT_IGNORE,
    template: optionalString(root["template"], "$.template") ?? syntax.defaultTemplate,
    families: optionalStringArray(root["families"], "$.families") ?? [],
    moves,
    packages,
  };
}

/**
 * Build the registry and the file pipeline a configuration describes.
 *
 * @throws ConfigurationError for ambiguous ownership or unusable templates
 */
export function createReimporterFromConfig(config: ReimportConfig): Reimporter {
  const registry = OwnershipRegistry.create({
    entries: config.packages,
    families: config.families,
    moves: config.moves,
    defaultTemplate: config.template,
  });
  return createReimporter({ registry, syntax: config.syntax, defaultTemplate: config.template });
}

/* =============================================================================
 * VALIDATION HELPERS
 * ============================================================================= */

function fail(path: string, problem: string): never {
  throw new ConfigurationError(`Invalid configuration: ${path} ${problem}`, ReimportErrorCode.CONFIG_INVALID);
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    fail(path, "must be an object");
  }
  return Object.fromEntries(Object.entries(value));
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.length === 0) fail(path, "must be a non-empty string");
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : expectString(value, path);
}

function expectStringArray(value: unknown, path: string): string[] {
  if (!Array.isArray(value)) fail(path, "must be an array of strings");
  return value.map((item: unknown, i) => expectString(item, `${path}[${i}]`));
}

function optionalStringArray(value: unknown, path: string): string[] | undefined {
  return value === undefined ? undefined : expectStringArray(value, path);
}
