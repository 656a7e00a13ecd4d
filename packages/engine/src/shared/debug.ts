/**
 * Debug Channels
 *
 * Targeted debug logging for following what the engine decides per file:
 * which symbols were seen, which declarations were read or skipped, and why a
 * record is merged, removed or added.
 *
 * ## Usage
 *
 * Enable via environment variable:
 * ```bash
 * REIMPORT_DEBUG=reconcile reimport ./src     # Just reconciliation
 * REIMPORT_DEBUG=scan,parse reimport ./src    # Multiple channels
 * REIMPORT_DEBUG=* reimport ./src             # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.reconcile("record.stale", { package: record.package });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

/** Configuration for debug output */
export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  /** Include timestamps in output */
  timestamps: boolean;
  /** Custom output function (defaults to console.error, keeping stdout for reports) */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

const CHANNEL_NAMES = ["registry", "scan", "parse", "reconcile", "rewrite", "run"] as const;

export type DebugChannelName = (typeof CHANNEL_NAMES)[number];

/** Parse REIMPORT_DEBUG environment variable */
function parseDebugEnv(): Set<string> {
  const env = process.env["REIMPORT_DEBUG"] ?? "";
  return parseChannelList(env);
}

function parseChannelList(value: string): Set<string> {
  if (!value || value === "0" || value === "false") return new Set();
  if (value === "*" || value === "1" || value === "true") {
    return new Set(["*"]);
  }
  return new Set(value.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 60) return `"${value.slice(0, 57)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 6) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

function rebuildChannels(): void {
  for (const name of CHANNEL_NAMES) {
    debug[name] = createChannel(name);
  }
}

/**
 * Re-read REIMPORT_DEBUG and recreate every channel.
 */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  rebuildChannels();
}

/**
 * Enable channels from code (e.g. a `--verbose` flag), in addition to those
 * named by REIMPORT_DEBUG. Accepts the same syntax as the variable.
 */
export function enableDebugChannels(channels: string): void {
  for (const channel of parseChannelList(channels)) {
    enabledChannels.add(channel);
  }
  rebuildChannels();
}

/**
 * Configure debug output format.
 */
export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for conditional expensive computations.
 */
export function isDebugEnabled(channel?: DebugChannelName): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

/**
 * Debug channels for each engine stage.
 */
export const debug: Record<DebugChannelName, DebugChannel> = {
  /** Registry construction */
  registry: createChannel("registry"),

  /** Symbol usage scanning */
  scan: createChannel("scan"),

  /** Import section parsing */
  parse: createChannel("parse"),

  /** Edit planning */
  reconcile: createChannel("reconcile"),

  /** Applying edits */
  rewrite: createChannel("rewrite"),

  /** Batch runs over a tree */
  run: createChannel("run"),
};
