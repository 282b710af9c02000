/**
 * Debug Channels
 *
 * One channel per part of the build, each a function that prints a single
 * line when its channel is switched on and does nothing otherwise:
 *
 * ```bash
 * SHADERWEAVE_DEBUG=walk npm run build          # the tree walk
 * SHADERWEAVE_DEBUG=walk,extension npm test     # several channels
 * SHADERWEAVE_DEBUG=* npm test                  # all of them
 * ```
 *
 * ```typescript
 * debug.walk("dir", { dir, files: files.length });
 * ```
 *
 * Channels: `walk` (directory traversal), `compile` (resolution and
 * linking), `extension` (hook dispatch), `codec` (mangle/unmangle),
 * `lookup` (artifact lookup), `vite` (plugin lifecycle).
 */

export type DebugChannelName = "walk" | "compile" | "extension" | "codec" | "lookup" | "vite";

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export type Debug = Record<DebugChannelName, DebugChannel>;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Where lines go (default: console.log) */
  output: (message: string) => void;
}

export const DEBUG_ENV = "SHADERWEAVE_DEBUG";

const ALL = "*";
const MAX_STRING = 60;
const MAX_INLINE_ITEMS = 3;

let config: DebugConfig = { format: "pretty", timestamps: false, output: console.log };
let enabled = readEnabledChannels();

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

export const debug: Debug = createChannels();

/** Re-read SHADERWEAVE_DEBUG and swap every channel for its new state. */
export function refreshDebugChannels(): void {
  enabled = readEnabledChannels();
  Object.assign(debug, createChannels());
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/** Whether `channel` is on, or without a channel, whether any is. */
export function isDebugEnabled(channel?: string): boolean {
  return channel === undefined ? enabled.size > 0 : channelEnabled(channel);
}

/* =============================================================================
 * CHANNELS
 * ============================================================================= */

function readEnabledChannels(): Set<string> {
  const value = (process.env[DEBUG_ENV] ?? "").trim();
  switch (value) {
    case "":
    case "0":
    case "false":
      return new Set();
    case ALL:
    case "1":
    case "true":
      return new Set([ALL]);
    default:
      return new Set(value.split(",").map((name) => name.trim().toLowerCase()));
  }
}

function channelEnabled(channel: string): boolean {
  return enabled.has(ALL) || enabled.has(channel.toLowerCase());
}

function createChannels(): Debug {
  const channel = (name: DebugChannelName): DebugChannel =>
    channelEnabled(name) ? (point, data) => config.output(render(name, point, data)) : () => {};
  return {
    walk: channel("walk"),
    compile: channel("compile"),
    extension: channel("extension"),
    codec: channel("codec"),
    lookup: channel("lookup"),
    vite: channel("vite"),
  };
}

/* =============================================================================
 * RENDERING
 * ============================================================================= */

function render(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    const record: Record<string, unknown> = { channel, point };
    if (data) record.data = data;
    if (config.timestamps) record.timestamp = Date.now();
    return JSON.stringify(record);
  }

  const stamp = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const entries = data ? Object.entries(data) : [];
  const fields = entries.length > 0
    ? ` { ${entries.map(([key, value]) => `${key}=${renderValue(value)}`).join(", ")} }`
    : "";
  return `${stamp}[${channel}.${point}]${fields}`;
}

function renderValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return value.length > MAX_STRING ? `"${value.slice(0, MAX_STRING - 3)}..."` : `"${value}"`;
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    case "undefined":
      return "undefined";
    case "object":
      if (value === null) return "null";
      if (Array.isArray(value)) {
        if (value.length > MAX_INLINE_ITEMS) return `[${value.length} items]`;
        return `[${value.map(renderValue).join(", ")}]`;
      }
      // ModulePath and friends print themselves
      return value.toString === Object.prototype.toString ? "{...}" : String(value);
    default:
      return "[unserializable]";
  }
}
