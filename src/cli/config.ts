/**
 * CLI argument parsing, configuration loading, and help text.
 */

import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { fileURLToPath } from "node:url";
import { Logger } from "../logger.js";
import { ferryError, asError, errorLogFields } from "../errors.js";
import { isRecord } from "../agent-types.js";
import { DEFAULT_OLLAMA_URL } from "../drivers/ollama.js";
import { DEFAULT_MAX_HISTORY, MIN_MAX_HISTORY } from "../memory/conversation-memory.js";
import type { McpServerConfig } from "../mcp/index.js";

export const MEMORY_ACTIONS = ["clear", "clear-all", "view", "stats"] as const;
export type MemoryAction = (typeof MEMORY_ACTIONS)[number];

export const MODEL_INFO_ACTIONS = ["summary", "models", "defaults", "config"] as const;
export type ModelInfoAction = (typeof MODEL_INFO_ACTIONS)[number];

export interface AgentConfig {
  baseUrl: string;
  /** Overrides the catalog's default big model. */
  model: string | null;
  /** Overrides the catalog's default small model. */
  smallModel: string | null;
  mcpServers: Record<string, McpServerConfig>;
  memoryFile: string;
  maxHistory: number;
  timeoutMs: number;
  modelsConfig: string | null;
  interactive: boolean;
  query: string | null;
  memoryAction: MemoryAction | null;
  modelInfo: ModelInfoAction | null;
  verbose: boolean;
  showHelp: boolean;
  showVersion: boolean;
}

export const DEFAULT_TIMEOUT_MS = 120_000;

/** Read version from package.json at the package root, seen from src/cli/ or dist/src/cli/. */
export function readVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  for (const p of [join(here, "..", "..", "package.json"), join(here, "..", "..", "..", "package.json")]) {
    if (!existsSync(p)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(p, "utf-8"));
      if (isRecord(pkg) && pkg.name === "ferry-agent" && typeof pkg.version === "string") return pkg.version;
    } catch (e: unknown) {
      Logger.debug(`Could not read ${p}: ${asError(e).message}`);
    }
  }
  return "unknown";
}

function toServerConfig(name: string, raw: unknown): McpServerConfig | null {
  if (!isRecord(raw) || typeof raw.command !== "string") {
    Logger.warn(`MCP server "${name}" has no command; skipping`);
    return null;
  }
  const cfg: McpServerConfig = { command: raw.command };
  if (Array.isArray(raw.args)) cfg.args = raw.args.filter((a): a is string => typeof a === "string");
  if (isRecord(raw.env)) {
    const env: Record<string, string> = {};
    for (const [k, v] of Object.entries(raw.env)) if (typeof v === "string") env[k] = v;
    cfg.env = env;
  }
  if (typeof raw.cwd === "string") cfg.cwd = raw.cwd;
  if (typeof raw.timeout === "number") cfg.timeout = raw.timeout;
  return cfg;
}

/** Accepts `{ "mcpServers": {...} }` or a bare server map. */
export function parseMcpServers(raw: unknown): Record<string, McpServerConfig> {
  const servers = isRecord(raw) && isRecord(raw.mcpServers) ? raw.mcpServers : raw;
  if (!isRecord(servers)) throw ferryError("config_error", "MCP config must be a JSON object");
  const out: Record<string, McpServerConfig> = {};
  for (const [name, entry] of Object.entries(servers)) {
    const cfg = toServerConfig(name, entry);
    if (cfg) out[name] = cfg;
  }
  return out;
}

export function loadMcpServers(mcpConfigPaths: string[], home: string): Record<string, McpServerConfig> {
  const merged: Record<string, McpServerConfig> = {};
  const autoPath = join(home, ".ferry", "mcp.json");
  const sources = existsSync(autoPath) && !mcpConfigPaths.includes(autoPath) ? [autoPath, ...mcpConfigPaths] : mcpConfigPaths;

  for (const p of sources) {
    try {
      let raw: string;
      if (p.trimStart().startsWith("{")) {
        raw = p; // inline JSON
      } else if (existsSync(p)) {
        raw = readFileSync(p, "utf-8");
      } else {
        Logger.warn(`MCP config not found: ${p}`);
        continue;
      }
      Object.assign(merged, parseMcpServers(JSON.parse(raw)));
    } catch (e: unknown) {
      const fe = ferryError("config_error", `Failed to parse MCP config ${p}: ${asError(e).message}`, { cause: e });
      Logger.warn(fe.message, errorLogFields(fe));
    }
  }
  return merged;
}

function positiveInt(flag: string, value: string, min = 1): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < min) {
    const expected = min === 1 ? "a positive integer" : `an integer of at least ${min}`;
    throw ferryError("config_error", `${flag} expects ${expected}, got "${value}"`);
  }
  return n;
}

function oneOf<T extends string>(flag: string, value: string | undefined, allowed: readonly T[]): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw ferryError("config_error", `${flag} expects one of ${allowed.join(", ")}, got "${value ?? ""}"`);
  }
  return match;
}

function valueOf(args: string[], i: number, flag: string): string {
  const v = args[i];
  if (v === undefined) throw ferryError("config_error", `${flag} expects a value`);
  return v;
}

export function loadConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): AgentConfig {
  const flags: Record<string, string> = {};
  const positional: string[] = [];
  const mcpConfigPaths: string[] = [];
  let memoryAction: MemoryAction | null = null;
  let modelInfo: ModelInfoAction | null = null;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--base-url") { flags.baseUrl = valueOf(args, ++i, arg); }
    else if (arg === "--model") { flags.model = valueOf(args, ++i, arg); }
    else if (arg === "--small-model") { flags.smallModel = valueOf(args, ++i, arg); }
    else if (arg === "--mcp-config") { mcpConfigPaths.push(valueOf(args, ++i, arg)); }
    else if (arg === "--memory-file") { flags.memoryFile = valueOf(args, ++i, arg); }
    else if (arg === "--max-history") { flags.maxHistory = valueOf(args, ++i, arg); }
    else if (arg === "--timeout-ms") { flags.timeoutMs = valueOf(args, ++i, arg); }
    else if (arg === "--models-config") { flags.modelsConfig = valueOf(args, ++i, arg); }
    else if (arg === "-i" || arg === "--interactive") { flags.interactive = "true"; }
    else if (arg === "-q" || arg === "--query") { flags.query = valueOf(args, ++i, arg); }
    else if (arg === "-m" || arg === "--memory") { memoryAction = oneOf(arg, args[++i], MEMORY_ACTIONS); }
    else if (arg === "--model-info") { modelInfo = oneOf(arg, args[++i], MODEL_INFO_ACTIONS); }
    else if (arg === "--verbose") { flags.verbose = "true"; }
    else if (arg === "-V" || arg === "--version") { flags.version = "true"; }
    else if (arg === "-h" || arg === "--help") { flags.help = "true"; }
    else if (!arg.startsWith("-")) { positional.push(arg); }
    else { Logger.warn(`Unknown flag: ${arg}`); }
  }

  const query = flags.query ?? (positional.length > 0 ? positional.join(" ") : null);

  return {
    baseUrl: flags.baseUrl || env.FERRY_OLLAMA_URL || DEFAULT_OLLAMA_URL,
    model: flags.model || env.FERRY_MODEL || null,
    smallModel: flags.smallModel || env.FERRY_SMALL_MODEL || null,
    mcpServers: loadMcpServers(mcpConfigPaths, home),
    memoryFile: flags.memoryFile || env.FERRY_MEMORY_FILE || join(home, ".ferry", "memory.json"),
    maxHistory: flags.maxHistory ? positiveInt("--max-history", flags.maxHistory, MIN_MAX_HISTORY) : DEFAULT_MAX_HISTORY,
    timeoutMs: flags.timeoutMs ? positiveInt("--timeout-ms", flags.timeoutMs) : DEFAULT_TIMEOUT_MS,
    modelsConfig: flags.modelsConfig || null,
    interactive: flags.interactive === "true",
    query,
    memoryAction,
    modelInfo,
    verbose: flags.verbose === "true",
    showHelp: flags.help === "true",
    showVersion: flags.version === "true",
  };
}

export function usage(): string {
  return `ferry ${readVersion()} - local model agent with MCP tools

usage:
  ferry [options] "query"
  ferry -i                         # interactive mode

options:
  --base-url <url>        Ollama base URL (default: ${DEFAULT_OLLAMA_URL}, env: FERRY_OLLAMA_URL)
  --model <name>          main model (env: FERRY_MODEL; default from models.json)
  --small-model <name>    formatting model (env: FERRY_SMALL_MODEL; default from models.json)
  --mcp-config <file|json>  load MCP servers (repeatable); ~/.ferry/mcp.json is read when present
  --memory-file <path>    conversation file (default: ~/.ferry/memory.json, env: FERRY_MEMORY_FILE)
  --max-history <n>       turns kept in memory, at least ${MIN_MAX_HISTORY} (default: ${DEFAULT_MAX_HISTORY})
  --timeout-ms <n>        model request timeout for roles without one in models.json (default: ${DEFAULT_TIMEOUT_MS})
  --models-config <path>  model catalog file (default: models.json in the package)
  -q, --query <text>      run a single query
  -i, --interactive       interactive conversation mode
  -m, --memory <action>   clear | clear-all | view | stats
  --model-info <what>     summary | models | defaults | config
  --verbose               verbose output (debug lines need FERRY_LOG_LEVEL=DEBUG)
  -V, --version           show version
  -h, --help              show this help`;
}
