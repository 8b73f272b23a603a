import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { Logger } from "./logger.js";
import { ferryError, asError } from "./errors.js";
import { isRecord } from "./agent-types.js";
import type { InvokeOptions } from "./drivers/types.js";

export interface ModelParameters {
  temperature: number;
  max_tokens: number;
  /** Seconds. */
  timeout?: number;
}

export interface ModelEntry {
  name: string;
  description: string;
  parameters: ModelParameters;
  use_cases: string[];
}

export interface ModelSettings {
  default_big_model: string;
  default_small_model: string;
  fallback_model: string;
}

export interface ModelConfig {
  models: Record<string, ModelEntry>;
  settings: ModelSettings;
}

const DEFAULT_PARAMETERS: ModelParameters = { temperature: 0.1, max_tokens: 500 };

export const FALLBACK_MODEL_CONFIG: ModelConfig = {
  models: {
    big: { name: "gemma3:12b", description: "", parameters: { temperature: 0.1, max_tokens: 1000 }, use_cases: [] },
    small: { name: "gemma3:1b", description: "", parameters: { temperature: 0.1, max_tokens: 500 }, use_cases: [] },
  },
  settings: {
    default_big_model: "gemma3:12b",
    default_small_model: "gemma3:1b",
    fallback_model: "gemma3:1b",
  },
};

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v.trim() ? v : fallback;
}

function num(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) ? v : fallback;
}

function parseParameters(raw: unknown): ModelParameters {
  const p = isRecord(raw) ? raw : {};
  const params: ModelParameters = {
    temperature: num(p.temperature, DEFAULT_PARAMETERS.temperature),
    max_tokens: num(p.max_tokens, DEFAULT_PARAMETERS.max_tokens),
  };
  if (typeof p.timeout === "number") params.timeout = p.timeout;
  return params;
}

/** Per-call driver options for a model role. `timeout` is in seconds. */
export function toInvokeOptions(params: ModelParameters): Omit<InvokeOptions, "model"> {
  const opts: Omit<InvokeOptions, "model"> = { temperature: params.temperature, maxTokens: params.max_tokens };
  if (params.timeout !== undefined) opts.timeoutMs = params.timeout * 1000;
  return opts;
}

/** Validate the shape of a parsed models.json, filling gaps from the fallback. */
export function parseModelConfig(raw: unknown): ModelConfig {
  if (!isRecord(raw) || !isRecord(raw.models)) {
    throw ferryError("config_error", "model config must be an object with a \"models\" map");
  }

  const models: Record<string, ModelEntry> = {};
  for (const [type, entry] of Object.entries(raw.models)) {
    if (!isRecord(entry) || typeof entry.name !== "string") {
      Logger.warn(`Model type '${type}' has no name; skipping`);
      continue;
    }
    models[type] = {
      name: entry.name,
      description: str(entry.description, ""),
      parameters: parseParameters(entry.parameters),
      use_cases: Array.isArray(entry.use_cases) ? entry.use_cases.filter((u): u is string => typeof u === "string") : [],
    };
  }

  const s = isRecord(raw.settings) ? raw.settings : {};
  const fb = FALLBACK_MODEL_CONFIG.settings;
  return {
    models,
    settings: {
      default_big_model: str(s.default_big_model, models.big?.name ?? fb.default_big_model),
      default_small_model: str(s.default_small_model, models.small?.name ?? fb.default_small_model),
      fallback_model: str(s.fallback_model, fb.fallback_model),
    },
  };
}

/** models.json at the package root, seen from src/ or dist/src/. */
export function defaultModelConfigPath(): string | null {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [join(here, "..", "models.json"), join(here, "..", "..", "models.json")];
  return candidates.find((p) => existsSync(p)) ?? null;
}

/**
 * Model catalog: named model roles (big, small, tiny, …) with their sampling
 * parameters. Constructed by the caller and passed around; not cached globally.
 */
export class ModelCatalog {
  constructor(
    readonly config: ModelConfig,
    /** File the config came from, or null for the built-in fallback. */
    readonly source: string | null = null,
  ) {}

  /** Load models.json, falling back to the built-in config when it is missing or broken. */
  static load(path: string | null = defaultModelConfigPath()): ModelCatalog {
    if (!path || !existsSync(path)) {
      Logger.warn(`Model configuration file not found${path ? `: ${path}` : ""}; using built-in defaults`);
      return new ModelCatalog(FALLBACK_MODEL_CONFIG);
    }
    try {
      const config = parseModelConfig(JSON.parse(readFileSync(path, "utf-8")));
      Logger.debug(`Loaded model configuration from ${path}`);
      return new ModelCatalog(config, path);
    } catch (e: unknown) {
      Logger.warn(`Error parsing model configuration ${path}: ${asError(e).message}; using built-in defaults`);
      return new ModelCatalog(FALLBACK_MODEL_CONFIG);
    }
  }

  /** Model name for a role, or the fallback model when the role is unknown. */
  modelName(type: string): string {
    const entry = this.config.models[type];
    if (entry) return entry.name;
    Logger.warn(`Model type '${type}' not found in configuration`);
    return this.config.settings.fallback_model;
  }

  parameters(type: string): ModelParameters {
    return this.config.models[type]?.parameters ?? { ...DEFAULT_PARAMETERS };
  }

  defaults(): { big: string; small: string; fallback: string } {
    const s = this.config.settings;
    return { big: s.default_big_model, small: s.default_small_model, fallback: s.fallback_model };
  }

  useCases(type: string): string[] {
    return this.config.models[type]?.use_cases ?? [];
  }

  all(): Record<string, ModelEntry> {
    return this.config.models;
  }

  settings(): ModelSettings {
    return this.config.settings;
  }

  /** Multi-line human summary of every model and setting. */
  summary(): string {
    const lines = ["Model Configuration Summary:", "=".repeat(50)];
    for (const [type, m] of Object.entries(this.config.models)) {
      lines.push(
        "",
        `${type.toUpperCase()} Model:`,
        `   Name: ${m.name}`,
        `   Description: ${m.description || "No description"}`,
        `   Temperature: ${m.parameters.temperature}`,
        `   Max Tokens: ${m.parameters.max_tokens}`,
        `   Timeout: ${m.parameters.timeout !== undefined ? `${m.parameters.timeout}s` : "N/A"}`,
      );
    }
    lines.push("", "Settings:");
    for (const [key, value] of Object.entries(this.config.settings)) {
      lines.push(`   ${key}: ${value}`);
    }
    return lines.join("\n");
  }
}
