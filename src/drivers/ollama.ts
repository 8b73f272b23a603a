/**
 * Ollama chat driver: non-streaming calls to /api/chat and /api/generate.
 */
import { Logger } from "../logger.js";
import { asError, ferryError, hasKind } from "../errors.js";
import { timedFetch } from "../utils/timed-fetch.js";
import { isRecord } from "../agent-types.js";
import type { ConversationTurn, ModelResponse, ToolDefinition, ToolInvocation } from "../agent-types.js";
import type { InvokeOptions, ModelInvoker } from "./types.js";

export interface OllamaDriverConfig {
  baseUrl: string;
  /** Model used when a call does not name one. */
  model: string;
  timeoutMs?: number;
}

export const DEFAULT_OLLAMA_URL = "http://localhost:11434";

const UNSUPPORTED_TOOLS_RE = /does not support tools/i;

/** Synthetic tool used only to ask the runtime whether a model accepts tool definitions. */
const PROBE_TOOL: ToolDefinition = {
  type: "function",
  function: {
    name: "get_current_weather",
    description: "Get current weather for a city",
    parameters: {
      type: "object",
      properties: {
        city: { type: "string", description: "Name of city" },
      },
      required: ["city"],
    },
  },
};

function samplingOptions(opts: InvokeOptions): Record<string, number> {
  const out: Record<string, number> = {};
  if (opts.temperature !== undefined) out.temperature = opts.temperature;
  if (opts.maxTokens !== undefined) out.num_predict = opts.maxTokens;
  return out;
}

function errorDetail(body: unknown, fallback: string): string {
  if (isRecord(body) && typeof body.error === "string") return body.error;
  if (typeof body === "string" && body.trim()) return body.trim();
  return fallback;
}

function toInvocation(raw: unknown): ToolInvocation | null {
  if (!isRecord(raw) || !isRecord(raw.function)) return null;
  const fn = raw.function;
  if (typeof fn.name !== "string" || !fn.name) return null;

  let args: Record<string, unknown> = {};
  if (isRecord(fn.arguments)) {
    args = fn.arguments;
  } else if (typeof fn.arguments === "string" && fn.arguments.trim()) {
    // Some OpenAI-compatible shims send arguments as a JSON string
    try {
      const parsed: unknown = JSON.parse(fn.arguments);
      if (isRecord(parsed)) args = parsed;
    } catch {
      Logger.warn(`Native tool call ${fn.name} carried unparsable arguments; using {}`);
    }
  }
  return { name: fn.name, arguments: args };
}

/** Map an /api/chat response body onto a ModelResponse. */
export function parseChatResponse(body: unknown): ModelResponse {
  const message: Record<string, unknown> = isRecord(body) && isRecord(body.message) ? body.message : {};
  const text = typeof message.content === "string" ? message.content : "";
  const calls = Array.isArray(message.tool_calls)
    ? message.tool_calls.map(toInvocation).filter((c): c is ToolInvocation => c !== null)
    : [];
  if (calls.length > 0) return { kind: "native_tool_calls", calls, text };
  return { kind: "free_text", text };
}

export function makeOllamaDriver(cfg: OllamaDriverConfig): ModelInvoker {
  const base = cfg.baseUrl.replace(/\/+$/, "");
  const timeoutMs = cfg.timeoutMs ?? 120_000;

  async function post(path: string, payload: Record<string, unknown>, model: string, callTimeoutMs = timeoutMs): Promise<unknown> {
    const started = Date.now();
    const res = await timedFetch(`${base}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
      where: `driver:ollama:${path}`,
      timeoutMs: callTimeoutMs,
    });

    let raw: string;
    try {
      raw = await res.text();
    } catch (e: unknown) {
      throw ferryError("transport_error", `Ollama ${path} response was cut off: ${asError(e).message}`, { model, cause: e });
    }
    const latency_ms = Date.now() - started;

    let body: unknown = raw;
    try {
      body = JSON.parse(raw);
    } catch {
      // keep the raw text for the error message below
    }

    if (!res.ok) {
      const detail = errorDetail(body, res.statusText);
      if (UNSUPPORTED_TOOLS_RE.test(detail)) {
        throw ferryError("unsupported_feature", `Model ${model} does not support native tool calling: ${detail}`, { model, latency_ms });
      }
      throw ferryError("provider_error", `Ollama ${path} failed (${res.status}): ${detail}`, { model, latency_ms });
    }

    Logger.debug(`[ollama ←] ${path} ${model} in ${latency_ms}ms`);
    return body;
  }

  async function invoke(turns: ConversationTurn[], tools: ToolDefinition[], opts: InvokeOptions = {}): Promise<ModelResponse> {
    const model = opts.model ?? cfg.model;
    const payload: Record<string, unknown> = {
      model,
      messages: turns.map(t => ({ role: t.role, content: t.content })),
      stream: false,
      options: samplingOptions(opts),
    };
    if (tools.length > 0) payload.tools = tools;

    Logger.debug(`[ollama →] /api/chat ${model} (${turns.length} turns, ${tools.length} tools)`);
    return parseChatResponse(await post("/api/chat", payload, model, opts.timeoutMs));
  }

  async function generate(prompt: string, systemInstruction: string, opts: InvokeOptions = {}): Promise<string> {
    const model = opts.model ?? cfg.model;
    const body = await post("/api/generate", {
      model,
      prompt,
      system: systemInstruction,
      stream: false,
      options: samplingOptions(opts),
    }, model, opts.timeoutMs);
    return isRecord(body) && typeof body.response === "string" ? body.response : "";
  }

  async function capabilityProbe(model: string): Promise<boolean> {
    try {
      await invoke([{ role: "user", content: "What is the weather in New York?" }], [PROBE_TOOL], { model, maxTokens: 1 });
      return true;
    } catch (e: unknown) {
      if (hasKind(e, "unsupported_feature")) return false;
      throw e;
    }
  }

  return { invoke, generate, capabilityProbe };
}
