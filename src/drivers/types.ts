import type { ConversationTurn, ModelResponse, ToolDefinition } from "../agent-types.js";

export interface InvokeOptions {
  model?: string;
  /** Sampling temperature (0.0–2.0) */
  temperature?: number;
  /** Upper bound on generated tokens for this call */
  maxTokens?: number;
  /** Request deadline for this call; the driver default applies when unset */
  timeoutMs?: number;
}

/**
 * A language-model runtime.
 * Every method either resolves or rejects with a FerryError
 * (`transport_error`, `timeout_error`, `provider_error`, `unsupported_feature`).
 */
export interface ModelInvoker {
  /** Multi-turn call. Pass an empty tool list to disable native tool calling. */
  invoke(turns: ConversationTurn[], tools: ToolDefinition[], opts?: InvokeOptions): Promise<ModelResponse>;

  /** Memoryless one-shot call. */
  generate(prompt: string, systemInstruction: string, opts?: InvokeOptions): Promise<string>;

  /** Whether `model` accepts tool definitions. Only an `unsupported_feature` failure yields false. */
  capabilityProbe(model: string): Promise<boolean>;
}
