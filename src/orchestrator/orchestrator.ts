/**
 * Orchestrator: the per-query pipeline.
 *
 *   START → PROBE_CAPABILITY → INVOKE_MODEL
 *         → DIRECT_ANSWER | NATIVE_TOOL_CALL | TEXT_EXTRACTED_TOOL_CALL
 *         → [DISPATCH_TOOL → FORMAT_RESULT] → DONE
 *
 * Any fault moves to ERROR. Nothing thrown inside escapes issueQuery().
 */
import { Logger } from "../logger.js";
import { asError, isFerryError, errorLogFields } from "../errors.js";
import type { ConversationTurn, ToolCapability, ToolChannel, ToolInvocation, ModelResponse } from "../agent-types.js";
import type { InvokeOptions, ModelInvoker } from "../drivers/types.js";
import type { ConversationMemory, MemoryEntry, MemoryStats } from "../memory/conversation-memory.js";
import type { ResponseFormatter } from "../formatter/response-formatter.js";
import { inspect, renderInvocation } from "../interpreter/response-interpreter.js";
import { dispatch } from "../tools/dispatcher.js";
import { renderToolListing, toToolDefinitions } from "../tools/capabilities.js";
import { nativeToolInstruction, textConventionInstruction } from "./prompts.js";

export type QueryState =
  | "START"
  | "PROBE_CAPABILITY"
  | "INVOKE_MODEL"
  | "DIRECT_ANSWER"
  | "NATIVE_TOOL_CALL"
  | "TEXT_EXTRACTED_TOOL_CALL"
  | "DISPATCH_TOOL"
  | "FORMAT_RESULT"
  | "DONE"
  | "ERROR";

export type QueryOutcome =
  | { kind: "direct_answer"; text: string; trace: QueryState[] }
  | { kind: "tool_result"; text: string; invocation: ToolInvocation; toolOutput: string; trace: QueryState[] }
  | { kind: "error"; message: string; error: Error; trace: QueryState[] };

export const DIRECT_RESPONSE_TAG = "💭 **Direct Response:**";
export const TOOL_RESULT_TAG = "🔍 **Tool Call Result:**";
export const ERROR_PREFIX = "❌ Error processing query:";

/** The user-facing string for an outcome. Errors always render as one line. */
export function renderAnswer(outcome: QueryOutcome): string {
  switch (outcome.kind) {
    case "direct_answer": return `${DIRECT_RESPONSE_TAG}\n\n${outcome.text}`;
    case "tool_result": return `${TOOL_RESULT_TAG}\n\n${outcome.text}`;
    case "error": return `${ERROR_PREFIX} ${outcome.message.replace(/\s*\r?\n\s*/g, " ").trim()}`;
  }
}

export interface OrchestratorOptions {
  memory: ConversationMemory;
  invoker: ModelInvoker;
  channel: ToolChannel;
  formatter: ResponseFormatter;
  /** Model that answers and selects tools. */
  bigModel: string;
  /** Model that rewrites tool output. */
  smallModel: string;
  /** Sampling for the big model. */
  sampling?: Omit<InvokeOptions, "model">;
}

export class Orchestrator {
  private readonly memory: ConversationMemory;
  private readonly invoker: ModelInvoker;
  private readonly channel: ToolChannel;
  private readonly formatter: ResponseFormatter;
  private readonly bigModel: string;
  private readonly smallModel: string;
  private readonly sampling: Omit<InvokeOptions, "model">;

  private trace: QueryState[] = [];

  constructor(opts: OrchestratorOptions) {
    this.memory = opts.memory;
    this.invoker = opts.invoker;
    this.channel = opts.channel;
    this.formatter = opts.formatter;
    this.bigModel = opts.bigModel;
    this.smallModel = opts.smallModel;
    this.sampling = opts.sampling ?? {};
  }

  private enter(state: QueryState): void {
    const from = this.trace[this.trace.length - 1] ?? "-";
    this.trace.push(state);
    Logger.debug(`query: ${from} -> ${state}`);
  }

  async issueQuery(text: string): Promise<QueryOutcome> {
    this.trace = [];
    this.enter("START");
    try {
      return await this.run(text);
    } catch (e: unknown) {
      const error = asError(e);
      if (isFerryError(error)) Logger.error("Query failed:", errorLogFields(error));
      else Logger.error(`Query failed: ${error.message}`);
      this.enter("ERROR");
      return { kind: "error", message: error.message, error, trace: this.trace };
    }
  }

  /** Convenience wrapper returning the tagged answer string. */
  async ask(text: string): Promise<string> {
    return renderAnswer(await this.issueQuery(text));
  }

  private async run(query: string): Promise<QueryOutcome> {
    this.memory.load();
    const capabilities = this.channel.listCapabilities();

    this.enter("PROBE_CAPABILITY");
    const native = await this.invoker.capabilityProbe(this.bigModel);
    Logger.debug(`probe: ${this.bigModel} native tool calling = ${native}`);
    const instruction = native
      ? nativeToolInstruction(capabilities.map((c) => c.name))
      : textConventionInstruction(renderToolListing(capabilities));

    this.memory.ensureSystem(instruction);
    this.memory.append({ role: "user", content: query });

    this.enter("INVOKE_MODEL");
    const response = await this.invoker.invoke(
      withSystem(this.memory.snapshot(), instruction),
      native ? toToolDefinitions(capabilities) : [],
      { ...this.sampling, model: this.bigModel },
    );

    this.memory.append({ role: "assistant", content: assistantContent(response) });
    this.memory.persist();

    if (response.kind === "native_tool_calls") {
      this.enter("NATIVE_TOOL_CALL");
      return this.runNativeCalls(response.calls, capabilities, query);
    }

    const extraction = inspect(response.text);
    if (!extraction.invocation) {
      this.enter("DIRECT_ANSWER");
      this.enter("DONE");
      return { kind: "direct_answer", text: response.text, trace: this.trace };
    }

    this.enter("TEXT_EXTRACTED_TOOL_CALL");
    const toolOutput = await this.dispatchOne(extraction.invocation, capabilities);
    return this.formatResult(extraction.invocation, toolOutput, query);
  }

  private async runNativeCalls(
    calls: ToolInvocation[],
    capabilities: readonly ToolCapability[],
    query: string,
  ): Promise<QueryOutcome> {
    if (calls.length > 1) {
      Logger.warn(`Model requested ${calls.length} tool calls; only the last result is kept`);
    }
    let last: { invocation: ToolInvocation; output: string } | null = null;
    for (const invocation of calls) {
      last = { invocation, output: await this.dispatchOne(invocation, capabilities) };
    }
    if (!last) throw new Error("native tool call response carried no calls");
    return this.formatResult(last.invocation, last.output, query);
  }

  private async dispatchOne(invocation: ToolInvocation, capabilities: readonly ToolCapability[]): Promise<string> {
    this.enter("DISPATCH_TOOL");
    return dispatch(invocation, this.channel, capabilities);
  }

  private async formatResult(invocation: ToolInvocation, toolOutput: string, query: string): Promise<QueryOutcome> {
    this.enter("FORMAT_RESULT");
    const text = await this.formatter.format(toolOutput, query, this.smallModel);
    this.enter("DONE");
    return { kind: "tool_result", text, invocation, toolOutput, trace: this.trace };
  }

  /** Returns the number of turns removed. */
  memoryClear(keepSystem = true): number {
    return this.memory.clear(keepSystem);
  }

  memoryView(): MemoryEntry[] {
    return this.memory.view();
  }

  memoryStats(): MemoryStats {
    return this.memory.stats();
  }
}

/**
 * The stored system turn is the first instruction this history saw; the wire
 * copy carries the variant chosen by this query's probe.
 */
function withSystem(turns: ConversationTurn[], instruction: string): ConversationTurn[] {
  return turns.map((t, i): ConversationTurn => (i === 0 && t.role === "system" ? { role: "system", content: instruction } : t));
}

function assistantContent(response: ModelResponse): string {
  if (response.kind === "free_text" || response.text.trim()) return response.text;
  return response.calls.map(renderInvocation).join("\n");
}
