/**
 * Shared data model for the query pipeline.
 */

export type TurnRole = "system" | "user" | "assistant";

/** One role-tagged message in the conversation history. */
export interface ConversationTurn {
  role: TurnRole;
  content: string;
}

/** A structured request to run one tool. */
export interface ToolInvocation {
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolParameter {
  type: string;
  description: string;
  required?: boolean;
}

/**
 * A tool discovered from the execution channel.
 * Immutable once discovered; two capabilities are the same tool when their names match.
 */
export interface ToolCapability {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ToolParameter>>;
}

/** Machine tool definition handed to the model runtime. */
export interface ToolDefinition {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, { type: string; description: string }>;
      required?: string[];
    };
  };
}

export type ModelResponse =
  | { kind: "native_tool_calls"; calls: ToolInvocation[]; text: string }
  | { kind: "free_text"; text: string };

/** One piece of tool output, discriminated once at the channel boundary. */
export type ToolResultPart =
  | { kind: "text"; text: string }
  | { kind: "image"; mimeType?: string }
  | { kind: "audio"; mimeType?: string }
  | { kind: "resource"; uri: string }
  | { kind: "unknown"; raw: unknown };

/** A tool call's result as seen by the dispatcher. */
export interface ChannelResult {
  parts: ToolResultPart[];
  /** Structured payload, when the tool returned one. */
  structured?: Record<string, unknown>;
  /** Whatever the channel returned that was not content parts. */
  raw: unknown;
  isError: boolean;
}

/** The capability-exchange channel: enumerates and invokes tools. */
export interface ToolChannel {
  listCapabilities(): ToolCapability[];
  callTool(name: string, args: Record<string, unknown>): Promise<ChannelResult>;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isTurnRole(v: unknown): v is TurnRole {
  return v === "system" || v === "user" || v === "assistant";
}
