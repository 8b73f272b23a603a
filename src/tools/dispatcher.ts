/**
 * ToolDispatcher: run one invocation through the channel and collapse
 * whatever comes back into a single string.
 */
import { Logger } from "../logger.js";
import { ferryError } from "../errors.js";
import { isRecord } from "../agent-types.js";
import type { ChannelResult, ToolCapability, ToolChannel, ToolInvocation, ToolResultPart } from "../agent-types.js";
import { findCapability } from "./capabilities.js";

export const NO_SIGNAL_MESSAGE = "🚫 No relevant results from tool call.";

const EMPTY_LOOKING = new Set(["[]", "No results", ""]);

/** Best-effort string form of an arbitrary value. */
export function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function renderPart(part: ToolResultPart): string {
  switch (part.kind) {
    case "text": return part.text;
    case "image": return "[Image content]";
    case "audio": return "[Audio content]";
    case "resource": return `[Resource: ${part.uri}]`;
    case "unknown": return stringify(part.raw);
  }
}

/**
 * Collapse a channel result into text. Never throws.
 */
export function normalizeResult(result: ChannelResult): string {
  let text: string;
  if (result.parts.length > 0) {
    text = result.parts.map(renderPart).join("\n");
  } else if (result.structured && "result" in result.structured) {
    text = stringify(result.structured.result);
  } else {
    text = stringify(result.raw);
  }
  return EMPTY_LOOKING.has(text.trim()) ? NO_SIGNAL_MESSAGE : text;
}

function validateInvocation(invocation: ToolInvocation, capabilities: readonly ToolCapability[]): void {
  if (!invocation.name || !invocation.name.trim() || !isRecord(invocation.arguments)) {
    throw ferryError("tool_error", "Invalid tool name or arguments.", { tool: invocation.name });
  }
  if (!findCapability(capabilities, invocation.name)) {
    const known = capabilities.map((c) => c.name).join(", ") || "none";
    throw ferryError("unknown_tool", `Unknown tool "${invocation.name}" (available: ${known})`, { tool: invocation.name });
  }
}

/**
 * Execute `invocation` via `channel`. Channel failures propagate to the caller.
 */
export async function dispatch(
  invocation: ToolInvocation,
  channel: ToolChannel,
  capabilities: readonly ToolCapability[] = channel.listCapabilities(),
): Promise<string> {
  validateInvocation(invocation, capabilities);

  Logger.debug(`dispatch: ${invocation.name}(${stringify(invocation.arguments)})`);
  const result = await channel.callTool(invocation.name, invocation.arguments);
  if (result.isError) {
    Logger.warn(`Tool ${invocation.name} reported an error result`);
  }
  return normalizeResult(result);
}
