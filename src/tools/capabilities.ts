/**
 * Capability conversion: discovered MCP tools into the two shapes the
 * model needs: machine tool definitions for native tool calling, and a
 * numbered listing for the text-convention prompt.
 */
import { isRecord } from "../agent-types.js";
import type { ToolCapability, ToolDefinition, ToolParameter } from "../agent-types.js";

/** The subset of an MCP `listTools` entry that ferry reads. */
export interface DiscoveredTool {
  name: string;
  description?: string;
  inputSchema?: unknown;
}

export function toCapability(tool: DiscoveredTool): ToolCapability {
  const schema = isRecord(tool.inputSchema) ? tool.inputSchema : {};
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required)
    ? schema.required.filter((r): r is string => typeof r === "string")
    : [];

  const parameters: Record<string, ToolParameter> = {};
  for (const [arg, info] of Object.entries(properties)) {
    const spec = isRecord(info) ? info : {};
    const param: ToolParameter = {
      type: typeof spec.type === "string" ? spec.type : "unknown",
      description: typeof spec.description === "string" ? spec.description : "",
    };
    if (required.includes(arg)) param.required = true;
    parameters[arg] = param;
  }

  return Object.freeze({
    name: tool.name,
    description: tool.description ?? "",
    parameters: Object.freeze(parameters),
  });
}

export function toToolDefinitions(capabilities: readonly ToolCapability[]): ToolDefinition[] {
  return capabilities.map((cap) => {
    const properties: Record<string, { type: string; description: string }> = {};
    const required: string[] = [];
    for (const [arg, p] of Object.entries(cap.parameters)) {
      properties[arg] = { type: p.type === "unknown" ? "string" : p.type, description: p.description };
      if (p.required) required.push(arg);
    }

    const def: ToolDefinition = {
      type: "function",
      function: {
        name: cap.name,
        description: cap.description,
        parameters: { type: "object", properties },
      },
    };
    if (required.length > 0) def.function.parameters.required = required;
    return def;
  });
}

/**
 * Human-readable numbered listing:
 *
 *   1. list_directory : List files and directories in a specified path.
 *      Args: path (string), show_hidden (boolean)
 */
export function renderToolListing(capabilities: readonly ToolCapability[]): string {
  return capabilities
    .map((cap, i) => {
      const args = Object.entries(cap.parameters)
        .map(([arg, p]) => `${arg} (${p.type})`)
        .join(", ");
      return `${i + 1}. ${cap.name} : ${cap.description}\n   Args: ${args}`;
    })
    .join("\n");
}

/** Look a capability up by name. */
export function findCapability(capabilities: readonly ToolCapability[], name: string): ToolCapability | undefined {
  return capabilities.find((c) => c.name === name);
}
