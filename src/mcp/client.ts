/**
 * MCP channel: connects to MCP servers, discovers their tools, routes
 * tool calls, and turns SDK results into ChannelResult at the boundary.
 * Server config follows the `mcpServers` shape used by other MCP hosts.
 */
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { Logger } from "../logger.js";
import { ferryError, asError, errorLogFields } from "../errors.js";
import { isRecord } from "../agent-types.js";
import type { ChannelResult, ToolCapability, ToolChannel, ToolResultPart } from "../agent-types.js";
import { toCapability } from "../tools/capabilities.js";

export interface McpServerConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  /** Tool call timeout in ms. Default: 60s. */
  timeout?: number;
}

interface ConnectedServer {
  name: string;
  client: Client;
  capabilities: ToolCapability[];
  timeout: number;
}

const DEFAULT_TIMEOUT_MS = 60_000;
const CLIENT_INFO = { name: "ferry", version: "0.3.0" };

function childEnv(extra: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [k, v] of Object.entries(process.env)) {
    if (v !== undefined) env[k] = v;
  }
  return { ...env, ...extra };
}

export function toResultPart(item: unknown): ToolResultPart {
  if (!isRecord(item)) return { kind: "unknown", raw: item };
  const mimeType = typeof item.mimeType === "string" ? item.mimeType : undefined;
  switch (item.type) {
    case "text":
      if (typeof item.text === "string") return { kind: "text", text: item.text };
      break;
    case "image":
      return { kind: "image", mimeType };
    case "audio":
      return { kind: "audio", mimeType };
    case "resource": {
      const uri = isRecord(item.resource) && typeof item.resource.uri === "string" ? item.resource.uri : "Unknown";
      return { kind: "resource", uri };
    }
    case "resource_link":
      return { kind: "resource", uri: typeof item.uri === "string" ? item.uri : "Unknown" };
  }
  return { kind: "unknown", raw: item };
}

/** Convert a raw `tools/call` result into the dispatcher's closed shape. */
export function toChannelResult(raw: unknown): ChannelResult {
  if (!isRecord(raw)) return { parts: [], raw, isError: false };
  // Pre-2024-11 servers answer with { toolResult } instead of content parts
  if ("toolResult" in raw) return { parts: [], raw: raw.toolResult, isError: false };

  const content = Array.isArray(raw.content) ? raw.content : [];
  return {
    parts: content.map(toResultPart),
    structured: isRecord(raw.structuredContent) ? raw.structuredContent : undefined,
    raw: content,
    isError: raw.isError === true,
  };
}

export class McpChannel implements ToolChannel {
  private servers = new Map<string, ConnectedServer>();

  /**
   * Connect to all configured MCP servers and discover their tools.
   * A server that fails to start is logged and skipped.
   */
  async connectAll(configs: Record<string, McpServerConfig>): Promise<void> {
    const entries = Object.entries(configs);
    if (entries.length === 0) return;

    Logger.debug(`Connecting to ${entries.length} MCP server(s)...`);

    await Promise.all(
      entries.map(([name, cfg]) =>
        this.connectStdio(name, cfg).catch((e: unknown) => {
          const fe = ferryError("mcp_error", `MCP server "${name}" failed to connect: ${asError(e).message}`, { cause: e });
          Logger.warn(fe.message, errorLogFields(fe));
        })
      )
    );
  }

  async connectStdio(name: string, cfg: McpServerConfig): Promise<void> {
    const transport = new StdioClientTransport({
      command: cfg.command,
      args: cfg.args ?? [],
      env: childEnv(cfg.env),
      cwd: cfg.cwd,
      stderr: Logger.isVerbose() ? "inherit" : "ignore",
    });
    await this.connectTransport(name, transport, cfg.timeout);
  }

  /** Handshake over an already constructed transport and enumerate its tools. */
  async connectTransport(name: string, transport: Transport, timeout = DEFAULT_TIMEOUT_MS): Promise<void> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(transport);

    const capabilities: ToolCapability[] = [];
    let cursor: string | undefined;
    do {
      const page = await client.listTools(cursor ? { cursor } : undefined);
      for (const tool of page.tools) capabilities.push(toCapability(tool));
      cursor = page.nextCursor;
    } while (cursor);

    this.servers.set(name, { name, client, capabilities, timeout });
    Logger.debug(`MCP "${name}": ${capabilities.length} tool(s) available`);
  }

  /**
   * All discovered capabilities. When two servers expose the same name the
   * first one connected wins.
   */
  listCapabilities(): ToolCapability[] {
    const seen = new Map<string, ToolCapability>();
    for (const server of this.servers.values()) {
      for (const cap of server.capabilities) {
        if (seen.has(cap.name)) {
          Logger.warn(`MCP "${server.name}": tool ${cap.name} shadowed by an earlier server`);
          continue;
        }
        seen.set(cap.name, cap);
      }
    }
    return [...seen.values()];
  }

  hasTool(name: string): boolean {
    return this.listCapabilities().some((c) => c.name === name);
  }

  /**
   * Execute a tool call on the server that provides it.
   */
  async callTool(name: string, args: Record<string, unknown>): Promise<ChannelResult> {
    for (const server of this.servers.values()) {
      if (!server.capabilities.some((c) => c.name === name)) continue;

      try {
        const raw: unknown = await server.client.callTool({ name, arguments: args }, undefined, { timeout: server.timeout });
        return toChannelResult(raw);
      } catch (e: unknown) {
        const fe = ferryError("mcp_error", `MCP tool "${name}" (server: ${server.name}) failed: ${asError(e).message}`, {
          tool: name,
          cause: e,
        });
        Logger.error(`MCP tool call failed [${server.name}/${name}]:`, errorLogFields(fe));
        throw fe;
      }
    }
    throw ferryError("unknown_tool", `No MCP server provides tool "${name}"`, { tool: name });
  }

  async disconnectAll(): Promise<void> {
    for (const server of this.servers.values()) {
      try {
        await server.client.close();
      } catch (e: unknown) {
        Logger.debug(`MCP server "${server.name}" close error: ${asError(e).message}`);
      }
    }
    this.servers.clear();
  }
}
