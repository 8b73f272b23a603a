/**
 * AgentContext: everything one CLI session owns, built once by the entry
 * point and passed down. There is no module-level state.
 */
import type { AgentConfig } from "./cli/config.js";
import { ModelCatalog, toInvokeOptions } from "./model-config.js";
import { ConversationMemory } from "./memory/conversation-memory.js";
import { makeOllamaDriver } from "./drivers/ollama.js";
import type { ModelInvoker } from "./drivers/types.js";
import { McpChannel } from "./mcp/index.js";
import { ResponseFormatter } from "./formatter/response-formatter.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";

export interface AgentContext {
  config: AgentConfig;
  catalog: ModelCatalog;
  memory: ConversationMemory;
  invoker: ModelInvoker;
  channel: McpChannel;
  orchestrator: Orchestrator;
}

/** Wire the collaborators. MCP servers are not connected yet; see connectContext(). */
export function createContext(config: AgentConfig): AgentContext {
  const catalog = config.modelsConfig ? ModelCatalog.load(config.modelsConfig) : ModelCatalog.load();
  const defaults = catalog.defaults();
  const bigModel = config.model ?? defaults.big;
  const smallModel = config.smallModel ?? defaults.small;

  const memory = new ConversationMemory(config.memoryFile, config.maxHistory);
  // --timeout-ms covers roles whose models.json entry sets no timeout
  const invoker = makeOllamaDriver({ baseUrl: config.baseUrl, model: bigModel, timeoutMs: config.timeoutMs });
  const channel = new McpChannel();

  const formatter = new ResponseFormatter(invoker, toInvokeOptions(catalog.parameters("small")));

  const orchestrator = new Orchestrator({
    memory,
    invoker,
    channel,
    formatter,
    bigModel,
    smallModel,
    sampling: toInvokeOptions(catalog.parameters("big")),
  });

  return { config, catalog, memory, invoker, channel, orchestrator };
}

/** Connect every configured MCP server once for the session. */
export async function connectContext(ctx: AgentContext): Promise<void> {
  await ctx.channel.connectAll(ctx.config.mcpServers);
}

export async function closeContext(ctx: AgentContext): Promise<void> {
  await ctx.channel.disconnectAll();
}
