#!/usr/bin/env node
/**
 * ferry: local model agent with MCP tools.
 *
 * Reads a query from argv (or runs an interactive loop), lets the model answer
 * or pick a tool, runs the tool over MCP and prints a tagged answer.
 */
import { createInterface } from "node:readline";
import { Logger, C } from "./logger.js";
import { asError, isFerryError, errorLogFields } from "./errors.js";
import { loadConfig, readVersion, usage } from "./cli/config.js";
import type { AgentConfig } from "./cli/config.js";
import { handleCommand, runMemoryAction, runModelInfo } from "./cli/commands.js";
import { createContext, connectContext, closeContext } from "./context.js";
import type { AgentContext } from "./context.js";

async function answer(ctx: AgentContext, query: string): Promise<void> {
  Logger.info(C.gray(`Processing: ${query}`));
  const text = await ctx.orchestrator.ask(query);
  Logger.info(text || "No response from agent.");
}

async function interactive(ctx: AgentContext): Promise<void> {
  const isTerminal = !!process.stdin.isTTY;
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: isTerminal,
    prompt: isTerminal ? C.cyan("you > ") : "you > ",
  });

  Logger.info(`ferry ${readVersion()} - interactive mode`);
  Logger.info(C.gray("Type '/bye', '/exit' or '/quit' to exit, '/help' for commands"));
  if (Logger.isVerbose()) {
    const defaults = ctx.catalog.defaults();
    Logger.info(C.gray(`models: ${ctx.config.model ?? defaults.big} / ${ctx.config.smallModel ?? defaults.small}`));
    Logger.info(C.gray(`${ctx.channel.listCapabilities().length} MCP tool(s) available`));
  }
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (!input) {
      Logger.info("Please enter a query or type '/help'.");
      rl.prompt();
      continue;
    }

    const result = handleCommand(input, { memory: ctx.orchestrator, catalog: ctx.catalog });
    if (result.kind === "exit") {
      Logger.info(result.text);
      break;
    }
    if (result.kind === "output") {
      Logger.info(result.text);
    } else {
      try {
        await answer(ctx, input);
      } catch (e: unknown) {
        Logger.error(C.red(`Unexpected error: ${asError(e).message}`));
      }
    }
    rl.prompt();
  }
  rl.close();
}

async function run(config: AgentConfig): Promise<number> {
  const ctx = createContext(config);

  if (config.memoryAction) {
    Logger.info(runMemoryAction({ memory: ctx.orchestrator, catalog: ctx.catalog }, config.memoryAction));
    return 0;
  }
  if (config.modelInfo) {
    Logger.info(runModelInfo(ctx.catalog, config.modelInfo));
    return 0;
  }
  if (!config.interactive && !config.query) {
    Logger.info("No query provided. Use -h for help or -i for interactive mode.");
    return 1;
  }

  await connectContext(ctx);
  try {
    if (config.interactive) await interactive(ctx);
    else if (config.query) await answer(ctx, config.query);
  } finally {
    await closeContext(ctx);
  }
  return 0;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const config = loadConfig(argv);
  if (config.showHelp) {
    Logger.info(usage());
    return 0;
  }
  if (config.showVersion) {
    Logger.info(`ferry ${readVersion()}`);
    return 0;
  }
  if (config.verbose) {
    Logger.setVerbose(true);
    process.env.FERRY_LOG_LEVEL ??= "DEBUG";
  }
  return run(config);
}

process.on("unhandledRejection", (reason: unknown) => {
  const err = asError(reason);
  Logger.error(C.red(`unhandled rejection: ${err.message}`));
  if (err.stack) Logger.error(C.red(err.stack));
});

main()
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    const err = asError(e);
    Logger.error(C.red(`ferry: ${err.message}`));
    if (Logger.isVerbose()) Logger.error(isFerryError(err) ? errorLogFields(err) : err.stack);
    process.exit(1);
  });
