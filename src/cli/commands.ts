/**
 * Slash commands for interactive mode, plus the one-shot --memory and
 * --model-info flags that share their handlers.
 */
import type { ModelCatalog } from "../model-config.js";
import type { Orchestrator } from "../orchestrator/orchestrator.js";
import { MEMORY_ACTIONS, MODEL_INFO_ACTIONS } from "./config.js";
import type { MemoryAction, ModelInfoAction } from "./config.js";

export type CommandResult =
  | { kind: "not_command" }
  | { kind: "output"; text: string }
  | { kind: "exit"; text: string };

export interface CommandTarget {
  memory: Pick<Orchestrator, "memoryClear" | "memoryView" | "memoryStats">;
  catalog: ModelCatalog;
}

export const EXIT_COMMANDS = ["quit", "exit", "q", "bye", "goodbye"];
const HELP_COMMANDS = ["help", "?"];

const ALL_COMMANDS = [
  ...MEMORY_ACTIONS.map((a) => `/memory ${a}`),
  ...MODEL_INFO_ACTIONS.map((a) => `/model ${a}`),
  ...EXIT_COMMANDS.map((c) => `/${c}`),
  "/help",
  "/?",
];

const FUZZY_CUTOFF = 0.6;

export const HELP_TEXT = `Available commands:
- Enter any natural language query for the agent
- '/bye', '/exit', '/quit' - Exit the program
- '/help' - Show this help message
- '/memory clear' - Clear memory (keep system prompt)
- '/memory clear-all' - Clear all memory
- '/memory view' - View current memory
- '/memory stats' - Show memory statistics
- '/model summary' - Show model configuration summary
- '/model models' - List available models
- '/model defaults' - Show default models
- '/model config' - Show full configuration
- Ctrl+C - Force exit

Examples:
- "List files in the current directory"
- "What is 2+2?"`;

/** Sum of the lengths of the matching blocks (Ratcliff/Obershelp). */
function matchingChars(a: string, b: string): number {
  if (!a || !b) return 0;
  let best = 0;
  let bestA = 0;
  let bestB = 0;
  // lengths of common suffixes ending at a[i-1], b[j-1]
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const row = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] !== b[j - 1]) continue;
      row[j] = prev[j - 1] + 1;
      if (row[j] > best) {
        best = row[j];
        bestA = i - best;
        bestB = j - best;
      }
    }
    prev = row;
  }
  if (best === 0) return 0;
  return (
    best +
    matchingChars(a.slice(0, bestA), b.slice(0, bestB)) +
    matchingChars(a.slice(bestA + best), b.slice(bestB + best))
  );
}

/** Similarity in [0, 1]: twice the matched characters over the total length. */
export function similarity(a: string, b: string): number {
  const total = a.length + b.length;
  return total === 0 ? 1 : (2 * matchingChars(a, b)) / total;
}

/** The best candidate scoring at least `cutoff`, or null. */
export function closestMatch(input: string, candidates: readonly string[], cutoff = FUZZY_CUTOFF): string | null {
  let best: string | null = null;
  let bestScore = cutoff;
  for (const c of candidates) {
    const score = similarity(input, c);
    if (score > bestScore || (score === bestScore && best === null)) {
      best = c;
      bestScore = score;
    }
  }
  return best;
}

export function runMemoryAction(target: CommandTarget, action: MemoryAction): string {
  const { memory } = target;
  switch (action) {
    case "clear": {
      const removed = memory.memoryClear(true);
      return `🧹 Memory cleared, system prompt kept (${removed} turn(s) removed)`;
    }
    case "clear-all": {
      const removed = memory.memoryClear(false);
      return `🧹 Memory cleared (${removed} turn(s) removed)`;
    }
    case "view": {
      const entries = memory.memoryView();
      if (entries.length === 0) return "📭 Memory is empty";
      return [`🧠 Memory (${entries.length} turn(s)):`, ...entries.map((e) => `${e.index}. [${e.role}] ${e.preview}`)].join("\n");
    }
    case "stats": {
      const stats = memory.memoryStats();
      return ["📊 Memory Statistics:", ...Object.entries(stats).map(([k, v]) => `  ${k}: ${v}`)].join("\n");
    }
  }
}

export function runModelInfo(catalog: ModelCatalog, action: ModelInfoAction): string {
  switch (action) {
    case "summary":
      return catalog.summary();
    case "models":
      return ["📋 Available Models:", ...Object.entries(catalog.all()).map(([type, m]) => `  ${type}: ${m.name}`)].join("\n");
    case "defaults":
      return ["⚙️ Default Models:", ...Object.entries(catalog.defaults()).map(([k, v]) => `  ${k}: ${v}`)].join("\n");
    case "config":
      return `📄 Full Model Configuration:\n${JSON.stringify(catalog.config, null, 2)}`;
  }
}

function subcommand<T extends string>(main: string, args: string[], allowed: readonly T[]): T | string {
  const raw = args[0]?.toLowerCase();
  if (!raw) return `💡 Usage: /${main} <${allowed.join("|")}>`;
  const match = closestMatch(raw, allowed);
  const sub = allowed.find((a) => a === match);
  if (sub === undefined) {
    return `❌ Unknown ${main} command: ${raw}\n💡 Available: ${allowed.join(", ")}`;
  }
  return sub;
}

function isMemoryAction(v: string): v is MemoryAction {
  return MEMORY_ACTIONS.some((a) => a === v);
}

function isModelInfoAction(v: string): v is ModelInfoAction {
  return MODEL_INFO_ACTIONS.some((a) => a === v);
}

/**
 * Handle one line of interactive input. Anything not starting with "/" is a
 * query and comes back as not_command.
 */
export function handleCommand(line: string, target: CommandTarget): CommandResult {
  const input = line.trim();
  if (!input.startsWith("/")) return { kind: "not_command" };

  const parts = input.slice(1).split(/\s+/).filter(Boolean);
  const command = (parts[0] ?? "").toLowerCase();
  const args = parts.slice(1);

  if (EXIT_COMMANDS.includes(command)) return { kind: "exit", text: "👋 Goodbye!" };
  if (HELP_COMMANDS.includes(command)) return { kind: "output", text: HELP_TEXT };

  if (command === "memory") {
    const sub = subcommand("memory", args, MEMORY_ACTIONS);
    return { kind: "output", text: isMemoryAction(sub) ? runMemoryAction(target, sub) : sub };
  }
  if (command === "model") {
    const sub = subcommand("model", args, MODEL_INFO_ACTIONS);
    return { kind: "output", text: isModelInfoAction(sub) ? runModelInfo(target.catalog, sub) : sub };
  }

  const suggestion = closestMatch(input, ALL_COMMANDS);
  return {
    kind: "output",
    text: `❌ Unknown command: ${input}\n💡 Did you mean: ${suggestion ?? "No similar command found"}`,
  };
}
