/**
 * Tests for slash commands and fuzzy command matching.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { handleCommand, closestMatch, similarity, runModelInfo, HELP_TEXT } from "../src/cli/commands.js";
import type { CommandTarget } from "../src/cli/commands.js";
import { ModelCatalog, FALLBACK_MODEL_CONFIG } from "../src/model-config.js";
import type { MemoryEntry, MemoryStats } from "../src/memory/conversation-memory.js";

function target(entries: MemoryEntry[] = []) {
  const cleared: boolean[] = [];
  const t: CommandTarget = {
    memory: {
      memoryClear: (keepSystem = true) => {
        cleared.push(keepSystem);
        return keepSystem ? 2 : 3;
      },
      memoryView: () => entries,
      memoryStats: (): MemoryStats => ({
        total_messages: 3,
        user_messages: 1,
        assistant_messages: 1,
        system_messages: 1,
      }),
    },
    catalog: new ModelCatalog(FALLBACK_MODEL_CONFIG),
  };
  return { t, cleared };
}

describe("similarity", () => {
  test("twice the matched characters over the total length", () => {
    assert.strictEqual(similarity("clera", "clear"), 0.8);
    assert.strictEqual(similarity("/hlep", "/help"), 0.8);
    assert.strictEqual(similarity("abc", "xyz"), 0);
    assert.strictEqual(similarity("", ""), 1);
  });
});

describe("closestMatch", () => {
  test("picks the best candidate at or above the cutoff", () => {
    assert.strictEqual(closestMatch("clera", ["clear", "clear-all", "view", "stats"]), "clear");
    assert.strictEqual(closestMatch("stat", ["clear", "clear-all", "view", "stats"]), "stats");
  });

  test("returns null when nothing is close enough", () => {
    assert.strictEqual(closestMatch("zzz", ["clear", "view"]), null);
  });
});

describe("handleCommand", () => {
  test("input without a slash is a query", () => {
    assert.deepStrictEqual(handleCommand("What is 2+2?", target().t), { kind: "not_command" });
  });

  test("exit commands, case-insensitive", () => {
    for (const cmd of ["/quit", "/exit", "/q", "/BYE", "/goodbye"]) {
      assert.deepStrictEqual(handleCommand(cmd, target().t), { kind: "exit", text: "👋 Goodbye!" });
    }
  });

  test("help", () => {
    assert.deepStrictEqual(handleCommand("/help", target().t), { kind: "output", text: HELP_TEXT });
    assert.deepStrictEqual(handleCommand("/?", target().t), { kind: "output", text: HELP_TEXT });
  });

  test("memory subcommands, with fuzzy matching", () => {
    const { t, cleared } = target();
    assert.deepStrictEqual(handleCommand("/memory clera", t), {
      kind: "output",
      text: "🧹 Memory cleared, system prompt kept (2 turn(s) removed)",
    });
    assert.deepStrictEqual(handleCommand("/memory clear-all", t), {
      kind: "output",
      text: "🧹 Memory cleared (3 turn(s) removed)",
    });
    assert.deepStrictEqual(cleared, [true, false]);
  });

  test("memory stats and view", () => {
    const { t } = target([
      { index: 1, role: "system", preview: "You are an AI assistant" },
      { index: 2, role: "user", preview: "hi" },
    ]);
    assert.deepStrictEqual(handleCommand("/memory stats", t), {
      kind: "output",
      text: "📊 Memory Statistics:\n  total_messages: 3\n  user_messages: 1\n  assistant_messages: 1\n  system_messages: 1",
    });
    assert.deepStrictEqual(handleCommand("/memory view", t), {
      kind: "output",
      text: "🧠 Memory (2 turn(s)):\n1. [system] You are an AI assistant\n2. [user] hi",
    });
    assert.deepStrictEqual(handleCommand("/memory view", target().t), { kind: "output", text: "📭 Memory is empty" });
  });

  test("memory usage and unknown subcommands", () => {
    assert.deepStrictEqual(handleCommand("/memory", target().t), {
      kind: "output",
      text: "💡 Usage: /memory <clear|clear-all|view|stats>",
    });
    assert.deepStrictEqual(handleCommand("/memory zzz", target().t), {
      kind: "output",
      text: "❌ Unknown memory command: zzz\n💡 Available: clear, clear-all, view, stats",
    });
  });

  test("model subcommands", () => {
    const { t } = target();
    assert.deepStrictEqual(handleCommand("/model models", t), {
      kind: "output",
      text: "📋 Available Models:\n  big: gemma3:12b\n  small: gemma3:1b",
    });
    assert.deepStrictEqual(handleCommand("/model defualts", t), {
      kind: "output",
      text: "⚙️ Default Models:\n  big: gemma3:12b\n  small: gemma3:1b\n  fallback: gemma3:1b",
    });
  });

  test("unknown commands get a suggestion", () => {
    assert.deepStrictEqual(handleCommand("/hlep", target().t), {
      kind: "output",
      text: "❌ Unknown command: /hlep\n💡 Did you mean: /help",
    });
    assert.deepStrictEqual(handleCommand("/xyzzyplugh", target().t), {
      kind: "output",
      text: "❌ Unknown command: /xyzzyplugh\n💡 Did you mean: No similar command found",
    });
  });
});

describe("runModelInfo", () => {
  test("config dumps the catalog as JSON", () => {
    const catalog = new ModelCatalog(FALLBACK_MODEL_CONFIG);
    assert.strictEqual(
      runModelInfo(catalog, "config"),
      `📄 Full Model Configuration:\n${JSON.stringify(FALLBACK_MODEL_CONFIG, null, 2)}`,
    );
  });
});
