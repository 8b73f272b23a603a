/**
 * Tests for tool dispatch and result normalization.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { dispatch, normalizeResult, NO_SIGNAL_MESSAGE } from "../src/tools/dispatcher.js";
import { toCapability } from "../src/tools/capabilities.js";
import { isFerryError } from "../src/errors.js";
import type { ChannelResult, ToolCapability, ToolChannel, ToolResultPart } from "../src/agent-types.js";

/** Channel that answers every call with a canned result and records the calls. */
function fakeChannel(result: ChannelResult, capabilities: ToolCapability[] = [toCapability({ name: "calc" })]) {
  const calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  const channel: ToolChannel = {
    listCapabilities: () => capabilities,
    async callTool(name, args) {
      calls.push({ name, args });
      return result;
    },
  };
  return { channel, calls };
}

function textResult(...texts: string[]): ChannelResult {
  return { parts: texts.map((text): ToolResultPart => ({ kind: "text", text })), raw: [], isError: false };
}

describe("normalizeResult", () => {
  test("text parts are returned as-is", () => {
    assert.strictEqual(normalizeResult(textResult("42")), "42");
  });

  test("multiple parts are joined by newlines", () => {
    assert.strictEqual(normalizeResult(textResult("a.txt", "b.txt")), "a.txt\nb.txt");
  });

  test("non-text parts get placeholders", () => {
    const result: ChannelResult = {
      parts: [
        { kind: "image", mimeType: "image/png" },
        { kind: "audio" },
        { kind: "resource", uri: "file:///tmp/report.txt" },
        { kind: "unknown", raw: { type: "custom", value: 1 } },
      ],
      raw: [],
      isError: false,
    };
    assert.strictEqual(
      normalizeResult(result),
      '[Image content]\n[Audio content]\n[Resource: file:///tmp/report.txt]\n{"type":"custom","value":1}',
    );
  });

  test("empty content list is no signal", () => {
    assert.strictEqual(normalizeResult({ parts: [], raw: [], isError: false }), NO_SIGNAL_MESSAGE);
  });

  test('"No results" and whitespace-only text are no signal', () => {
    assert.strictEqual(normalizeResult(textResult("No results")), NO_SIGNAL_MESSAGE);
    assert.strictEqual(normalizeResult(textResult("  \n")), NO_SIGNAL_MESSAGE);
  });

  test("structured result is used when there are no parts", () => {
    const result: ChannelResult = { parts: [], structured: { result: { temp: 21 } }, raw: [], isError: false };
    assert.strictEqual(normalizeResult(result), '{"temp":21}');
  });

  test("legacy raw payloads are stringified", () => {
    assert.strictEqual(normalizeResult({ parts: [], raw: "done", isError: false }), "done");
    assert.strictEqual(normalizeResult({ parts: [], raw: { files: 3 }, isError: false }), '{"files":3}');
  });
});

describe("dispatch", () => {
  test("calls the channel with the invocation and normalizes the result", async () => {
    const { channel, calls } = fakeChannel(textResult("42"));
    const out = await dispatch({ name: "calc", arguments: { expr: "6*7" } }, channel);
    assert.strictEqual(out, "42");
    assert.deepStrictEqual(calls, [{ name: "calc", args: { expr: "6*7" } }]);
  });

  test("unknown tool fails without calling the channel", async () => {
    const { channel, calls } = fakeChannel(textResult("x"));
    await assert.rejects(
      () => dispatch({ name: "rm_rf", arguments: {} }, channel),
      (err: unknown) => {
        assert.ok(isFerryError(err));
        assert.strictEqual(err.kind, "unknown_tool");
        assert.strictEqual(err.message, 'Unknown tool "rm_rf" (available: calc)');
        return true;
      },
    );
    assert.strictEqual(calls.length, 0);
  });

  test("blank tool name is a tool_error", async () => {
    const { channel } = fakeChannel(textResult("x"));
    await assert.rejects(
      () => dispatch({ name: "  ", arguments: {} }, channel),
      (err: unknown) => isFerryError(err) && err.kind === "tool_error" && err.message === "Invalid tool name or arguments.",
    );
  });

  test("error results are still returned as text", async () => {
    const { channel } = fakeChannel({ parts: [{ kind: "text", text: "permission denied" }], raw: [], isError: true });
    assert.strictEqual(await dispatch({ name: "calc", arguments: {} }, channel), "permission denied");
  });

  test("channel failures propagate", async () => {
    const channel: ToolChannel = {
      listCapabilities: () => [toCapability({ name: "calc" })],
      callTool: async () => {
        throw new Error("pipe closed");
      },
    };
    await assert.rejects(() => dispatch({ name: "calc", arguments: {} }, channel), /pipe closed/);
  });
});
