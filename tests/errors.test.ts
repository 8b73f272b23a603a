/**
 * Tests for structured error types (FerryError).
 *
 * Covers: ferryError, asError, isFerryError, hasKind, errorLogFields
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { ferryError, asError, isFerryError, hasKind, errorLogFields } from "../src/errors.js";

// ---------------------------------------------------------------------------
// ferryError factory
// ---------------------------------------------------------------------------

describe("ferryError", () => {
  test("creates an Error with kind and retryable fields", () => {
    const e = ferryError("provider_error", "chat failed");
    assert.ok(e instanceof Error);
    assert.strictEqual(e.kind, "provider_error");
    assert.strictEqual(e.message, "chat failed");
    assert.strictEqual(e.retryable, false);
    assert.ok(e.stack, "should have a stack trace");
  });

  test("optional fields are set when provided", () => {
    const e = ferryError("tool_error", "fail", {
      model: "gemma3:12b",
      tool: "list_directory",
      latency_ms: 450,
      cause: new Error("underlying"),
    });
    assert.strictEqual(e.model, "gemma3:12b");
    assert.strictEqual(e.tool, "list_directory");
    assert.strictEqual(e.latency_ms, 450);
    assert.ok(e.cause instanceof Error);
  });

  test("optional fields are omitted when not provided", () => {
    const e = ferryError("config_error", "bad config");
    assert.strictEqual(e.model, undefined);
    assert.strictEqual(e.tool, undefined);
    assert.strictEqual(e.latency_ms, undefined);
    assert.strictEqual(e.cause, undefined);
  });

  test("latency_ms of 0 is preserved", () => {
    const e = ferryError("timeout_error", "fast fail", { latency_ms: 0 });
    assert.strictEqual(e.latency_ms, 0);
  });
});

// ---------------------------------------------------------------------------
// asError
// ---------------------------------------------------------------------------

describe("asError", () => {
  test("returns Error instances unchanged", () => {
    const original = new Error("original");
    assert.strictEqual(asError(original), original);
  });

  test("wraps strings into Error", () => {
    const result = asError("something broke");
    assert.ok(result instanceof Error);
    assert.strictEqual(result.message, "something broke");
  });

  test("truncates long strings to 1024 chars", () => {
    assert.strictEqual(asError("x".repeat(2000)).message.length, 1024);
  });

  test("handles null and undefined", () => {
    assert.strictEqual(asError(null).message, "Unknown error");
    assert.strictEqual(asError(undefined).message, "Unknown error");
  });

  test("handles numbers", () => {
    assert.strictEqual(asError(42).message, "42");
  });

  test("truncates long stringified values", () => {
    const longToString = { toString: () => "w".repeat(2000) };
    assert.strictEqual(asError(longToString).message.length, 1024);
  });
});

// ---------------------------------------------------------------------------
// isFerryError / hasKind
// ---------------------------------------------------------------------------

describe("isFerryError", () => {
  test("returns true for ferryError instances", () => {
    assert.strictEqual(isFerryError(ferryError("mcp_error", "test")), true);
  });

  test("returns false for plain Error", () => {
    assert.strictEqual(isFerryError(new Error("nope")), false);
  });

  test("returns false for non-Error objects", () => {
    assert.strictEqual(isFerryError({ kind: "provider_error", retryable: false }), false);
  });

  test("returns false for null and strings", () => {
    assert.strictEqual(isFerryError(null), false);
    assert.strictEqual(isFerryError("error"), false);
  });
});

describe("hasKind", () => {
  test("matches only the given kind", () => {
    const e = ferryError("unsupported_feature", "no tools");
    assert.strictEqual(hasKind(e, "unsupported_feature"), true);
    assert.strictEqual(hasKind(e, "provider_error"), false);
    assert.strictEqual(hasKind(new Error("plain"), "unsupported_feature"), false);
  });
});

// ---------------------------------------------------------------------------
// errorLogFields
// ---------------------------------------------------------------------------

describe("errorLogFields", () => {
  test("returns basic fields for a minimal FerryError", () => {
    const fields = errorLogFields(ferryError("config_error", "bad"));
    assert.strictEqual(fields.kind, "config_error");
    assert.strictEqual(fields.message, "bad");
    assert.strictEqual(fields.retryable, false);
    assert.ok(fields.stack, "should include stack");
    assert.strictEqual("model" in fields, false);
    assert.strictEqual("tool" in fields, false);
  });

  test("includes optional fields and the cause", () => {
    const fields = errorLogFields(ferryError("mcp_error", "fail", {
      model: "gemma3:1b",
      tool: "google_search",
      latency_ms: 100,
      cause: new Error("socket closed"),
    }));
    assert.strictEqual(fields.model, "gemma3:1b");
    assert.strictEqual(fields.tool, "google_search");
    assert.strictEqual(fields.latency_ms, 100);
    assert.strictEqual(fields.cause_message, "socket closed");
    assert.ok(fields.cause_stack);
  });

  test("non-Error causes are normalized", () => {
    const fields = errorLogFields(ferryError("transport_error", "down", { cause: "ECONNREFUSED" }));
    assert.strictEqual(fields.cause_message, "ECONNREFUSED");
  });
});
