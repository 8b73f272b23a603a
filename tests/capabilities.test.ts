/**
 * Tests for capability discovery conversion.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { toCapability, toToolDefinitions, renderToolListing, findCapability } from "../src/tools/capabilities.js";

const listDirectory = toCapability({
  name: "list_directory",
  description: "List files and directories in a specified path.",
  inputSchema: {
    type: "object",
    properties: {
      path: { type: "string", description: "Directory to list" },
      show_hidden: { type: "boolean", description: "Include dotfiles" },
    },
    required: ["path"],
  },
});

describe("toCapability", () => {
  test("reads parameters and required flags from the input schema", () => {
    assert.deepStrictEqual(listDirectory.parameters, {
      path: { type: "string", description: "Directory to list", required: true },
      show_hidden: { type: "boolean", description: "Include dotfiles" },
    });
  });

  test("missing schema pieces fall back to defaults", () => {
    const cap = toCapability({ name: "get_time", inputSchema: { properties: { tz: {} } } });
    assert.strictEqual(cap.description, "");
    assert.deepStrictEqual(cap.parameters, { tz: { type: "unknown", description: "" } });
  });

  test("capabilities are frozen", () => {
    assert.ok(Object.isFrozen(listDirectory));
    assert.ok(Object.isFrozen(listDirectory.parameters));
  });
});

describe("toToolDefinitions", () => {
  test("builds function definitions with required arguments", () => {
    assert.deepStrictEqual(toToolDefinitions([listDirectory]), [
      {
        type: "function",
        function: {
          name: "list_directory",
          description: "List files and directories in a specified path.",
          parameters: {
            type: "object",
            properties: {
              path: { type: "string", description: "Directory to list" },
              show_hidden: { type: "boolean", description: "Include dotfiles" },
            },
            required: ["path"],
          },
        },
      },
    ]);
  });

  test("unknown parameter types are sent as string and no required list is emitted when empty", () => {
    const [def] = toToolDefinitions([toCapability({ name: "get_time", inputSchema: { properties: { tz: {} } } })]);
    assert.deepStrictEqual(def.function.parameters, {
      type: "object",
      properties: { tz: { type: "string", description: "" } },
    });
  });
});

describe("renderToolListing", () => {
  test("numbers each tool and lists its arguments", () => {
    const noArgs = toCapability({ name: "get_time", description: "Current time" });
    assert.strictEqual(
      renderToolListing([listDirectory, noArgs]),
      "1. list_directory : List files and directories in a specified path.\n" +
        "   Args: path (string), show_hidden (boolean)\n" +
        "2. get_time : Current time\n" +
        "   Args: ",
    );
  });

  test("empty capability set renders as empty string", () => {
    assert.strictEqual(renderToolListing([]), "");
  });
});

describe("findCapability", () => {
  test("matches by exact name", () => {
    assert.strictEqual(findCapability([listDirectory], "list_directory"), listDirectory);
    assert.strictEqual(findCapability([listDirectory], "List_Directory"), undefined);
  });
});
