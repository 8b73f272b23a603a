/**
 * Tests for timedFetch.
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import http from "node:http";
import { timedFetch } from "../src/utils/timed-fetch.js";
import { isFerryError } from "../src/errors.js";

function startServer(handler: http.RequestListener): Promise<{ port: number; close: () => Promise<void> }> {
  return new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr !== null ? addr.port : 0;
      resolve({
        port,
        close: () => new Promise<void>((r) => {
          server.closeAllConnections();
          server.close(() => r());
        }),
      });
    });
  });
}

describe("timedFetch", () => {
  test("successful GET", async () => {
    const srv = await startServer((_req, res) => {
      res.writeHead(200, { "content-type": "application/json" });
      res.end(JSON.stringify({ ok: true }));
    });

    try {
      const res = await timedFetch(`http://127.0.0.1:${srv.port}/`, { where: "test" });
      assert.strictEqual(res.status, 200);
      assert.deepStrictEqual(await res.json(), { ok: true });
    } finally {
      await srv.close();
    }
  });

  test("successful POST with body", async () => {
    const srv = await startServer((req, res) => {
      let body = "";
      req.on("data", (d: Buffer) => (body += d.toString()));
      req.on("end", () => {
        res.writeHead(200, { "content-type": "application/json" });
        res.end(JSON.stringify({ echo: body }));
      });
    });

    try {
      const res = await timedFetch(`http://127.0.0.1:${srv.port}/`, {
        method: "POST",
        body: "hello",
        where: "test-post",
      });
      assert.deepStrictEqual(await res.json(), { echo: "hello" });
    } finally {
      await srv.close();
    }
  });

  test("timeout becomes a timeout_error", async () => {
    const srv = await startServer(() => {
      // Never respond, simulate a hang
    });

    try {
      await assert.rejects(
        () => timedFetch(`http://127.0.0.1:${srv.port}/`, { timeoutMs: 100, where: "test-timeout" }),
        (err: unknown) => {
          assert.ok(isFerryError(err));
          assert.strictEqual(err.kind, "timeout_error");
          assert.ok(err.message.startsWith("[fetch timeout] test-timeout "), err.message);
          return true;
        },
      );
    } finally {
      await srv.close();
    }
  });

  test("unreachable host becomes a transport_error", async () => {
    const srv = await startServer((_req, res) => res.end());
    const { port } = srv;
    await srv.close();

    await assert.rejects(
      () => timedFetch(`http://127.0.0.1:${port}/`, { where: "test-refused" }),
      (err: unknown) => {
        assert.ok(isFerryError(err));
        assert.strictEqual(err.kind, "transport_error");
        assert.ok(err.message.startsWith("[fetch error] test-refused "), err.message);
        return true;
      },
    );
  });

  test("no timeout when timeoutMs is 0", async () => {
    const srv = await startServer((_req, res) => {
      res.writeHead(200);
      res.end("ok");
    });

    try {
      const res = await timedFetch(`http://127.0.0.1:${srv.port}/`, { timeoutMs: 0, where: "test-no-timeout" });
      assert.strictEqual(res.status, 200);
      assert.strictEqual(await res.text(), "ok");
    } finally {
      await srv.close();
    }
  });
});
