/**
 * ResponseInterpreter: recover a tool invocation from free model text.
 *
 * Models without native tool calling are asked to answer with
 *   {"tool_name": "<name>", "args": {...}}
 * but what comes back is often wrapped in prose, fenced, or slightly broken.
 * Strategies run in a fixed order and each one degrades to the next instead
 * of throwing:
 *
 *   1. flat_object: smallest `{...}` without nested braces that holds "tool_name",
 *                      looking only outside fenced code
 *   2. fenced_block: body of the first fenced block (``` or ```json) that holds "tool_name";
 *                    a block closes on a fence as long as the one that opened it
 *   3. loose_object: `{` … "tool_name" … `}` with no `}` in between, anywhere
 *
 * The brace scanners do not balance nested objects: `{"tool_name":"x","args":{"a":1}}`
 * outside a fence is only reachable through strategy 3 and the regex scrape,
 * which keeps `tool_name` and `query` and nothing else.
 */

import { Logger } from "../logger.js";
import { ferryError, errorLogFields } from "../errors.js";
import type { FerryError } from "../errors.js";
import { isRecord } from "../agent-types.js";
import type { ToolInvocation } from "../agent-types.js";

export type ExtractionStrategy = "flat_object" | "fenced_block" | "loose_object";

/**
 * - `extracted`: an invocation was recovered
 * - `no_call`: plain prose, no call intended
 * - `failed_parse`: the text looked like a call but nothing usable came out
 */
export type ExtractionOutcome = "extracted" | "no_call" | "failed_parse";

export interface Extraction {
  outcome: ExtractionOutcome;
  invocation: ToolInvocation | null;
  strategy?: ExtractionStrategy;
  /** Set when the invocation came from the regex scrape instead of JSON.parse. */
  recovered?: boolean;
  /** A `malformed_extraction` error describing a `failed_parse` outcome. */
  error?: FerryError;
}

const TOOL_NAME_KEY = '"tool_name"';

const FENCED_BLOCK_RE = /(`{3,})[\w+-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?\1/g;
const BACKTICK_RUN_RE = /`+/g;
const FLAT_OBJECT_RE = /\{[^{}]*"tool_name"[^{}]*\}/;
const LOOSE_OBJECT_RE = /\{[^}]*"tool_name"[^}]*\}/;
const TOOL_NAME_RE = /"tool_name"\s*:\s*"([^"]+)"/;
const QUERY_RE = /"query"\s*:\s*"([^"]+)"/;

interface Candidate {
  json: string;
  strategy: ExtractionStrategy;
}

function findCandidate(text: string): Candidate | null {
  const outsideFences = text.replace(FENCED_BLOCK_RE, " ");
  const flat = FLAT_OBJECT_RE.exec(outsideFences);
  if (flat) return { json: flat[0].trim(), strategy: "flat_object" };

  for (const m of text.matchAll(FENCED_BLOCK_RE)) {
    const body = m[2].trim();
    if (body.includes(TOOL_NAME_KEY)) return { json: body, strategy: "fenced_block" };
  }

  const loose = LOOSE_OBJECT_RE.exec(text);
  if (loose) return { json: loose[0].trim(), strategy: "loose_object" };

  return null;
}

/**
 * Drop commas that directly precede `}` or `]`, leaving string literals alone.
 */
export function stripTrailingCommas(json: string): string {
  let out = "";
  let inString = false;
  let escaped = false;

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (inString) {
      out += ch;
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === ",") {
      let j = i + 1;
      while (j < json.length && /\s/.test(json[j])) j++;
      if (json[j] === "}" || json[j] === "]") continue;
    }
    out += ch;
  }
  return out;
}

type ParseResult =
  | { ok: true; invocation: ToolInvocation | null }
  | { ok: false; error: string };

function parseCandidate(json: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripTrailingCommas(json));
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
  if (!isRecord(parsed)) return { ok: true, invocation: null };

  const name = parsed.tool_name;
  if (typeof name !== "string" || !name.trim()) return { ok: true, invocation: null };
  const args = isRecord(parsed.args) ? parsed.args : {};
  return { ok: true, invocation: { name, arguments: args } };
}

/** Last resort: pull `tool_name` and an optional `query` straight out of the text. */
function scrape(text: string): ToolInvocation | null {
  const tool = TOOL_NAME_RE.exec(text);
  if (!tool) return null;
  const args: Record<string, unknown> = {};
  const query = QUERY_RE.exec(text);
  if (query) args.query = query[1];
  return { name: tool[1], arguments: args };
}

function looksLikeCall(text: string): boolean {
  return text.includes("```") || (text.includes("{") && text.includes(TOOL_NAME_KEY));
}

function malformed(message: string, cause?: string): FerryError {
  return ferryError("malformed_extraction", message, cause === undefined ? {} : { cause });
}

/**
 * Run every strategy and report how the text was classified.
 */
export function inspect(text: string): Extraction {
  const candidate = findCandidate(text);

  if (!candidate) {
    if (!looksLikeCall(text)) {
      Logger.debug("interpreter: no candidate (no_call)");
      return { outcome: "no_call", invocation: null };
    }
    Logger.debug("interpreter: no candidate (failed_parse)");
    return { outcome: "failed_parse", invocation: null, error: malformed("no tool call object found in fenced or braced text") };
  }

  const { strategy } = candidate;
  const parsed = parseCandidate(candidate.json);
  if (parsed.ok) {
    if (parsed.invocation) {
      Logger.debug(`interpreter: ${strategy} -> ${parsed.invocation.name}`);
      return { outcome: "extracted", invocation: parsed.invocation, strategy };
    }
    const error = malformed(`${strategy} candidate has no usable tool_name`);
    Logger.warn(`interpreter: ${error.message}`, errorLogFields(error));
    return { outcome: "failed_parse", invocation: null, strategy, error };
  }

  Logger.debug(`interpreter: ${strategy} candidate is not valid JSON (${parsed.error}), scraping`);
  const scraped = scrape(text);
  if (scraped) {
    return { outcome: "extracted", invocation: scraped, strategy, recovered: true };
  }

  const error = malformed(`tool call dropped: ${candidate.json.slice(0, 100)}`, parsed.error);
  Logger.warn(`interpreter: ${error.message}`, errorLogFields(error));
  return { outcome: "failed_parse", invocation: null, strategy, error };
}

/** The tool invocation in `text`, or null when there is none. */
export function extract(text: string): ToolInvocation | null {
  return inspect(text).invocation;
}

/**
 * Canonical free-text form of an invocation, as models are asked to write it.
 * The fence is one backtick longer than any run inside the body.
 */
export function renderInvocation(invocation: ToolInvocation): string {
  const body = JSON.stringify({ tool_name: invocation.name, args: invocation.arguments });
  const longest = Math.max(0, ...Array.from(body.matchAll(BACKTICK_RUN_RE), (m) => m[0].length));
  const fence = "`".repeat(Math.max(3, longest + 1));
  return `${fence}json\n${body}\n${fence}`;
}
