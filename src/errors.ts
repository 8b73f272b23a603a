/**
 * Structured error types for ferry.
 *
 * Every boundary that catches a fault wraps it with ferryError() so the
 * orchestrator can report one line to the user and the logs keep the
 * cause chain and stack.
 */

export type FerryErrorKind =
  | "transport_error"
  | "timeout_error"
  | "provider_error"
  | "unsupported_feature"
  | "malformed_extraction"
  | "unknown_tool"
  | "tool_error"
  | "mcp_error"
  | "persistence_error"
  | "config_error";

export interface FerryError extends Error {
  kind: FerryErrorKind;
  model?: string;
  tool?: string;
  retryable: boolean;
  latency_ms?: number;
  cause?: unknown;
}

const MAX_MESSAGE = 1024;

/**
 * Create a FerryError with structured fields.
 */
export function ferryError(
  kind: FerryErrorKind,
  message: string,
  opts: {
    model?: string;
    tool?: string;
    retryable?: boolean;
    latency_ms?: number;
    cause?: unknown;
  } = {},
): FerryError {
  const err: FerryError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.model) err.model = opts.model;
  if (opts.tool) err.tool = opts.tool;
  if (opts.latency_ms !== undefined) err.latency_ms = opts.latency_ms;
  if (opts.cause !== undefined) err.cause = opts.cause;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e.slice(0, MAX_MESSAGE));
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e).slice(0, MAX_MESSAGE));
  } catch {
    return new Error("Unknown error");
  }
}

export function isFerryError(e: unknown): e is FerryError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

/** True when `e` is a FerryError of the given kind. */
export function hasKind(e: unknown, kind: FerryErrorKind): boolean {
  return isFerryError(e) && e.kind === kind;
}

/**
 * Format a FerryError for structured logging.
 */
export function errorLogFields(e: FerryError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.model) fields.model = e.model;
  if (e.tool) fields.tool = e.tool;
  if (e.latency_ms !== undefined) fields.latency_ms = e.latency_ms;
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
