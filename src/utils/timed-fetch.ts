import { asError, ferryError } from "../errors.js";

/**
 * Wrap fetch with a deadline and location context.
 * Aborts surface as `timeout_error`, everything else as `transport_error`.
 */
export async function timedFetch(
  url: string,
  init: RequestInit & { timeoutMs?: number; where?: string } = {}
): Promise<Response> {
  const { timeoutMs, where, ...rest } = init;
  let timer: ReturnType<typeof setTimeout> | null = null;

  try {
    if (timeoutMs && timeoutMs > 0) {
      const controller = new AbortController();
      rest.signal = controller.signal;
      timer = setTimeout(() => controller.abort(), timeoutMs);
    }
    return await fetch(url, rest);
  } catch (e: unknown) {
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    throw ferryError(
      isAbort ? "timeout_error" : "transport_error",
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}`,
      { cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
