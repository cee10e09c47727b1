import type { z } from "zod";

export interface HttpClient {
  userAgent: string;
  timeoutMs: number;
  fetchFn: typeof fetch;
}

export function createHttpClient(options: {
  userAgent: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}): HttpClient {
  return {
    userAgent: options.userAgent,
    timeoutMs: options.timeoutMs,
    fetchFn: options.fetchFn ?? fetch,
  };
}

export type FetchOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** GET a URL as text. Never throws: non-2xx, timeouts and transport errors become a failed outcome. */
export async function fetchText(
  http: HttpClient,
  url: string,
  timeoutMs: number = http.timeoutMs
): Promise<FetchOutcome<string>> {
  try {
    const response = await http.fetchFn(url, {
      headers: { "User-Agent": http.userAgent },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return { ok: false, reason: `HTTP ${response.status} for ${url}` };
    }
    return { ok: true, value: await response.text() };
  } catch (error) {
    return { ok: false, reason: `${url}: ${describeError(error)}` };
  }
}

export async function fetchJson<S extends z.ZodTypeAny>(
  http: HttpClient,
  url: string,
  schema: S
): Promise<FetchOutcome<z.output<S>>> {
  const text = await fetchText(http, url);
  if (!text.ok) return text;

  let raw: unknown;
  try {
    raw = JSON.parse(text.value);
  } catch (error) {
    return { ok: false, reason: `Malformed JSON from ${url}: ${describeError(error)}` };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: `Unexpected payload from ${url}: ${parsed.error.message}` };
  }
  return { ok: true, value: parsed.data };
}
