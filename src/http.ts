export class HttpError extends Error {
  readonly status: number;
  readonly body: unknown;
  readonly headers: Headers;

  constructor(message: string, status: number, body: unknown, headers: Headers) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
    this.headers = headers;
  }
}

function tryParseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export async function requestJson<T>(
  input: string,
  init: RequestInit = {},
  timeoutMs = 30_000,
): Promise<T> {
  const response = await fetch(input, {
    ...init,
    signal: init.signal ?? AbortSignal.timeout(timeoutMs),
  });

  const text = await response.text();
  const parsed = tryParseBody(text);

  if (!response.ok) {
    throw new HttpError(
      `${init.method ?? "GET"} ${new URL(input).pathname} failed with status ${response.status}`,
      response.status,
      parsed,
      response.headers,
    );
  }

  return (parsed ?? {}) as T;
}

export function toFormBody(params: Record<string, string>): string {
  const body = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    body.set(key, value);
  }
  return body.toString();
}

/**
 * Reads a `Retry-After` header given either as delta-seconds or as an HTTP date.
 * Returns undefined when the header is absent or unreadable.
 */
export function getRetryAfterMs(headers: Headers, now = Date.now()): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (!retryAfter) {
    return undefined;
  }

  const asNumber = Number(retryAfter);
  if (!Number.isNaN(asNumber)) {
    return Math.max(asNumber * 1_000, 0);
  }

  const asDate = Date.parse(retryAfter);
  if (Number.isNaN(asDate)) {
    return undefined;
  }
  return Math.max(asDate - now, 0);
}

export async function wait(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}
