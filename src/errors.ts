import { z } from "zod";
import { HttpError } from "./http.js";

export type ErrorClass = "transient" | "permanent" | "fatal";

/** Credentials are missing, expired or revoked. No later request can succeed. */
export class AuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${attempts} attempts: ${describeError(cause)}`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

const GoogleApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z
      .array(
        z.object({
          reason: z.string().optional(),
          message: z.string().optional(),
        }),
      )
      .optional(),
  }),
});

const RATE_LIMIT_REASONS = new Set([
  "rateLimitExceeded",
  "userRateLimitExceeded",
  "quotaExceeded",
]);

export function googleErrorReasons(error: HttpError): string[] {
  const parsed = GoogleApiErrorBodySchema.safeParse(error.body);
  if (!parsed.success) {
    return [];
  }
  return (parsed.data.error.errors ?? [])
    .map((entry) => entry.reason)
    .filter((reason): reason is string => Boolean(reason));
}

export function googleErrorMessage(error: HttpError): string | undefined {
  const parsed = GoogleApiErrorBodySchema.safeParse(error.body);
  return parsed.success ? parsed.data.error.message : undefined;
}

export function isRateLimited(error: HttpError): boolean {
  if (error.status === 429) {
    return true;
  }
  return error.status === 403 && googleErrorReasons(error).some((reason) => RATE_LIMIT_REASONS.has(reason));
}

function isNetworkFailure(error: Error): boolean {
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return true;
  }
  return error instanceof TypeError && error.message === "fetch failed";
}

export function classifyError(error: unknown): ErrorClass {
  if (error instanceof AuthError) {
    return "fatal";
  }

  if (error instanceof HttpError) {
    if (error.status === 401) {
      return "fatal";
    }
    if (isRateLimited(error)) {
      return "transient";
    }
    if (error.status >= 500 && error.status <= 599) {
      return "transient";
    }
    return "permanent";
  }

  if (error instanceof Error && isNetworkFailure(error)) {
    return "transient";
  }

  return "permanent";
}

export function describeError(error: unknown): string {
  if (error instanceof HttpError) {
    const reasons = googleErrorReasons(error);
    const detail = googleErrorMessage(error);
    const suffix = [reasons.length > 0 ? reasons.join(",") : undefined, detail]
      .filter(Boolean)
      .join(": ");
    return suffix ? `HTTP ${error.status} (${suffix})` : `HTTP ${error.status}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
