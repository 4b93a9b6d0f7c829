import { describe, expect, it } from "vitest";
import { AuthError, RetryExhaustedError, classifyError, describeError } from "../src/errors.js";
import { HttpError } from "../src/http.js";
import { googleError } from "./support/fakes.js";

describe("classifyError", () => {
  it("treats credential problems as fatal", () => {
    expect(classifyError(new AuthError("Google token not found. Run auth:google first."))).toBe("fatal");
    expect(classifyError(googleError(401, "authError"))).toBe("fatal");
  });

  it("treats throttling, server errors and network failures as transient", () => {
    expect(classifyError(googleError(429))).toBe("transient");
    expect(classifyError(googleError(403, "rateLimitExceeded"))).toBe("transient");
    expect(classifyError(googleError(403, "userRateLimitExceeded"))).toBe("transient");
    expect(classifyError(googleError(500))).toBe("transient");
    expect(classifyError(googleError(503))).toBe("transient");
    expect(classifyError(new TypeError("fetch failed"))).toBe("transient");
    const timeout = Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    expect(classifyError(timeout)).toBe("transient");
  });

  it("treats everything else as permanent", () => {
    expect(classifyError(googleError(400, "invalid"))).toBe("permanent");
    expect(classifyError(googleError(403, "forbidden"))).toBe("permanent");
    expect(classifyError(googleError(404, "notFound"))).toBe("permanent");
    expect(classifyError(googleError(409, "duplicate"))).toBe("permanent");
    expect(classifyError(new Error("boom"))).toBe("permanent");
    expect(classifyError(new RetryExhaustedError(5, googleError(503)))).toBe("permanent");
  });
});

describe("describeError", () => {
  it("includes Google's reason and message", () => {
    expect(describeError(googleError(403, "rateLimitExceeded", "Rate Limit Exceeded"))).toBe(
      "HTTP 403 (rateLimitExceeded: Rate Limit Exceeded)",
    );
  });

  it("falls back to the status for bodies that are not Google errors", () => {
    expect(describeError(new HttpError("GET /x failed with status 502", 502, "<html>", new Headers()))).toBe(
      "HTTP 502",
    );
  });

  it("describes exhausted retries by their last error", () => {
    expect(describeError(new RetryExhaustedError(5, googleError(503, "backendError", "Backend Error")))).toBe(
      "Gave up after 5 attempts: HTTP 503 (backendError: Backend Error)",
    );
  });
});
