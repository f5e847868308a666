import { describe, expect, it } from "vitest";
import { CliError } from "../../src/errors.js";
import {
  executeWithRetry,
  parseHttpMethod,
  parseRetryAfter,
  shouldRetryStatus,
  type TransportRequest,
} from "../../src/http/executor.js";
import { jsonResponse, mockFetch, recordingSleep, textResponse } from "../helpers/fetch.js";

function request(): TransportRequest {
  return {
    method: "GET",
    url: new URL("https://h/x"),
    headers: { accept: "application/json" },
    timeoutMs: 1000,
  };
}

function sequence(responses: Array<() => Response>) {
  let index = 0;
  return mockFetch(() => {
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    return next();
  });
}

describe("executeWithRetry", () => {
  it("retries 5xx with doubling backoff and returns the first success", async () => {
    const fetchImpl = sequence([
      () => textResponse("busy", 503),
      () => textResponse("busy", 503),
      () => textResponse("busy", 503),
      () => jsonResponse({ ok: true }),
    ]);
    const sleep = recordingSleep();

    const response = await executeWithRetry(request(), { retries: 3, sleep }, fetchImpl);

    expect(response.status).toBe(200);
    expect(fetchImpl).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400, 800]);
  });

  it("caps the backoff at five seconds", async () => {
    const fetchImpl = sequence([() => textResponse("down", 500)]);
    const sleep = recordingSleep();

    const response = await executeWithRetry(request(), { retries: 6, sleep }, fetchImpl);

    expect(response.status).toBe(500);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400, 800, 1600, 3200, 5000]);
  });

  it("prefers Retry-After on 429", async () => {
    const fetchImpl = sequence([
      () => textResponse("slow down", 429, { "retry-after": "2" }),
      () => jsonResponse([]),
    ]);
    const sleep = recordingSleep();

    const response = await executeWithRetry(request(), { retries: 3, sleep }, fetchImpl);

    expect(response.status).toBe(200);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
  });

  it("throws rate-limited when 429 persists on the last attempt", async () => {
    const fetchImpl = sequence([() => textResponse("slow down", 429)]);
    const sleep = recordingSleep();

    const error = await executeWithRetry(request(), { retries: 1, sleep }, fetchImpl).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError && error.kind).toBe("rate-limited");
    expect(error instanceof CliError && error.exitCode()).toBe(6);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200]);
  });

  it("returns non-retryable statuses without retrying", async () => {
    const fetchImpl = sequence([() => textResponse("nope", 404)]);
    const sleep = recordingSleep();

    const response = await executeWithRetry(request(), { retries: 3, sleep }, fetchImpl);

    expect(response.status).toBe(404);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries transport errors and then succeeds", async () => {
    let calls = 0;
    const fetchImpl = mockFetch(() => {
      calls += 1;
      if (calls <= 2) throw new TypeError("fetch failed");
      return jsonResponse({ ok: true });
    });
    const sleep = recordingSleep();

    const response = await executeWithRetry(request(), { retries: 2, sleep }, fetchImpl);

    expect(response.status).toBe(200);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400]);
  });

  it("wraps exhausted transport errors", async () => {
    const fetchImpl = mockFetch(() => {
      throw new TypeError("fetch failed");
    });

    const error = await executeWithRetry(request(), { retries: 0, sleep: recordingSleep() }, fetchImpl).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(CliError);
    expect(error instanceof CliError && error.detail).toEqual({
      kind: "transport",
      message: "fetch failed (https://h/x)",
      timeout: false,
    });
    expect(error instanceof CliError && error.message).toBe("request failed: fetch failed (https://h/x)");
  });

  it("marks timeouts", async () => {
    const fetchImpl = mockFetch(() => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      throw timeout;
    });

    const error = await executeWithRetry(request(), { retries: 0, sleep: recordingSleep() }, fetchImpl).catch(
      (e: unknown) => e,
    );

    expect(error instanceof CliError && error.detail).toEqual({
      kind: "transport",
      message: "timed out requesting https://h/x",
      timeout: true,
    });
  });

  it("passes method, headers and an abort signal to fetch", async () => {
    const fetchImpl = sequence([() => jsonResponse({})]);

    await executeWithRetry({ ...request(), method: "POST", body: "{}" }, { retries: 0 }, fetchImpl);

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe("{}");
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe("retry helpers", () => {
  it("classifies retryable statuses", () => {
    expect(shouldRetryStatus(429)).toBe(true);
    expect(shouldRetryStatus(502)).toBe(true);
    expect(shouldRetryStatus(404)).toBe(false);
    expect(shouldRetryStatus(401)).toBe(false);
  });

  it("parses integer Retry-After seconds only", () => {
    expect(parseRetryAfter(new Headers({ "retry-after": " 3 " }))).toBe(3000);
    expect(parseRetryAfter(new Headers({ "retry-after": "Wed, 21 Oct 2026 07:28:00 GMT" }))).toBeUndefined();
    expect(parseRetryAfter(new Headers({ "retry-after": "1.5" }))).toBeUndefined();
    expect(parseRetryAfter(new Headers())).toBeUndefined();
  });

  it("parses http methods case-insensitively", () => {
    expect(parseHttpMethod("patch")).toBe("PATCH");
    expect(() => parseHttpMethod("fetch")).toThrow("invalid argument: invalid http method: FETCH");
  });
});
