import { afterEach, describe, expect, it, vi } from "vitest";
import { CliError } from "../../src/errors.js";
import {
  TrpcClient,
  cookieFromEffective,
  parseTrpcEnvelope,
  parseTrpcResponse,
  requireCookieFromEffective,
  trpcPath,
} from "../../src/http/trpc-client.js";
import {
  jsonResponse,
  mockFetch,
  recordingSleep,
  requestBody,
  requestHeaders,
  requestedUrls,
  textResponse,
} from "../helpers/fetch.js";

function kindOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof CliError ? error.kind : undefined;
  }
  return undefined;
}

describe("parseTrpcEnvelope", () => {
  it("unwraps result.data.json from a batch response", () => {
    expect(parseTrpcEnvelope(200, [{ result: { data: { json: { id: "n1" } } } }])).toEqual({ id: "n1" });
  });

  it("falls back to result.data without a json wrapper", () => {
    expect(parseTrpcEnvelope(200, { result: { data: { count: 2 } } })).toEqual({ count: 2 });
    expect(parseTrpcEnvelope(200, { result: {} })).toBeNull();
  });

  it("returns objects without result or error unchanged", () => {
    expect(parseTrpcEnvelope(200, { hello: "world" })).toEqual({ hello: "world" });
    expect(parseTrpcEnvelope(200, 7)).toBe(7);
  });

  it("rejects an empty batch", () => {
    expect(() => parseTrpcEnvelope(200, [])).toThrow("http 200: empty tRPC response");
  });

  it("maps UNAUTHORIZED to session-required", () => {
    const value = [{ error: { message: "login first", data: { code: "UNAUTHORIZED", httpStatus: 401 } } }];
    expect(kindOf(() => parseTrpcEnvelope(200, value))).toBe("session-required");
  });

  it("prefers error.data.httpStatus over the transport status", () => {
    const error = { message: "Network not found", data: { code: "NOT_FOUND", httpStatus: 404 } };
    try {
      parseTrpcEnvelope(200, [{ error }]);
      expect.unreachable();
    } catch (caught) {
      expect(caught instanceof CliError && caught.detail).toEqual({
        kind: "http-status",
        status: 404,
        message: "Network not found",
        body: JSON.stringify(error),
      });
    }
  });

  it("uses a generic message when the error has none", () => {
    expect(() => parseTrpcEnvelope(500, { error: {} })).toThrow("http 500: tRPC error");
  });
});

describe("parseTrpcResponse", () => {
  it("maps HTTP 401 to session-required without reading the body", () => {
    expect(kindOf(() => parseTrpcResponse(401, "<html>"))).toBe("session-required");
  });

  it("reports non-JSON bodies as decode errors", () => {
    expect(kindOf(() => parseTrpcResponse(200, "<html>"))).toBe("decode");
  });

  it("treats an empty 2xx body as a null result", () => {
    expect(parseTrpcResponse(200, "")).toBeNull();
  });

  it("fails on an empty body with an error status", () => {
    expect(() => parseTrpcResponse(404, "")).toThrow("http 404: empty tRPC response");
    expect(() => parseTrpcResponse(500, "  ")).toThrow("http 500: empty tRPC response");
  });
});

describe("session cookies", () => {
  it("builds both session cookie names and the device cookie", () => {
    expect(cookieFromEffective({ sessionCookie: " s1 ", deviceCookie: "d1" })).toBe(
      "next-auth.session-token=s1; __Secure-next-auth.session-token=s1; next-auth.did-token=d1",
    );
    expect(cookieFromEffective({ sessionCookie: "s1" })).toBe(
      "next-auth.session-token=s1; __Secure-next-auth.session-token=s1",
    );
  });

  it("requires a session", () => {
    expect(cookieFromEffective({ sessionCookie: "  ", deviceCookie: "d1" })).toBeUndefined();
    expect(kindOf(() => requireCookieFromEffective({}))).toBe("session-required");
  });
});

describe("TrpcClient.call", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("posts the batch envelope with the cookie", async () => {
    const fetchImpl = mockFetch(() => jsonResponse([{ result: { data: { json: [{ nwid: "abc" }] } } }]));
    const client = new TrpcClient({
      host: "https://h",
      timeoutMs: 1000,
      retries: 0,
      cookie: "next-auth.session-token=s1",
      fetchImpl,
    });

    await expect(client.call(" network.getUserNetworks ", { central: false })).resolves.toEqual([{ nwid: "abc" }]);

    expect(trpcPath("auth.me")).toBe("api/trpc/auth.me?batch=1");
    expect(requestedUrls(fetchImpl)).toEqual(["https://h/api/trpc/network.getUserNetworks?batch=1"]);
    expect(requestBody(fetchImpl, 0)).toBe('{"0":{"json":{"central":false}}}');
    expect(requestHeaders(fetchImpl, 0)).toEqual({
      accept: "application/json",
      "content-type": "application/json",
      cookie: "next-auth.session-token=s1",
    });
  });

  it("falls back from an /api host to the root for tRPC", async () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const fetchImpl = mockFetch((url) =>
      url.pathname === "/api/trpc/auth.me" ? jsonResponse([{ result: { data: { json: { id: "u1" } } } }]) : textResponse("<html>", 404),
    );
    const client = new TrpcClient({
      host: "https://h/api",
      timeoutMs: 1000,
      retries: 0,
      ui: { quiet: false, noColor: true },
      fetchImpl,
    });

    await expect(client.call("auth.me", null)).resolves.toEqual({ id: "u1" });

    expect(requestedUrls(fetchImpl)).toEqual([
      "https://h/api/api/trpc/auth.me?batch=1",
      "https://h/api/trpc/auth.me?batch=1",
    ]);
    expect(errors.mock.calls.map(([line]) => line)).toContain("Fix:        ztnet config set host https://h");
  });

  it("falls back when the primary base answers 404 with an empty body", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const fetchImpl = mockFetch((url) =>
      url.pathname === "/api/api/trpc/auth.me"
        ? jsonResponse([{ result: { data: { json: { id: "u1" } } } }])
        : textResponse("", 404),
    );
    const client = new TrpcClient({ host: "https://h", timeoutMs: 1000, retries: 0, fetchImpl });

    await expect(client.call("auth.me", null)).resolves.toEqual({ id: "u1" });

    expect(requestedUrls(fetchImpl)).toEqual([
      "https://h/api/trpc/auth.me?batch=1",
      "https://h/api/api/trpc/auth.me?batch=1",
    ]);
    expect(client.activeBase).toBe("https://h/api");
  });

  it("surfaces a 500 with an empty body once retries run out", async () => {
    const fetchImpl = mockFetch(() => textResponse("", 500));
    const client = new TrpcClient({
      host: "https://h",
      timeoutMs: 1000,
      retries: 1,
      fetchImpl,
      sleep: recordingSleep(),
    });

    const error = await client.call("auth.me", null).catch((e: unknown) => e);

    expect(error instanceof CliError && error.detail).toEqual({
      kind: "http-status",
      status: 500,
      message: "empty tRPC response",
      body: undefined,
    });
    expect(requestedUrls(fetchImpl)).toEqual([
      "https://h/api/trpc/auth.me?batch=1",
      "https://h/api/trpc/auth.me?batch=1",
    ]);
  });

  it("prints a redacted cookie in dry-run mode", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const fetchImpl = mockFetch(() => jsonResponse([]));
    const client = new TrpcClient({
      host: "https://h",
      timeoutMs: 1000,
      retries: 0,
      dryRun: true,
      cookie: "next-auth.session-token=abcdefgh12345",
      fetchImpl,
    });

    await expect(client.call("auth.me", null)).rejects.toThrow("dry-run: request printed");

    expect(log.mock.calls.map(([line]) => line)).toEqual([
      "POST https://h/api/trpc/auth.me?batch=1",
      "accept: application/json",
      "content-type: application/json",
      "cookie: next…2345",
      "",
      '{\n  "0": {\n    "json": null\n  }\n}',
    ]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rejects cookies with line breaks", async () => {
    const client = new TrpcClient({ host: "https://h", timeoutMs: 1000, retries: 0, cookie: "a=b\r\nx: y" });
    await expect(client.call("auth.me", null)).rejects.toThrow("invalid argument: cookie contains invalid characters");
  });
});
