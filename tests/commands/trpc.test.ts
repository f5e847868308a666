import { describe, expect, it } from "vitest";
import { loadProcedureCatalog, parseProcedureName } from "../../src/commands/trpc.js";
import { emptyConfig } from "../../src/config/store.js";
import { CliError } from "../../src/errors.js";
import { jsonResponse, mockFetch, requestBody, requestHeaders, requestedUrls, textResponse } from "../helpers/fetch.js";
import { MemoryConfigStore, runCli } from "../helpers/program.js";

function withSession(): MemoryConfigStore {
  return new MemoryConfigStore({ ...emptyConfig(), profiles: { default: { sessionCookie: "sess-1" } } });
}

function errorMessage(error: unknown): string | undefined {
  return error instanceof CliError ? error.message : undefined;
}

describe("procedure names", () => {
  it("accepts router.procedure", () => {
    expect(parseProcedureName(" network.getUserNetworks ")).toBe("network.getUserNetworks");
  });

  it("rejects names without a router", () => {
    expect(() => parseProcedureName("network")).toThrow(
      "invalid argument: invalid procedure name (expected router.procedure): network",
    );
    expect(() => parseProcedureName("network/../x")).toThrow("invalid procedure name");
  });
});

describe("procedure catalog", () => {
  it("loads the bundled catalog", async () => {
    const catalog = await loadProcedureCatalog();
    expect(catalog.routers.network).toContain("getUserNetworks");
    expect(catalog.routers.auth).toContain("me");
  });

  it("prints it through trpc list", async () => {
    const run = await runCli(["--json", "trpc", "list"], { store: new MemoryConfigStore() });
    const printed: unknown = JSON.parse(run.stdout.join("\n"));
    expect(printed).toEqual(await loadProcedureCatalog());
  });
});

describe("ztnet trpc call", () => {
  it("sends the stored session and prints the unwrapped result", async () => {
    const fetchImpl = mockFetch(() => jsonResponse([{ result: { data: { json: [{ nwid: "abc" }] } } }]));

    const run = await runCli(["--json", "trpc", "call", "network.getUserNetworks", "--input", '{"central":false}'], {
      store: withSession(),
      fetchImpl,
    });

    expect(run.error).toBeUndefined();
    expect(run.stdout).toEqual(['[\n  {\n    "nwid": "abc"\n  }\n]']);
    expect(requestedUrls(fetchImpl)).toEqual(["http://localhost:3000/api/trpc/network.getUserNetworks?batch=1"]);
    expect(requestBody(fetchImpl, 0)).toBe('{"0":{"json":{"central":false}}}');
    expect(requestHeaders(fetchImpl, 0).cookie).toBe(
      "next-auth.session-token=sess-1; __Secure-next-auth.session-token=sess-1",
    );
  });

  it("sends null input by default and prefers an explicit cookie", async () => {
    const fetchImpl = mockFetch(() => jsonResponse([{ result: { data: { json: { id: "u1" } } } }]));

    await runCli(["trpc", "call", "auth.me", "--cookie", " next-auth.session-token=other "], {
      store: withSession(),
      fetchImpl,
    });

    expect(requestBody(fetchImpl, 0)).toBe('{"0":{"json":null}}');
    expect(requestHeaders(fetchImpl, 0).cookie).toBe("next-auth.session-token=other");
  });

  it("maps an expired session to exit code 3", async () => {
    const fetchImpl = mockFetch(() => textResponse("", 401));

    const run = await runCli(["trpc", "call", "auth.me"], { store: withSession(), fetchImpl });

    expect(run.error instanceof CliError && run.error.kind).toBe("session-required");
    expect(run.error instanceof CliError && run.error.exitCode()).toBe(3);
  });

  it("rejects both cookie sources at once", async () => {
    const run = await runCli(["trpc", "call", "auth.me", "--cookie", "a=b", "--cookie-file", "cookie.txt"], {
      store: withSession(),
    });
    expect(errorMessage(run.error)).toBe("invalid argument: cannot combine --cookie with --cookie-file");
  });

  it("validates the procedure name before sending", async () => {
    const fetchImpl = mockFetch(() => jsonResponse([]));
    const run = await runCli(["trpc", "call", "me"], { store: withSession(), fetchImpl });
    expect(errorMessage(run.error)).toBe("invalid argument: invalid procedure name (expected router.procedure): me");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
