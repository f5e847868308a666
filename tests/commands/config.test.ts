import { describe, expect, it } from "vitest";
import { CliError } from "../../src/errors.js";
import { MemoryConfigStore, runCli } from "../helpers/program.js";

describe("ztnet config", () => {
  it("prints the config path", async () => {
    const run = await runCli(["config", "path"], { store: new MemoryConfigStore() });
    expect(run.stdout).toEqual(["/tmp/ztnet-test/config.json"]);
  });

  it("sets the host of the current profile through the shorthand", async () => {
    const store = new MemoryConfigStore();

    const run = await runCli(["config", "set", "host", "Lab.Example/"], { store });

    expect(run.error).toBeUndefined();
    expect(run.stderr).toEqual(["Set profiles.default.host."]);
    expect(store.current.profiles).toEqual({ default: { host: "https://lab.example" } });
  });

  it("targets the profile named by --profile", async () => {
    const store = new MemoryConfigStore();
    await runCli(["--profile", "lab", "config", "set", "host", "lab.example"], { store });
    expect(store.current.profiles).toEqual({ lab: { host: "https://lab.example" } });
  });

  it("can repair a profile whose stored host is broken", async () => {
    const store = new MemoryConfigStore({
      profiles: { default: { host: "ftp://broken.example" } },
      hostDefaults: {},
    });

    const run = await runCli(["config", "set", "host", "ok.example"], { store });

    expect(run.error).toBeUndefined();
    expect(store.current.profiles.default.host).toBe("https://ok.example");
  });

  it("stays silent with --quiet", async () => {
    const run = await runCli(["--quiet", "config", "set", "activeProfile", "ops"], { store: new MemoryConfigStore() });
    expect(run.stderr).toEqual([]);
  });

  it("reads values back in table and json form", async () => {
    const store = new MemoryConfigStore({
      profiles: { default: { host: "https://lab.example", retries: 2 } },
      hostDefaults: {},
    });

    expect((await runCli(["config", "get", "profiles.default.host"], { store })).stdout).toEqual([
      "https://lab.example",
    ]);
    expect((await runCli(["config", "get", "profiles.default.token"], { store })).stdout).toEqual([""]);
    expect((await runCli(["--json", "config", "get", "profiles.default"], { store })).stdout).toEqual([
      '{\n  "host": "https://lab.example",\n  "retries": 2\n}',
    ]);
  });

  it("rejects invalid values without saving", async () => {
    const store = new MemoryConfigStore();

    const run = await runCli(["config", "set", "profiles.default.retries", "many"], { store });

    expect(run.error).toBeInstanceOf(CliError);
    expect(run.error instanceof CliError && run.error.message).toBe("invalid argument: invalid retries value: many");
    expect(store.saves).toBe(0);
  });

  it("unsets a value", async () => {
    const store = new MemoryConfigStore({
      profiles: { default: { host: "https://lab.example", token: "test-token" } },
      hostDefaults: {},
    });

    const run = await runCli(["config", "unset", "profiles.default.token"], { store });

    expect(run.stderr).toEqual(["Unset profiles.default.token."]);
    expect(store.current.profiles.default).toEqual({ host: "https://lab.example" });
  });

  it("lists the effective configuration with a redacted token", async () => {
    const store = new MemoryConfigStore({
      profiles: { default: { token: "test-token-123" } },
      hostDefaults: {},
    });

    const run = await runCli(["config", "list"], { store });

    expect(run.stdout).toEqual([
      [
        "configPath: /tmp/ztnet-test/config.json",
        "host: http://localhost:3000",
        "network: ",
        "org: ",
        "output: table",
        "profile: default",
        "retries: 3",
        "timeout: 30s",
        "token: test…-123",
      ].join("\n"),
    ]);
  });
});

describe("ztnet config context", () => {
  it("stores the global --org and --network as defaults", async () => {
    const store = new MemoryConfigStore();

    const run = await runCli(["config", "context", "set", "--org", "org-1", "--network", "net-1"], { store });

    expect(run.error).toBeUndefined();
    expect(run.stderr).toEqual(["Context updated for profile 'default'."]);
    expect(store.current.profiles.default).toEqual({ defaultOrg: "org-1", defaultNetwork: "net-1" });

    const shown = await runCli(["--json", "config", "context", "show"], { store });
    expect(shown.stdout).toEqual(['{\n  "profile": "default",\n  "org": "org-1",\n  "network": "net-1"\n}']);
  });

  it("requires at least one of --org or --network", async () => {
    const run = await runCli(["config", "context", "set"], { store: new MemoryConfigStore() });
    expect(run.error instanceof CliError && run.error.message).toBe(
      "invalid argument: context set requires at least one of --org or --network",
    );
  });

  it("clears the defaults", async () => {
    const store = new MemoryConfigStore({
      profiles: { default: { host: "https://lab.example", defaultOrg: "org-1" } },
      hostDefaults: {},
    });

    await runCli(["config", "context", "clear"], { store });

    expect(store.current.profiles.default).toEqual({ host: "https://lab.example" });
  });
});
