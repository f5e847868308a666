import fs from "fs-extra";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  JsonConfigStore,
  defaultConfigPath,
  emptyConfig,
  ensureProfile,
  getProfile,
  hasProfile,
  parseProfileName,
} from "../../src/config/store.js";
import { CliError } from "../../src/errors.js";

describe("JsonConfigStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ztnet-config-"));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it("returns an empty config when the file does not exist", async () => {
    const store = new JsonConfigStore(path.join(dir, "missing", "config.json"));
    await expect(store.load()).resolves.toEqual({ profiles: {}, hostDefaults: {} });
  });

  it("creates parent directories and reads back what it wrote", async () => {
    const store = new JsonConfigStore(path.join(dir, "nested", "config.json"));
    const config = emptyConfig();
    config.activeProfile = "lab";
    Object.assign(ensureProfile(config, "lab"), { host: "https://lab.example", retries: 2 });
    config.hostDefaults["https://lab.example"] = "lab";

    await store.save(config);

    await expect(store.load()).resolves.toEqual({
      activeProfile: "lab",
      profiles: { lab: { host: "https://lab.example", retries: 2 } },
      hostDefaults: { "https://lab.example": "lab" },
    });
  });

  it("fills in missing tables", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, '{"activeProfile":"x"}');
    await expect(new JsonConfigStore(file).load()).resolves.toEqual({
      activeProfile: "x",
      profiles: {},
      hostDefaults: {},
    });
  });

  it("reports unparseable files as config errors", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeFile(file, "{ not json");

    const error = await new JsonConfigStore(file).load().catch((e: unknown) => e);

    expect(error instanceof CliError && error.kind).toBe("config");
    expect(error instanceof CliError && error.message.startsWith("failed to read config file (")).toBe(true);
    expect(error instanceof CliError && error.message.endsWith(`): ${file}`)).toBe(true);
  });

  it("names the offending field when validation fails", async () => {
    const file = path.join(dir, "config.json");
    await fs.writeJson(file, { profiles: { lab: { retries: -1 } } });

    await expect(new JsonConfigStore(file).load()).rejects.toThrow("invalid config file at profiles.lab.retries: ");
  });
});

describe("defaultConfigPath", () => {
  it("honours ZTNET_CONFIG", () => {
    expect(defaultConfigPath({ ZTNET_CONFIG: "/srv/ztnet/cli.json" }, "linux")).toBe("/srv/ztnet/cli.json");
  });

  it("follows XDG on linux", () => {
    expect(defaultConfigPath({ XDG_CONFIG_HOME: "/xdg", HOME: "/home/u" }, "linux")).toBe("/xdg/ztnet/config.json");
    expect(defaultConfigPath({ HOME: "/home/u" }, "linux")).toBe("/home/u/.config/ztnet/config.json");
  });

  it("uses Application Support on macOS", () => {
    expect(defaultConfigPath({ HOME: "/Users/u" }, "darwin")).toBe(
      "/Users/u/Library/Application Support/ztnet/config.json",
    );
  });

  it("needs APPDATA on windows", () => {
    expect(() => defaultConfigPath({}, "win32")).toThrow("failed to determine config directory");
  });
});

describe("profile lookup", () => {
  it("only sees own profiles", () => {
    const config = emptyConfig();
    expect(hasProfile(config, "constructor")).toBe(false);
    expect(hasProfile(config, "toString")).toBe(false);
    expect(getProfile(config, "constructor")).toEqual({});
  });

  it("rejects names that live on the object prototype", () => {
    const config = emptyConfig();
    expect(() => ensureProfile(config, "__proto__")).toThrow("invalid argument: invalid profile name: __proto__");
    expect(() => ensureProfile(config, " constructor ")).toThrow("invalid argument: invalid profile name: constructor");
    expect(() => parseProfileName("prototype")).toThrow("invalid profile name: prototype");
    expect(() => parseProfileName("  ")).toThrow("invalid argument: profile name cannot be empty");
    expect(config.profiles).toEqual({});
  });

  it("creates a profile under the trimmed name", () => {
    const config = emptyConfig();
    ensureProfile(config, " lab ").token = "test-token";
    expect(config.profiles).toEqual({ lab: { token: "test-token" } });
  });
});
