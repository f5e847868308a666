/**
 * `ztnet auth` 命令组：token / session 凭据、profile 与 host 默认映射。
 *
 * 关键点（中文）
 * - 凭据写入前先做 host 绑定检查（见 `CommandRuntime.bindCredentialProfile`）。
 * - `hosts set-default` 只写入规范化 key，不校验 profile；悬空映射在解析时才报错。
 */

import type { Command } from "commander";
import prompts from "prompts";
import { CliError } from "../errors.js";
import { redactSecret } from "../http/dry-run.js";
import { ensureProfile, getProfile, parseProfileName } from "../config/store.js";
import { canonicalHostKey, tryCanonicalHostKey } from "../http/host.js";
import { printHumanOrMachine, printValue } from "../output/render.js";
import type { JsonObject } from "../types/json.js";
import { formatDuration } from "../utils/time.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

const SESSION_COOKIE_NAMES = ["next-auth.session-token", "__Secure-next-auth.session-token"] as const;
const DEVICE_COOKIE_NAMES = ["next-auth.did-token"] as const;

/**
 * 从用户粘贴的内容中取出 cookie 值。
 *
 * 说明（中文）
 * - 可以是裸值，也可以是浏览器里复制的整段 `name=value; name2=value2`。
 */
export function extractCookieValue(input: string, names: readonly string[]): string {
  const trimmed = input.trim();
  if (!trimmed.includes("=")) return trimmed;

  for (const pair of trimmed.split(";")) {
    const index = pair.indexOf("=");
    if (index === -1) continue;
    const name = pair.slice(0, index).trim();
    if (names.includes(name)) {
      return pair.slice(index + 1).trim();
    }
  }
  throw CliError.invalidArgument(`cookie does not contain ${names.join(" or ")}`);
}

async function promptHiddenToken(): Promise<string> {
  const response = await prompts({
    type: "password",
    name: "token",
    message: "API token",
  });
  return typeof response.token === "string" ? response.token.trim() : "";
}

async function resolveTokenInput(
  runtime: CommandRuntime,
  token: string | undefined,
  fromStdin: boolean,
): Promise<string> {
  if (fromStdin && token !== undefined) {
    throw CliError.invalidArgument("cannot combine --stdin with a positional TOKEN");
  }

  let value: string;
  if (fromStdin) {
    value = await runtime.readStdin();
  } else if (token !== undefined) {
    value = token.trim();
  } else if (runtime.isInteractive() && !runtime.quiet) {
    value = await promptHiddenToken();
  } else {
    throw CliError.invalidArgument("missing TOKEN (or pass --stdin)");
  }

  if (!value) {
    throw CliError.invalidArgument("token cannot be empty");
  }
  return value;
}

function registerProfilesCommands(auth: Command, deps: ProgramDeps): void {
  const profiles = auth
    .command("profiles")
    .description("List and switch profiles")
    .helpOption("--help", "display help for command");

  profiles
    .command("list")
    .description("List configured profiles")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const config = await runtime.loadConfig();
      printHumanOrMachine(
        {
          activeProfile: config.activeProfile ?? null,
          profiles: Object.keys(config.profiles).sort(),
        },
        runtime.outputFormat,
      );
    });

  profiles
    .command("use <name>")
    .description("Set the active profile")
    .action(async (name: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const profileName = parseProfileName(name);

      const config = await runtime.loadConfig();
      config.activeProfile = profileName;
      ensureProfile(config, profileName);
      await runtime.saveConfig();
      runtime.notice(`Active profile set to '${profileName}'.`);
    });
}

interface HostRow {
  defaultProfile: string | null;
  profiles: string[];
}

function registerHostsCommands(auth: Command, deps: ProgramDeps): void {
  const hosts = auth
    .command("hosts")
    .description("Map hosts to default profiles")
    .helpOption("--help", "display help for command");

  hosts
    .command("list")
    .description("List known hosts with their default and bound profiles")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const config = await runtime.loadConfig();

      const rows = new Map<string, HostRow>();
      const rowFor = (key: string): HostRow => {
        const existing = rows.get(key);
        if (existing) return existing;
        const created: HostRow = { defaultProfile: null, profiles: [] };
        rows.set(key, created);
        return created;
      };

      for (const name of Object.keys(config.profiles).sort()) {
        const key = tryCanonicalHostKey(getProfile(config, name).host);
        if (key !== undefined) rowFor(key).profiles.push(name);
      }
      for (const [rawKey, profile] of Object.entries(config.hostDefaults)) {
        const key = tryCanonicalHostKey(rawKey) ?? rawKey;
        rowFor(key).defaultProfile = profile;
      }

      const value: JsonObject[] = [...rows.keys()].sort().map((host) => {
        const row = rowFor(host);
        return { host, default_profile: row.defaultProfile, profiles: row.profiles };
      });
      printValue(value, runtime.outputFormat);
    });

  hosts
    .command("set-default <host> [profile]")
    .description("Use PROFILE (default: the current profile) when --host matches HOST")
    .action(async (host: string, profile: string | undefined, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const key = canonicalHostKey(host);
      const profileName = profile?.trim() ? parseProfileName(profile) : await runtime.profileName();

      const config = await runtime.loadConfig();
      for (const rawKey of Object.keys(config.hostDefaults)) {
        if (tryCanonicalHostKey(rawKey) === key) delete config.hostDefaults[rawKey];
      }
      config.hostDefaults[key] = profileName;
      await runtime.saveConfig();
      runtime.notice(`Default profile for ${key} set to '${profileName}'.`);
    });

  hosts
    .command("unset-default <host>")
    .description("Remove the default profile mapping for HOST")
    .action(async (host: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const key = canonicalHostKey(host);
      const config = await runtime.loadConfig();

      const matches = Object.keys(config.hostDefaults).filter((rawKey) => tryCanonicalHostKey(rawKey) === key);
      if (matches.length === 0) {
        throw CliError.invalidArgument(`no default profile set for ${key}`);
      }
      for (const rawKey of matches) delete config.hostDefaults[rawKey];
      await runtime.saveConfig();
      runtime.notice(`Default profile for ${key} removed.`);
    });
}

export function registerAuthCommand(program: Command, deps: ProgramDeps): void {
  const auth = program
    .command("auth")
    .description("Manage credentials, profiles and host defaults")
    .helpOption("--help", "display help for command");

  auth
    .command("set-token [token]")
    .description("Store an API token in the current profile")
    .option("--stdin", "read the token from STDIN (avoids shell history)")
    .action(async (token: string | undefined, opts: { stdin?: boolean }, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const value = await resolveTokenInput(runtime, token, opts.stdin === true);
      const profileName = await runtime.bindCredentialProfile();

      const config = await runtime.loadConfig();
      ensureProfile(config, profileName).token = value;
      await runtime.saveConfig();
      runtime.notice(`Token saved to profile '${profileName}'.`);
    });

  auth
    .command("unset-token")
    .description("Remove the API token from the current profile")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const profileName = await runtime.profileName();
      delete getProfile(await runtime.loadConfig(), profileName).token;
      await runtime.saveConfig();
      runtime.notice(`Token removed from profile '${profileName}'.`);
    });

  auth
    .command("set-session <cookie>")
    .description("Store a NextAuth session cookie (value or full Cookie header) in the current profile")
    .option("--device <cookie>", "device cookie (next-auth.did-token)")
    .action(async (cookie: string, opts: { device?: string }, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const session = extractCookieValue(cookie, SESSION_COOKIE_NAMES);
      if (!session) throw CliError.invalidArgument("session cookie cannot be empty");
      const device = opts.device === undefined ? undefined : extractCookieValue(opts.device, DEVICE_COOKIE_NAMES);

      const profileName = await runtime.bindCredentialProfile();
      const profile = ensureProfile(await runtime.loadConfig(), profileName);
      profile.sessionCookie = session;
      if (device) {
        profile.deviceCookie = device;
      } else {
        delete profile.deviceCookie;
      }
      await runtime.saveConfig();
      runtime.notice(`Session saved to profile '${profileName}'.`);
    });

  auth
    .command("logout")
    .description("Clear the session cookies of the current profile")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const profileName = await runtime.profileName();
      const profile = getProfile(await runtime.loadConfig(), profileName);
      delete profile.sessionCookie;
      delete profile.deviceCookie;
      await runtime.saveConfig();
      runtime.notice(`Session cleared from profile '${profileName}'.`);
    });

  auth
    .command("show")
    .description("Show the resolved credentials (redacted)")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      printHumanOrMachine(
        {
          profile: effective.profile,
          host: effective.host,
          token: effective.token === undefined ? null : redactSecret(effective.token),
          session: effective.sessionCookie === undefined ? "none" : "active",
          device: effective.deviceCookie === undefined ? "none" : "present",
          org: effective.org ?? null,
          network: effective.network ?? null,
          output: effective.output,
          timeout: formatDuration(effective.timeoutMs),
          retries: effective.retries,
        },
        effective.output,
      );
    });

  auth
    .command("test")
    .description("Verify the API token (GET /api/v1/network, or /api/v1/org with --org)")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const path = runtime.global.org ? "/api/v1/org" : "/api/v1/network";
      const client = await runtime.httpClient();
      const response = await client.requestJson("GET", path, undefined, {}, true);
      if (effective.output === "table") {
        console.log("OK");
        return;
      }
      printValue(response, effective.output);
    });

  registerProfilesCommands(auth, deps);
  registerHostsCommands(auth, deps);
}
