/**
 * `ztnet config` 命令组。
 *
 * 关键点（中文）
 * - `get/set/unset/path` 不依赖 EffectiveConfig，配置损坏时也能用来修复。
 * - `set host <url>` 是 `profiles.<当前 profile>.host` 的简写。
 * - `context set` 复用全局 `--org/--network`。
 */

import type { Command } from "commander";
import { getConfigValue, setConfigValue, unsetConfigValue } from "../config/keys.js";
import { ensureProfile, getProfile } from "../config/store.js";
import { CliError } from "../errors.js";
import { redactSecret } from "../http/dry-run.js";
import { printHumanOrMachine, printValue, renderScalar } from "../output/render.js";
import { formatDuration } from "../utils/time.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

export function registerConfigCommand(program: Command, deps: ProgramDeps): void {
  const config = program
    .command("config")
    .description("Read and write the local configuration file")
    .helpOption("--help", "display help for command");

  config
    .command("path")
    .description("Print the config file path")
    .action((_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      console.log(runtime.store.path);
    });

  config
    .command("get <key>")
    .description("Print a config value (activeProfile, profiles, profiles.<name>[.<field>])")
    .action(async (key: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const value = getConfigValue(await runtime.loadConfig(), key);
      const format = runtime.outputFormat;
      if (format === "table") {
        console.log(renderScalar(value));
        return;
      }
      printValue(value, format);
    });

  config
    .command("set <key> <value>")
    .description("Set a config value (`host` targets the current profile)")
    .action(async (key: string, value: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const record = await runtime.loadConfig();
      const written = setConfigValue(record, key, value, await runtime.profileName());
      await runtime.saveConfig();
      runtime.notice(`Set ${written}.`);
    });

  config
    .command("unset <key>")
    .description("Remove a config value")
    .action(async (key: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const record = await runtime.loadConfig();
      const removed = unsetConfigValue(record, key, await runtime.profileName());
      await runtime.saveConfig();
      runtime.notice(`Unset ${removed}.`);
    });

  config
    .command("list")
    .description("Show the effective configuration")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      printHumanOrMachine(
        {
          configPath: runtime.store.path,
          profile: effective.profile,
          host: effective.host,
          token: effective.token === undefined ? null : redactSecret(effective.token),
          org: effective.org ?? null,
          network: effective.network ?? null,
          output: effective.output,
          timeout: formatDuration(effective.timeoutMs),
          retries: effective.retries,
        },
        effective.output,
      );
    });

  const context = config
    .command("context")
    .description("Default org / network for the current profile")
    .helpOption("--help", "display help for command");

  context
    .command("show")
    .description("Show the stored default org / network")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const profileName = await runtime.profileName();
      const profile = getProfile(await runtime.loadConfig(), profileName);
      const format = runtime.outputFormat;
      printHumanOrMachine(
        {
          profile: profileName,
          org: profile.defaultOrg ?? null,
          network: profile.defaultNetwork ?? null,
        },
        format,
      );
    });

  context
    .command("set")
    .description("Store --org and/or --network as defaults for the current profile")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const org = runtime.global.org?.trim();
      const network = runtime.global.network?.trim();
      if (!org && !network) {
        throw CliError.invalidArgument("context set requires at least one of --org or --network");
      }

      const profileName = await runtime.profileName();
      const record = await runtime.loadConfig();
      const profile = ensureProfile(record, profileName);
      if (org) profile.defaultOrg = org;
      if (network) profile.defaultNetwork = network;
      await runtime.saveConfig();
      runtime.notice(`Context updated for profile '${profileName}'.`);
    });

  context
    .command("clear")
    .description("Remove the stored default org / network")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const profileName = await runtime.profileName();
      const profile = getProfile(await runtime.loadConfig(), profileName);
      delete profile.defaultOrg;
      delete profile.defaultNetwork;
      await runtime.saveConfig();
      runtime.notice(`Context cleared for profile '${profileName}'.`);
    });
}
