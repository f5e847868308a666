/**
 * 命令层公共工具。
 *
 * 关键点（中文）
 * - 命令只通过 `CommandRuntime` 拿配置、client 与 I/O，便于测试注入 fetch / store / stdin。
 * - EffectiveConfig 懒解析：`config` 修复类命令在 profile 中的 host 已损坏时仍可运行。
 */

import fs from "fs-extra";
import path from "node:path";
import type { Command } from "commander";
import prompts from "prompts";
import { resolveEffectiveConfig, selectProfile, type EffectiveConfig } from "../config/context.js";
import {
  JsonConfigStore,
  defaultConfigPath,
  ensureProfile,
  type ConfigRecord,
  type ConfigStore,
  type EnvSource,
} from "../config/store.js";
import { CliError } from "../errors.js";
import type { ClientUi } from "../http/banner.js";
import { HttpClient } from "../http/client.js";
import type { FetchLike, SleepFn } from "../http/executor.js";
import { tryCanonicalHostKey } from "../http/host.js";
import { TrpcClient } from "../http/trpc-client.js";
import { parseOutputFormat, type OutputFormat } from "../output/format.js";
import type { GlobalOptions } from "../types/cli.js";
import type { JsonValue } from "../types/json.js";

/**
 * 可注入依赖（测试用；CLI 入口使用默认值）。
 */
export interface ProgramDeps {
  env?: EnvSource;
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
  store?: ConfigStore;
  readStdin?: () => Promise<string>;
  isInteractive?: () => boolean;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * 从 commander 的合并参数中取出全局参数。
 *
 * 说明（中文）
 * - commander 把 `--no-color` 存为 `color: false`，这里转成 `noColor`。
 */
export function readGlobalOptions(command: Command): GlobalOptions {
  const raw = command.optsWithGlobals();
  const output = optionalString(raw.output);
  return {
    host: optionalString(raw.host),
    token: optionalString(raw.token),
    profile: optionalString(raw.profile),
    org: optionalString(raw.org),
    network: optionalString(raw.network),
    json: raw.json === true,
    output: output === undefined ? undefined : parseOutputFormat(output),
    timeout: optionalString(raw.timeout),
    retries: typeof raw.retries === "number" ? raw.retries : undefined,
    noColor: raw.color === false,
    quiet: raw.quiet === true,
    verbose: raw.verbose === true,
    dryRun: raw.dryRun === true,
    yes: raw.yes === true,
  };
}

export async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (error) {
    throw new CliError(
      { kind: "io", message: `failed to read stdin: ${error instanceof Error ? error.message : String(error)}` },
      { cause: error },
    );
  }
  return Buffer.concat(chunks).toString("utf8");
}

/**
 * 单次命令调用的运行时。
 */
export class CommandRuntime {
  readonly global: GlobalOptions;
  readonly env: EnvSource;
  readonly store: ConfigStore;
  private readonly deps: ProgramDeps;
  private config: ConfigRecord | undefined;
  private effectiveConfig: EffectiveConfig | undefined;

  constructor(global: GlobalOptions, deps: ProgramDeps) {
    this.global = global;
    this.deps = deps;
    this.env = deps.env ?? process.env;
    this.store = deps.store ?? new JsonConfigStore(defaultConfigPath(this.env));
  }

  static fromCommand(command: Command, deps: ProgramDeps): CommandRuntime {
    return new CommandRuntime(readGlobalOptions(command), deps);
  }

  get quiet(): boolean {
    return this.global.quiet === true;
  }

  /**
   * 不需要 EffectiveConfig 的命令使用的输出格式（只看 flag）。
   */
  get outputFormat(): OutputFormat {
    if (this.global.json) return "json";
    return this.global.output ?? "table";
  }

  get ui(): ClientUi {
    return {
      quiet: this.quiet,
      noColor: this.global.noColor === true,
      profile: this.effectiveConfig?.profile,
    };
  }

  async loadConfig(): Promise<ConfigRecord> {
    if (!this.config) {
      this.config = await this.store.load();
    }
    return this.config;
  }

  async saveConfig(): Promise<void> {
    await this.store.save(await this.loadConfig());
  }

  async effective(): Promise<EffectiveConfig> {
    if (!this.effectiveConfig) {
      this.effectiveConfig = resolveEffectiveConfig(this.global, await this.loadConfig(), this.env);
    }
    return this.effectiveConfig;
  }

  /**
   * 仅解析 profile 名；不会因为 profile 中存的 host 不合法而失败。
   */
  async profileName(): Promise<string> {
    return selectProfile(this.global, await this.loadConfig(), this.env);
  }

  async httpClient(): Promise<HttpClient> {
    const effective = await this.effective();
    return new HttpClient({
      host: effective.host,
      token: effective.token,
      timeoutMs: effective.timeoutMs,
      retries: effective.retries,
      dryRun: this.global.dryRun === true,
      ui: this.ui,
      fetchImpl: this.deps.fetchImpl,
      sleep: this.deps.sleep,
    });
  }

  async trpcClient(cookie: string | undefined): Promise<TrpcClient> {
    const effective = await this.effective();
    return new TrpcClient({
      host: effective.host,
      timeoutMs: effective.timeoutMs,
      retries: effective.retries,
      dryRun: this.global.dryRun === true,
      ui: this.ui,
      fetchImpl: this.deps.fetchImpl,
      sleep: this.deps.sleep,
      cookie,
    });
  }

  async readStdin(): Promise<string> {
    const read = this.deps.readStdin ?? readProcessStdin;
    return (await read()).trim();
  }

  isInteractive(): boolean {
    return this.deps.isInteractive ? this.deps.isInteractive() : process.stdin.isTTY === true;
  }

  /**
   * 进度/结果提示走 stderr，`--quiet` 时不输出。
   */
  notice(message: string): void {
    if (!this.quiet) console.error(message);
  }

  /**
   * 破坏性操作确认。
   *
   * 规则（中文）
   * - `--dry-run` / `--yes` 直接通过。
   * - `--quiet` 下拒绝交互，提示加 `--yes`。
   */
  async confirm(message: string): Promise<boolean> {
    if (this.global.dryRun || this.global.yes) return true;
    if (this.quiet) {
      throw CliError.invalidArgument("refusing to prompt in --quiet mode (pass --yes)");
    }
    if (!this.isInteractive()) {
      throw CliError.invalidArgument("confirmation required (pass --yes)");
    }
    const response = await prompts({
      type: "confirm",
      name: "confirmed",
      message,
      initial: false,
    });
    return response.confirmed === true;
  }

  /**
   * 凭据写入前的 host 绑定检查。
   *
   * 说明（中文）
   * - profile 已绑定到其他实例时拒绝写入，避免 A 实例的 profile 存下 B 实例的凭据。
   * - profile 尚未绑定 host 时把当前 host 写入，使凭据与 host 成对出现。
   */
  async bindCredentialProfile(): Promise<string> {
    const effective = await this.effective();
    const config = await this.loadConfig();
    const profile = ensureProfile(config, effective.profile);

    if (profile.host === undefined || !profile.host.trim()) {
      profile.host = effective.host;
      return effective.profile;
    }

    if (tryCanonicalHostKey(profile.host) !== tryCanonicalHostKey(effective.host)) {
      throw CliError.invalidArgument(
        `profile '${effective.profile}' is bound to host ${profile.host}, not ${effective.host}; ` +
          `pass --profile <name> to store credentials for ${effective.host}`,
      );
    }
    return effective.profile;
  }
}

/**
 * 读取 JSON 参数：内联字符串或文件（二选一）。
 */
export async function readJsonArgument(params: {
  inline?: string;
  file?: string;
  inlineFlag: string;
  fileFlag: string;
  runtime: CommandRuntime;
}): Promise<JsonValue | undefined> {
  if (params.inline !== undefined && params.file !== undefined) {
    throw CliError.invalidArgument(`cannot combine ${params.inlineFlag} with ${params.fileFlag}`);
  }

  let text: string | undefined;
  let source = params.inlineFlag;
  if (params.inline !== undefined) {
    text = params.inline;
  } else if (params.file !== undefined) {
    source = params.file;
    text = params.file === "-" ? await params.runtime.readStdin() : await readTextFile(params.file);
  }
  if (text === undefined) return undefined;

  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw CliError.invalidArgument(`invalid JSON in ${source}: ${reason}`);
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  const resolved = path.resolve(filePath);
  try {
    return await fs.readFile(resolved, "utf-8");
  } catch (error) {
    throw new CliError(
      { kind: "io", message: error instanceof Error ? error.message : String(error), path: resolved },
      { cause: error },
    );
  }
}
