/**
 * 配置文件读写模块。
 *
 * 职责说明：
 * 1. 计算平台相关的默认配置路径（可用 `ZTNET_CONFIG` 覆盖）。
 * 2. 读取 `config.json` 并用 zod 校验；文件不存在时返回空配置而不是报错。
 * 3. 整体写回（read-modify-write），不做局部更新，也不加锁：CLI 是单用户、非并发调用。
 *
 * 注意：
 * - host-defaults 表在写入时不做一致性校验，悬空/不匹配的条目在解析 EffectiveConfig 时才报错。
 */
import fs from "fs-extra";
import os from "os";
import path from "path";
import { z } from "zod";
import { CliError } from "../errors.js";
import { OUTPUT_FORMATS } from "../output/format.js";

export const ProfileConfigSchema = z.object({
  host: z.string().optional(),
  token: z.string().optional(),
  sessionCookie: z.string().optional(),
  deviceCookie: z.string().optional(),
  defaultOrg: z.string().optional(),
  defaultNetwork: z.string().optional(),
  output: z.enum(OUTPUT_FORMATS).optional(),
  timeout: z.string().optional(),
  retries: z.number().int().nonnegative().optional(),
});

export const ConfigRecordSchema = z.object({
  activeProfile: z.string().optional(),
  profiles: z.record(ProfileConfigSchema).default({}),
  hostDefaults: z.record(z.string()).default({}),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;
export type ConfigRecord = z.infer<typeof ConfigRecordSchema>;

export const PROFILE_FIELDS = [
  "host",
  "token",
  "sessionCookie",
  "deviceCookie",
  "defaultOrg",
  "defaultNetwork",
  "output",
  "timeout",
  "retries",
] as const satisfies ReadonlyArray<keyof ProfileConfig>;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

export function emptyConfig(): ConfigRecord {
  return { profiles: {}, hostDefaults: {} };
}

// profiles 是普通对象，这些名字会落到原型链上
const RESERVED_PROFILE_NAMES: ReadonlySet<string> = new Set(["__proto__", "constructor", "prototype"]);

export function parseProfileName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw CliError.invalidArgument("profile name cannot be empty");
  if (RESERVED_PROFILE_NAMES.has(trimmed)) {
    throw CliError.invalidArgument(`invalid profile name: ${trimmed}`);
  }
  return trimmed;
}

export function hasProfile(config: ConfigRecord, name: string): boolean {
  return Object.hasOwn(config.profiles, name);
}

/**
 * 只读取 profile（不存在时返回空 profile，不写回）。
 */
export function getProfile(config: ConfigRecord, name: string): ProfileConfig {
  return hasProfile(config, name) ? config.profiles[name] : {};
}

/**
 * 取出可修改的 profile（不存在时创建）。
 */
export function ensureProfile(config: ConfigRecord, name: string): ProfileConfig {
  const profileName = parseProfileName(name);
  if (hasProfile(config, profileName)) return config.profiles[profileName];
  const created: ProfileConfig = {};
  config.profiles[profileName] = created;
  return created;
}

export function deleteProfile(config: ConfigRecord, name: string): void {
  if (hasProfile(config, name)) delete config.profiles[name];
}

export type EnvSource = Record<string, string | undefined>;

export function defaultConfigPath(
  env: EnvSource = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  const override = env.ZTNET_CONFIG?.trim();
  if (override) return path.resolve(override);
  return path.join(defaultConfigDir(env, platform), "config.json");
}

function defaultConfigDir(env: EnvSource, platform: NodeJS.Platform): string {
  if (platform === "win32") {
    const appData = env.APPDATA;
    if (!appData) throw new CliError({ kind: "config", message: "failed to determine config directory" });
    return path.join(appData, "ztnet");
  }

  const home = env.HOME || os.homedir();
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", "ztnet");
  }

  const xdg = env.XDG_CONFIG_HOME;
  if (xdg) return path.join(xdg, "ztnet");
  return path.join(home, ".config", "ztnet");
}

/**
 * 配置存储接口：外部只依赖 load/save。
 */
export interface ConfigStore {
  readonly path: string;
  load(): Promise<ConfigRecord>;
  save(config: ConfigRecord): Promise<void>;
}

export class JsonConfigStore implements ConfigStore {
  readonly path: string;

  constructor(filePath: string) {
    this.path = filePath;
  }

  async load(): Promise<ConfigRecord> {
    if (!(await fs.pathExists(this.path))) {
      return emptyConfig();
    }

    let raw: unknown;
    try {
      const text = await fs.readFile(this.path, "utf-8");
      if (!text.trim()) return emptyConfig();
      raw = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CliError(
        { kind: "config", message: `failed to read config file (${reason})`, path: this.path },
        { cause: error },
      );
    }

    const parsed = ConfigRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join(".")}` : "";
      throw new CliError({
        kind: "config",
        message: `invalid config file${where}: ${issue?.message ?? "unknown error"}`,
        path: this.path,
      });
    }
    return parsed.data;
  }

  async save(config: ConfigRecord): Promise<void> {
    try {
      await fs.outputJson(this.path, config, { spaces: 2 });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CliError(
        { kind: "config", message: `failed to write config file (${reason})`, path: this.path },
        { cause: error },
      );
    }
  }
}
