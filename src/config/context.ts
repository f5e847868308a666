/**
 * EffectiveConfig 解析（纯函数，不发网络请求）。
 *
 * 优先级（中文）
 * 1) CLI 参数
 * 2) 环境变量
 * 3) 选中 profile 中存储的值
 * 4) 硬编码默认值（`http://localhost:3000` / `30s` / `3` 次重试 / table）
 *
 * 关键不变量（中文）
 * - profile 中存储的 token / session / device cookie 只有在 profile 自己的 host
 *   与最终选中的 host 规范化后相同时才会被带上，避免把 A 实例的凭据发给 B。
 * - 显式 `--profile` 与显式 `--host` 指向不同实例时直接报错，而不是静默选一个。
 */

import { CliError } from "../errors.js";
import { canonicalHostKey, normalizeHostInput, tryCanonicalHostKey } from "../http/host.js";
import { parseOutputFormat, type OutputFormat } from "../output/format.js";
import type { GlobalOptions } from "../types/cli.js";
import { parseDuration } from "../utils/time.js";
import { getProfile, hasProfile, parseProfileName, type ConfigRecord, type EnvSource } from "./store.js";

export const DEFAULT_HOST = "http://localhost:3000";
export const DEFAULT_PROFILE = "default";
export const DEFAULT_TIMEOUT = "30s";
export const DEFAULT_RETRIES = 3;

export const ENV_HOST = ["ZTNET_HOST", "API_ADDRESS"] as const;
export const ENV_TOKEN = ["ZTNET_API_TOKEN", "ZTNET_TOKEN"] as const;
export const ENV_PROFILE = ["ZTNET_PROFILE"] as const;
export const ENV_OUTPUT = ["ZTNET_OUTPUT"] as const;

export interface EffectiveConfig {
  profile: string;
  host: string;
  token?: string;
  sessionCookie?: string;
  deviceCookie?: string;
  org?: string;
  network?: string;
  output: OutputFormat;
  timeoutMs: number;
  retries: number;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.trim() ? value : undefined;
}

function readEnv(env: EnvSource, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = nonEmpty(env[name]);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function parseTimeout(value: string): number {
  const ms = parseDuration(value);
  if (ms === undefined) {
    throw CliError.invalidArgument(`invalid timeout value: ${value}`);
  }
  return ms;
}

/**
 * 在显式 host 下选择 profile。
 *
 * 顺序（中文）
 * 1) host-defaults 表（按规范化 key 匹配；条目在此时才校验）
 * 2) 线性扫描所有 profile，找自身 host 规范化后相同的
 * 3) active profile
 * 4) `default`
 */
export function selectProfileForHost(config: ConfigRecord, hostKey: string): string {
  for (const [rawKey, profileName] of Object.entries(config.hostDefaults)) {
    if (tryCanonicalHostKey(rawKey) !== hostKey) continue;

    if (!hasProfile(config, profileName)) {
      throw new CliError({
        kind: "config",
        message: `host default for ${hostKey} points to missing profile '${profileName}' (fix with \`ztnet auth hosts unset-default ${hostKey}\`)`,
      });
    }
    const profile = getProfile(config, profileName);
    const profileKey = tryCanonicalHostKey(profile.host);
    if (profileKey !== hostKey) {
      throw new CliError({
        kind: "config",
        message: `host default for ${hostKey} points to profile '${profileName}' whose host is ${profile.host ?? "unset"} (fix with \`ztnet auth hosts unset-default ${hostKey}\`)`,
      });
    }
    return profileName;
  }

  const names = Object.keys(config.profiles).sort();
  for (const name of names) {
    if (tryCanonicalHostKey(getProfile(config, name).host) === hostKey) {
      return name;
    }
  }

  return nonEmpty(config.activeProfile) ?? DEFAULT_PROFILE;
}

interface ProfileSelection {
  profile: string;
  explicitProfile?: string;
  explicitHost?: string;
  explicitHostKey?: string;
}

function selectProfileDetailed(global: GlobalOptions, config: ConfigRecord, env: EnvSource): ProfileSelection {
  const explicitProfile = nonEmpty(global.profile) ?? readEnv(env, ENV_PROFILE);
  const explicitHostRaw = nonEmpty(global.host) ?? readEnv(env, ENV_HOST);
  const explicitHost = explicitHostRaw === undefined ? undefined : normalizeHostInput(explicitHostRaw);
  const explicitHostKey = explicitHost === undefined ? undefined : canonicalHostKey(explicitHost);

  let profile: string;
  if (explicitProfile !== undefined) {
    profile = explicitProfile;
  } else if (explicitHostKey !== undefined) {
    profile = selectProfileForHost(config, explicitHostKey);
  } else {
    profile = nonEmpty(config.activeProfile) ?? DEFAULT_PROFILE;
  }
  return { profile: parseProfileName(profile), explicitProfile, explicitHost, explicitHostKey };
}

/**
 * 只解析 profile 名（不读取 profile 内容）。
 *
 * `config set host` 之类的修复命令用它：profile 里存的 host 坏掉时也能定位到要改的 profile。
 */
export function selectProfile(global: GlobalOptions, config: ConfigRecord, env: EnvSource = process.env): string {
  return selectProfileDetailed(global, config, env).profile;
}

export function resolveEffectiveConfig(
  global: GlobalOptions,
  config: ConfigRecord,
  env: EnvSource = process.env,
): EffectiveConfig {
  const { profile, explicitProfile, explicitHost, explicitHostKey } = selectProfileDetailed(global, config, env);

  const profileCfg = getProfile(config, profile);
  const storedHost = nonEmpty(profileCfg.host);

  if (explicitProfile !== undefined && explicitHostKey !== undefined && storedHost !== undefined) {
    const storedKey = tryCanonicalHostKey(storedHost);
    if (storedKey !== explicitHostKey) {
      throw CliError.invalidArgument(
        `profile '${profile}' is bound to host ${storedHost}, but host ${explicitHost} was requested; ` +
          `drop --host, pick another --profile, or run \`ztnet --profile ${profile} config set host <url>\``,
      );
    }
  }

  const host = explicitHost ?? (storedHost !== undefined ? normalizeHostInput(storedHost) : DEFAULT_HOST);

  // profile 未绑定 host 时视为绑定默认 host
  const profileHostKey = tryCanonicalHostKey(storedHost ?? DEFAULT_HOST);
  const credentialsMatch = profileHostKey !== undefined && profileHostKey === canonicalHostKey(host);

  const token =
    nonEmpty(global.token) ??
    readEnv(env, ENV_TOKEN) ??
    (credentialsMatch ? nonEmpty(profileCfg.token) : undefined);
  const sessionCookie = credentialsMatch ? nonEmpty(profileCfg.sessionCookie) : undefined;
  const deviceCookie = credentialsMatch ? nonEmpty(profileCfg.deviceCookie) : undefined;

  const envOutput = readEnv(env, ENV_OUTPUT);
  let output: OutputFormat;
  if (global.json) {
    output = "json";
  } else if (global.output !== undefined) {
    output = global.output;
  } else if (envOutput !== undefined) {
    output = parseOutputFormat(envOutput);
  } else {
    output = profileCfg.output ?? "table";
  }

  const timeoutMs = parseTimeout(nonEmpty(global.timeout) ?? nonEmpty(profileCfg.timeout) ?? DEFAULT_TIMEOUT);
  const retries = global.retries ?? profileCfg.retries ?? DEFAULT_RETRIES;

  return {
    profile,
    host,
    token,
    sessionCookie,
    deviceCookie,
    org: nonEmpty(global.org) ?? nonEmpty(profileCfg.defaultOrg),
    network: nonEmpty(global.network) ?? nonEmpty(profileCfg.defaultNetwork),
    output,
    timeoutMs,
    retries,
  };
}
