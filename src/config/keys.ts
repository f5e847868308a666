/**
 * `ztnet config get|set|unset` 的 key 解析。
 *
 * 支持的 key（中文）
 * - `activeProfile`
 * - `profiles`（只读）
 * - `profiles.<name>`（读取 / unset 删除整个 profile）
 * - `profiles.<name>.<field>`，field 见 `PROFILE_FIELDS`
 *
 * 写入时即校验：host 会被归一化，output / timeout / retries 不合法直接报错。
 */

import { CliError } from "../errors.js";
import { normalizeHostInput } from "../http/host.js";
import { parseOutputFormat } from "../output/format.js";
import type { JsonObject, JsonValue } from "../types/json.js";
import { parseTimeout } from "./context.js";
import {
  PROFILE_FIELDS,
  deleteProfile,
  ensureProfile,
  getProfile,
  hasProfile,
  parseProfileName,
  type ConfigRecord,
  type ProfileConfig,
  type ProfileField,
} from "./store.js";

export type ConfigKey =
  | { kind: "active-profile" }
  | { kind: "profiles" }
  | { kind: "profile"; profile: string }
  | { kind: "profile-field"; profile: string; field: ProfileField };

function unsupported(key: string): CliError {
  return CliError.invalidArgument(`unsupported key: ${key}`);
}

export function parseConfigKey(key: string): ConfigKey {
  const parts = key.trim().split(".");
  if (parts.some((part) => part.length === 0)) throw unsupported(key);

  if (parts.length === 1 && parts[0] === "activeProfile") return { kind: "active-profile" };
  if (parts[0] !== "profiles") throw unsupported(key);
  if (parts.length === 1) return { kind: "profiles" };
  if (parts.length === 2) return { kind: "profile", profile: parseProfileName(parts[1]) };
  if (parts.length === 3) {
    const field = PROFILE_FIELDS.find((candidate) => candidate === parts[2]);
    if (field) return { kind: "profile-field", profile: parseProfileName(parts[1]), field };
  }
  throw unsupported(key);
}

function profileToJson(profile: ProfileConfig): JsonObject {
  const out: JsonObject = {};
  for (const field of PROFILE_FIELDS) {
    const value = profile[field];
    if (value !== undefined) out[field] = value;
  }
  return out;
}

export function getConfigValue(config: ConfigRecord, key: string): JsonValue {
  const parsed = parseConfigKey(key);
  switch (parsed.kind) {
    case "active-profile":
      return config.activeProfile ?? null;
    case "profiles": {
      const out: JsonObject = {};
      for (const name of Object.keys(config.profiles).sort()) {
        out[name] = profileToJson(getProfile(config, name));
      }
      return out;
    }
    case "profile":
      return profileToJson(getProfile(config, parsed.profile));
    case "profile-field":
      return getProfile(config, parsed.profile)[parsed.field] ?? null;
  }
}

function parseRetries(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw CliError.invalidArgument(`invalid retries value: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

function assignField(profile: ProfileConfig, field: ProfileField, value: string): void {
  switch (field) {
    case "host":
      profile.host = normalizeHostInput(value);
      return;
    case "output":
      profile.output = parseOutputFormat(value);
      return;
    case "timeout":
      parseTimeout(value);
      profile.timeout = value.trim();
      return;
    case "retries":
      profile.retries = parseRetries(value);
      return;
    case "token":
    case "sessionCookie":
    case "deviceCookie":
    case "defaultOrg":
    case "defaultNetwork":
      if (!value.trim()) {
        throw CliError.invalidArgument(`${field} cannot be empty`);
      }
      profile[field] = value.trim();
      return;
  }
}

/**
 * 写入一个 key，返回实际写入的完整 key（`host` 简写会展开）。
 */
export function setConfigValue(config: ConfigRecord, key: string, value: string, activeProfile: string): string {
  const fullKey = key.trim() === "host" ? `profiles.${activeProfile}.host` : key.trim();
  const parsed = parseConfigKey(fullKey);

  switch (parsed.kind) {
    case "active-profile":
      config.activeProfile = parseProfileName(value);
      ensureProfile(config, config.activeProfile);
      return fullKey;
    case "profile-field":
      assignField(ensureProfile(config, parsed.profile), parsed.field, value);
      return fullKey;
    default:
      throw unsupported(fullKey);
  }
}

export function unsetConfigValue(config: ConfigRecord, key: string, activeProfile: string): string {
  const fullKey = key.trim() === "host" ? `profiles.${activeProfile}.host` : key.trim();
  const parsed = parseConfigKey(fullKey);

  switch (parsed.kind) {
    case "active-profile":
      delete config.activeProfile;
      return fullKey;
    case "profile":
      deleteProfile(config, parsed.profile);
      if (config.activeProfile === parsed.profile) delete config.activeProfile;
      return fullKey;
    case "profile-field": {
      if (hasProfile(config, parsed.profile)) delete getProfile(config, parsed.profile)[parsed.field];
      return fullKey;
    }
    default:
      throw unsupported(fullKey);
  }
}
