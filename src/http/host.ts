/**
 * Host 输入归一化与规范化 key。
 *
 * 关键点（中文）
 * - 用户输入的 host 可能缺 scheme、带尾斜杠、大小写混用、带默认端口。
 * - `normalizeHostInput` 产出可存储的绝对 URL（幂等）。
 * - `canonicalHostKey` 产出 `scheme://host[:port]`，是“是否同一实例”的唯一判等方式，
 *   任何 host 比较都必须走它，而不是直接比较字符串。
 */

import { CliError } from "../errors.js";

const DEFAULT_PORTS: Record<string, string> = {
  http: "80",
  https: "443",
};

/**
 * 推断缺省 scheme：回环/本机地址走 http，其余走 https。
 */
export function inferDefaultScheme(raw: string): "http" | "https" {
  const beforeSlash = raw.split("/")[0] ?? raw;

  let hostPart = beforeSlash;
  if (beforeSlash.startsWith("[")) {
    const end = beforeSlash.indexOf("]");
    if (end !== -1) hostPart = beforeSlash.slice(1, end);
  } else {
    hostPart = beforeSlash.split(":")[0] ?? beforeSlash;
  }

  const host = hostPart.toLowerCase();
  if (host === "localhost" || host === "::1" || host === "0.0.0.0" || host.startsWith("127.")) {
    return "http";
  }
  return "https";
}

function parseHostUrl(withScheme: string): URL {
  try {
    return new URL(withScheme);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw CliError.invalidArgument(`invalid host url: ${reason}`);
  }
}

/**
 * 归一化用户输入的 host。
 *
 * 步骤（中文）
 * 1) trim，空串直接报错
 * 2) 没有 `://` 时补 scheme
 * 3) 只允许 http/https，必须有 hostname，禁止内嵌账号密码
 * 4) 去掉 query/fragment 与尾部 `/`
 */
export function normalizeHostInput(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw CliError.invalidArgument("host cannot be empty");
  }

  const withScheme = trimmed.includes("://") ? trimmed : `${inferDefaultScheme(trimmed)}://${trimmed}`;
  const url = parseHostUrl(withScheme);

  const scheme = url.protocol.replace(/:$/, "").toLowerCase();
  if (scheme !== "http" && scheme !== "https") {
    throw CliError.invalidArgument(
      `invalid host url: unsupported scheme '${scheme}' (expected http or https)`,
    );
  }

  if (!url.hostname) {
    throw CliError.invalidArgument("invalid host url: missing hostname");
  }

  if (url.username !== "" || url.password !== "") {
    throw CliError.invalidArgument("invalid host url: must not include credentials");
  }

  url.search = "";
  url.hash = "";

  return url.toString().replace(/\/+$/, "");
}

/**
 * 计算 host 的规范化比较 key：`scheme://host[:port]`。
 *
 * - host 小写，IPv6 带方括号（WHATWG URL 已保证）。
 * - 端口只有在非默认端口时保留。
 * - 路径会被丢弃：`https://h/api` 与 `https://h` 是同一实例。
 */
export function canonicalHostKey(host: string): string {
  const url = new URL(normalizeHostInput(host));
  const scheme = url.protocol.replace(/:$/, "");
  const port = url.port && url.port !== DEFAULT_PORTS[scheme] ? `:${url.port}` : "";
  return `${scheme}://${url.hostname.toLowerCase()}${port}`;
}

/**
 * `canonicalHostKey` 的可选版本：用于配置里可能缺失/损坏的 host 值。
 */
export function tryCanonicalHostKey(host: string | undefined): string | undefined {
  if (host === undefined || !host.trim()) return undefined;
  try {
    return canonicalHostKey(host);
  } catch (error) {
    if (error instanceof CliError) return undefined;
    throw error;
  }
}

/**
 * 从一个 host 推导 API base 候选（保持顺序、去重）。
 *
 * - `https://h`     -> [`https://h`, `https://h/api`]
 * - `https://h/api` -> [`https://h/api`, `https://h`]
 */
export function apiBaseCandidates(base: string): string[] {
  const trimmed = base.replace(/\/+$/, "");

  const out: string[] = [];
  if (trimmed) out.push(trimmed);

  if (trimmed.endsWith("/api")) {
    const stripped = trimmed.slice(0, -"/api".length);
    if (stripped && !out.includes(stripped)) out.push(stripped);
  } else {
    const candidate = `${trimmed}/api`;
    if (!out.includes(candidate)) out.push(candidate);
  }

  return out;
}
