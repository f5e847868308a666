/**
 * `--dry-run` 请求打印。
 *
 * 关键点（中文）
 * - 完全不发网络请求，只把 method / URL / headers / body 打到 stdout。
 * - 鉴权 token 与 cookie 只保留首尾各 4 个字符。
 * - 打印完成后由调用方抛出 `dry-run-printed`，入口按退出码 0 处理。
 */

import type { HttpMethod } from "./executor.js";

export const AUTH_HEADER = "x-ztnet-auth";

const KEEP = 4;

export function redactSecret(secret: string): string {
  const chars = Array.from(secret);
  if (chars.length <= KEEP * 2) return "REDACTED";
  return `${chars.slice(0, KEEP).join("")}…${chars.slice(-KEEP).join("")}`;
}

function renderBody(body: string | Uint8Array): string {
  const text = typeof body === "string" ? body : new TextDecoder().decode(body);
  try {
    return JSON.stringify(JSON.parse(text), null, 2);
  } catch {
    return text;
  }
}

export function formatDryRun(params: {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  token?: string;
  body?: string | Uint8Array;
}): string[] {
  const lines = [`${params.method} ${params.url.toString()}`];

  for (const [name, value] of Object.entries(params.headers)) {
    const lower = name.toLowerCase();
    if (lower === "cookie" || lower === AUTH_HEADER) {
      lines.push(`${lower}: ${redactSecret(value)}`);
      continue;
    }
    lines.push(`${lower}: ${value}`);
  }

  if (params.token !== undefined) {
    lines.push(`${AUTH_HEADER}: ${redactSecret(params.token)}`);
  }

  if (params.body !== undefined) {
    lines.push("", renderBody(params.body));
  }

  return lines;
}

export function printDryRun(params: Parameters<typeof formatDryRun>[0]): void {
  for (const line of formatDryRun(params)) {
    console.log(line);
  }
}
