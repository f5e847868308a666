/**
 * tRPC client（NextAuth session cookie 鉴权）。
 *
 * 关键点（中文）
 * - 请求体固定为批量格式 `{"0":{"json":input}}`，POST 到 `api/trpc/<procedure>?batch=1`。
 * - 响应可能是数组（批量）或单个对象；只取第一项。
 * - `UNAUTHORIZED` / HTTP 401 统一映射为 `session-required`，提示用户重新设置 session。
 * - 响应体不是 JSON 时报 `decode`，与 REST client 共用同一个 base 回退判定。
 */

import type { EffectiveConfig } from "../config/context.js";
import { CliError } from "../errors.js";
import { isJsonObject, type JsonValue } from "../types/json.js";
import { TransportClient, assertHeaderValue, type ClientOptions } from "./client-base.js";
import { parseJsonBody, readText } from "./client.js";

export interface TrpcClientOptions extends ClientOptions {
  cookie?: string;
}

export function trpcPath(procedure: string): string {
  return `api/trpc/${procedure.trim()}?batch=1`;
}

export function trpcRequestBody(input: JsonValue): JsonValue {
  return { "0": { json: input } };
}

/**
 * 由 profile 中的 session / device cookie 拼出 Cookie 头。
 */
export function cookieFromEffective(
  effective: Pick<EffectiveConfig, "sessionCookie" | "deviceCookie">,
): string | undefined {
  const session = effective.sessionCookie?.trim();
  if (!session) return undefined;

  const parts = [`next-auth.session-token=${session}`, `__Secure-next-auth.session-token=${session}`];
  const device = effective.deviceCookie?.trim();
  if (device) {
    parts.push(`next-auth.did-token=${device}`);
  }
  return parts.join("; ");
}

export function requireCookieFromEffective(
  effective: Pick<EffectiveConfig, "sessionCookie" | "deviceCookie">,
): string {
  const cookie = cookieFromEffective(effective);
  if (cookie === undefined) {
    throw new CliError({ kind: "session-required" });
  }
  return cookie;
}

/**
 * 解包 tRPC 响应 envelope。
 *
 * 规则（中文）
 * - `error`：优先使用 `error.data.httpStatus`，`UNAUTHORIZED`/401 → session-required。
 * - `result`：返回 `result.data.json`，没有则返回 `result.data`。
 * - 其它对象/标量原样返回。
 */
export function parseTrpcEnvelope(httpStatus: number, value: JsonValue): JsonValue {
  let item: JsonValue;
  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw CliError.httpStatus(httpStatus, "empty tRPC response");
    }
    item = value[0];
  } else {
    item = value;
  }

  if (!isJsonObject(item)) return item;

  const error = item.error;
  if (error !== undefined) {
    const errorObject = isJsonObject(error) ? error : {};
    const data = isJsonObject(errorObject.data) ? errorObject.data : {};
    const message = typeof errorObject.message === "string" ? errorObject.message : "tRPC error";
    const code = typeof data.code === "string" ? data.code : "";
    const status =
      typeof data.httpStatus === "number" && Number.isInteger(data.httpStatus) ? data.httpStatus : httpStatus;

    if (code === "UNAUTHORIZED" || status === 401) {
      throw new CliError({ kind: "session-required" });
    }
    throw CliError.httpStatus(status, message, JSON.stringify(error));
  }

  const result = item.result;
  if (result === undefined) return item;

  const data = isJsonObject(result) ? result.data : undefined;
  if (isJsonObject(data) && data.json !== undefined) {
    return data.json;
  }
  return data ?? null;
}

/**
 * 说明（中文）
 * - 只有 2xx 的空响应体才当作 `null` 结果；非 2xx 的空响应体按 HTTP 状态报错，
 *   这样 404/405 会触发 base 回退，重试耗尽的 5xx 也不会被当成成功。
 */
export function parseTrpcResponse(status: number, text: string): JsonValue {
  if (status === 401) {
    throw new CliError({ kind: "session-required" });
  }
  const ok = status >= 200 && status < 300;
  if (!ok && !text.trim()) {
    throw CliError.httpStatus(status, "empty tRPC response");
  }
  return parseTrpcEnvelope(status, parseJsonBody(text));
}

export class TrpcClient extends TransportClient {
  private readonly cookie: string | undefined;

  constructor(options: TrpcClientOptions) {
    super(options);
    this.cookie = options.cookie;
  }

  async call(procedure: string, input: JsonValue): Promise<JsonValue> {
    const path = trpcPath(procedure);
    const body = JSON.stringify(trpcRequestBody(input));
    const headers: Record<string, string> = {
      accept: "application/json",
      "content-type": "application/json",
    };
    if (this.cookie !== undefined) {
      headers.cookie = assertHeaderValue("cookie", this.cookie);
    }

    if (this.dryRun) {
      this.printDryRunAndStop({ method: "POST", path, allowAbsolute: false, headers, body });
    }

    return this.withBaseFallback(path, false, async (url) => {
      const response = await this.send({ method: "POST", url, headers, body });
      return parseTrpcResponse(response.status, await readText(response));
    });
  }
}
