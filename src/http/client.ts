/**
 * REST client（`/api/v1/...`）。
 *
 * 关键点（中文）
 * - `requestJson` / `requestBytes` 都走 base 自动回退 + 退避重试。
 * - `includeAuth=true` 时必须有 token，否则直接报 `missing-config`（不重试、不回退）。
 * - dry-run 在 token 检查之前：没有 token 也能看到将要发出的请求。
 */

import { CliError } from "../errors.js";
import { logger } from "../telemetry/logger.js";
import type { JsonValue } from "../types/json.js";
import { TransportClient, assertHeaderValue } from "./client-base.js";
import { AUTH_HEADER } from "./dry-run.js";
import type { HttpMethod } from "./executor.js";

export type RequestHeaders = Record<string, string>;

export async function readText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new CliError(
      { kind: "decode", message: error instanceof Error ? error.message : String(error) },
      { cause: error },
    );
  }
}

export async function failForStatus(response: Response): Promise<never> {
  let body: string | undefined;
  try {
    body = await response.text();
  } catch (error) {
    logger.debug("failed to read error response body", {
      status: response.status,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  throw CliError.httpStatus(response.status, "request failed", body || undefined);
}

/**
 * 把响应体解析为 JSON。
 *
 * 说明（中文）
 * - 空响应体（204 等）返回 `null`。
 * - 不是 JSON 视为 `decode` 错误，会触发 base 回退。
 */
export function parseJsonBody(text: string): JsonValue {
  if (!text.trim()) return null;
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    throw new CliError(
      {
        kind: "decode",
        message: error instanceof Error ? error.message : String(error),
        body: text.slice(0, 512),
      },
      { cause: error },
    );
  }
}

export class HttpClient extends TransportClient {
  private authHeaders(includeAuth: boolean): RequestHeaders {
    if (!includeAuth) return {};
    if (this.token === undefined) {
      throw CliError.missingConfig("token");
    }
    return { [AUTH_HEADER]: assertHeaderValue("token", this.token) };
  }

  async requestJson(
    method: HttpMethod,
    path: string,
    body?: JsonValue,
    headers: RequestHeaders = {},
    includeAuth = true,
  ): Promise<JsonValue> {
    const trimmed = path.trim();
    const payload = body === undefined ? undefined : JSON.stringify(body);

    if (this.dryRun) {
      this.printDryRunAndStop({
        method,
        path: trimmed,
        allowAbsolute: true,
        headers: payload === undefined ? headers : { ...headers, "content-type": "application/json" },
        token: includeAuth ? this.token : undefined,
        body: payload,
      });
    }

    const requestHeaders: RequestHeaders = {
      ...headers,
      accept: "application/json",
      ...this.authHeaders(includeAuth),
    };
    if (payload !== undefined) {
      requestHeaders["content-type"] = "application/json";
    }

    return this.withBaseFallback(trimmed, true, async (url) => {
      const response = await this.send({ method, url, headers: requestHeaders, body: payload });
      if (!response.ok) {
        return failForStatus(response);
      }
      return parseJsonBody(await readText(response));
    });
  }

  async requestBytes(
    method: HttpMethod,
    path: string,
    body?: Uint8Array,
    headers: RequestHeaders = {},
    includeAuth = true,
    contentType?: string,
  ): Promise<Uint8Array> {
    const trimmed = path.trim();
    const withType =
      body !== undefined && contentType !== undefined ? { ...headers, "content-type": contentType } : headers;

    if (this.dryRun) {
      this.printDryRunAndStop({
        method,
        path: trimmed,
        allowAbsolute: true,
        headers: withType,
        token: includeAuth ? this.token : undefined,
        body,
      });
    }

    const requestHeaders: RequestHeaders = {
      ...withType,
      accept: "*/*",
      ...this.authHeaders(includeAuth),
    };

    return this.withBaseFallback(trimmed, true, async (url) => {
      const response = await this.send({ method, url, headers: requestHeaders, body });
      if (!response.ok) {
        return failForStatus(response);
      }
      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw new CliError(
          { kind: "decode", message: error instanceof Error ? error.message : String(error) },
          { cause: error },
        );
      }
    });
  }
}
