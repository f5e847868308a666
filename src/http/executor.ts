/**
 * 单个 base 上的请求执行与退避重试。
 *
 * 关键点（中文）
 * - 最多 `retries + 1` 次尝试。
 * - 可重试：网络层错误（超时/连接/构造失败）、HTTP 5xx、HTTP 429。
 * - 退避从 200ms 开始翻倍，上限 5s；429 优先使用 `Retry-After`（秒）。
 * - 429 重试耗尽抛 `rate-limited`；其余最终响应原样返回给上层解析。
 */

import { setTimeout as delay } from "node:timers/promises";
import { CliError } from "../errors.js";
import { logger } from "../telemetry/logger.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"];

export type FetchLike = (input: URL | string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number) => Promise<void>;

export interface RetryPolicy {
  retries: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  sleep?: SleepFn;
}

export interface TransportRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  timeoutMs: number;
}

export const INITIAL_BACKOFF_MS = 200;
export const MAX_BACKOFF_MS = 5000;

export const defaultSleep: SleepFn = async (ms) => {
  await delay(ms);
};

export function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * 解析 `Retry-After`（仅支持整数秒）。
 */
export function parseRetryAfter(headers: Headers): number | undefined {
  const value = headers.get("retry-after")?.trim();
  if (!value || !/^\d+$/.test(value)) return undefined;
  return Number.parseInt(value, 10) * 1000;
}

export function parseHttpMethod(raw: string): HttpMethod {
  const upper = raw.trim().toUpperCase();
  const method = HTTP_METHODS.find((m) => m === upper);
  if (!method) {
    throw CliError.invalidArgument(`invalid http method: ${upper}`);
  }
  return method;
}

function toTransportError(error: unknown, url: URL): CliError {
  const name = error instanceof Error ? error.name : "";
  const timeout = name === "TimeoutError" || name === "AbortError";
  const cause = error instanceof Error && error.cause instanceof Error ? `: ${error.cause.message}` : "";
  const message = timeout
    ? `timed out requesting ${url.toString()}`
    : `${error instanceof Error ? error.message : String(error)}${cause} (${url.toString()})`;
  return new CliError({ kind: "transport", message, timeout }, { cause: error });
}

async function discardBody(response: Response): Promise<void> {
  if (!response.body) return;
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug("failed to discard response body", {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * 执行一次逻辑请求（含重试），返回最终响应。
 */
export async function executeWithRetry(
  request: TransportRequest,
  policy: RetryPolicy,
  fetchImpl: FetchLike = fetch,
): Promise<Response> {
  const sleep = policy.sleep ?? defaultSleep;
  const maxBackoff = policy.maxBackoffMs ?? MAX_BACKOFF_MS;
  let backoff = policy.initialBackoffMs ?? INITIAL_BACKOFF_MS;
  const retries = Math.max(0, policy.retries);

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    let response: Response;
    try {
      response = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      const transportError = toTransportError(error, request.url);
      if (attempt < retries) {
        logger.debug(`retrying ${request.method} ${request.url.toString()} in ${backoff}ms`, {
          attempt: attempt + 1,
          error: transportError.message,
        });
        await sleep(backoff);
        backoff = Math.min(backoff * 2, maxBackoff);
        continue;
      }
      throw transportError;
    }

    const status = response.status;
    if (shouldRetryStatus(status) && attempt < retries) {
      const wait = status === 429 ? parseRetryAfter(response.headers) ?? backoff : backoff;
      logger.debug(`retrying ${request.method} ${request.url.toString()} in ${wait}ms`, {
        attempt: attempt + 1,
        status,
      });
      await discardBody(response);
      await sleep(wait);
      backoff = Math.min(backoff * 2, maxBackoff);
      continue;
    }

    if (status === 429) {
      await discardBody(response);
      throw new CliError({ kind: "rate-limited" });
    }

    return response;
  }

  throw new CliError({ kind: "rate-limited" });
}
