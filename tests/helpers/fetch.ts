import { vi, type Mock } from "vitest";
import type { FetchLike, SleepFn } from "../../src/http/executor.js";

export type RouteHandler = (url: URL, init: RequestInit | undefined) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function textResponse(body: string, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

/**
 * 进程内的 fetch 替身：按 URL 路由，记录每次调用。
 */
export function mockFetch(handler: RouteHandler): Mock<FetchLike> {
  return vi.fn<FetchLike>(async (input, init) => handler(new URL(input.toString()), init));
}

export function requestedUrls(fetchMock: Mock<FetchLike>): string[] {
  return fetchMock.mock.calls.map(([input]) => input.toString());
}

export function requestHeaders(fetchMock: Mock<FetchLike>, index: number): Record<string, string> {
  const headers = fetchMock.mock.calls[index]?.[1]?.headers;
  const out: Record<string, string> = {};
  new Headers(headers).forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

export function requestBody(fetchMock: Mock<FetchLike>, index: number): unknown {
  return fetchMock.mock.calls[index]?.[1]?.body;
}

export function recordingSleep(): Mock<SleepFn> {
  return vi.fn<SleepFn>(async () => undefined);
}
