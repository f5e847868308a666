/**
 * 多 base 候选与自动回退（host auto-fix）。
 *
 * 关键点（中文）
 * - ZTNet 可能部署在根路径，也可能部署在 `/api` 前缀之后；用户不需要知道是哪一种。
 * - 每个 client 实例在构造时生成一次候选列表，之后不可变。
 * - 当前生效的 base 下标是 client 级共享状态：一旦切换就保持（不回摆）。
 * - 回退只针对“像是 base 配错了”的错误：404 / 405 / 响应体解码失败。
 */

import { CliError } from "../errors.js";
import { logger } from "../telemetry/logger.js";
import { apiBaseCandidates, normalizeHostInput } from "./host.js";

export interface BaseCandidate {
  /** 展示用（无强制尾斜杠），用于 banner 与诊断。 */
  readonly display: string;
  /** 可直接用于相对路径拼接的 URL（path 以 `/` 结尾，无 query/fragment）。 */
  readonly url: URL;
}

/**
 * 把 base URL 规整为适合相对拼接的形式。
 *
 * 说明（中文）
 * - WHATWG URL 的相对解析会替换最后一个 path 段，所以 base 必须以 `/` 结尾：
 *   `v1/x` 拼到 `.../api/` 得到 `.../api/v1/x`，而拼到 `.../api` 会得到 `.../v1/x`。
 */
export function normalizeBaseUrlForJoin(input: URL): URL {
  const url = new URL(input.toString());
  url.search = "";
  url.hash = "";
  if (!url.pathname.endsWith("/")) {
    url.pathname = `${url.pathname}/`;
  }
  return url;
}

export function buildBaseCandidates(baseUrl: string): BaseCandidate[] {
  const normalized = normalizeHostInput(baseUrl);
  return apiBaseCandidates(normalized).map((display) => ({
    display,
    url: normalizeBaseUrlForJoin(new URL(display)),
  }));
}

export function isAbsoluteHttpUrl(path: string): boolean {
  const trimmed = path.trim();
  return trimmed.startsWith("http://") || trimmed.startsWith("https://");
}

export function joinRelativeUrl(base: URL, path: string): URL {
  const relative = path.trim().replace(/^\/+/, "");
  try {
    return new URL(relative, base);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw CliError.invalidArgument(`invalid request path '${path}': ${reason}`);
  }
}

export function buildUrlForBase(
  bases: readonly BaseCandidate[],
  baseIndex: number,
  path: string,
  allowAbsolute: boolean,
): URL {
  const trimmed = path.trim();
  if (allowAbsolute && isAbsoluteHttpUrl(trimmed)) {
    try {
      return new URL(trimmed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw CliError.invalidArgument(`invalid url '${trimmed}': ${reason}`);
    }
  }

  const base = bases[baseIndex];
  if (!base) {
    throw CliError.invalidArgument("invalid internal host base index");
  }
  return joinRelativeUrl(base.url, trimmed);
}

/**
 * client 级的 base 选择状态。
 *
 * 并发语义（中文）
 * - JS 单线程，字段读写本身即原子；并发中的多个调用只会做“读 / 无条件写 / 一次性抢占”。
 * - 多个并发回退同时成功时后写者生效即可，只要求最终指向某个可用 base。
 */
export class BaseSelection {
  readonly bases: readonly BaseCandidate[];
  private activeIndex = 0;
  private warned = false;

  constructor(bases: readonly BaseCandidate[]) {
    if (bases.length === 0) {
      throw CliError.invalidArgument("host cannot be empty");
    }
    this.bases = bases;
  }

  static fromHost(host: string): BaseSelection {
    return new BaseSelection(buildBaseCandidates(host));
  }

  get active(): number {
    return this.activeIndex;
  }

  get primary(): BaseCandidate {
    return this.bases[0];
  }

  switchTo(index: number): void {
    if (index < 0 || index >= this.bases.length) {
      throw CliError.invalidArgument("invalid internal host base index");
    }
    this.activeIndex = index;
  }

  /**
   * 一次性抢占 banner 输出权：仅第一次返回 true。
   */
  claimWarning(): boolean {
    if (this.warned) return false;
    this.warned = true;
    return true;
  }

  urlFor(path: string, allowAbsolute = true): URL {
    return buildUrlForBase(this.bases, this.activeIndex, path, allowAbsolute);
  }
}

/**
 * 判断错误是否意味着“base 配错了”，值得换一个候选重试。
 *
 * REST 与 tRPC 共用同一个判定：
 * - HTTP 404 / 405
 * - 响应体不是期望的 JSON
 */
export function isWrongBaseError(error: unknown): boolean {
  if (!(error instanceof CliError)) return false;
  const detail = error.detail;
  if (detail.kind === "http-status") {
    return detail.status === 404 || detail.status === 405;
  }
  return detail.kind === "decode";
}

export type BaseFallbackParams<T> = {
  selection: BaseSelection;
  path: string;
  allowAbsolute: boolean;
  attempt: (url: URL) => Promise<T>;
  onSwitch?: (index: number) => void;
  shouldTryAlternate?: (error: unknown) => boolean;
};

/**
 * 在当前 base 上执行请求，必要时依次尝试其他候选。
 *
 * 算法（中文）
 * 1) 读取当前 active 下标并执行
 * 2) 绝对 URL、只有一个候选、或已经切换过（active != 0）：直接返回结果，不再回退
 * 3) 失败且命中回退判定：按顺序尝试其余候选，首个成功者写入 active 并触发 onSwitch
 * 4) 全部失败：抛出“原始” base 的错误（用户配置的 base 更值得报告）
 *
 * 切换是单向的：只会从下标 0 切走，永远不会写回 0。
 */
export async function tryWithBaseFallback<T>(params: BaseFallbackParams<T>): Promise<T> {
  const { selection, path, allowAbsolute, attempt } = params;
  const shouldTryAlternate = params.shouldTryAlternate ?? isWrongBaseError;
  const trimmed = path.trim();
  const isAbsolute = allowAbsolute && isAbsoluteHttpUrl(trimmed);

  const baseIndex = selection.active;
  const url = buildUrlForBase(selection.bases, baseIndex, trimmed, allowAbsolute);

  if (isAbsolute || selection.bases.length < 2 || baseIndex !== 0) {
    return attempt(url);
  }

  try {
    return await attempt(url);
  } catch (error) {
    if (!shouldTryAlternate(error)) throw error;

    for (let index = 1; index < selection.bases.length; index += 1) {

      const altUrl = buildUrlForBase(selection.bases, index, trimmed, allowAbsolute);
      let value: T;
      try {
        value = await attempt(altUrl);
      } catch (altError) {
        logger.debug(`alternate base ${selection.bases[index].display} failed`, {
          error: altError instanceof Error ? altError.message : String(altError),
        });
        continue;
      }

      selection.switchTo(index);
      logger.debug(`switched API base to ${selection.bases[index].display}`, {
        configured: selection.primary.display,
      });
      params.onSwitch?.(index);
      return value;
    }

    throw error;
  }
}

/**
 * 回退成功后的一次性提示。
 */
export function maybeWarnHostAutofix(params: {
  quiet: boolean;
  selection: BaseSelection;
  activeIndex: number;
  printBanner: (configured: string, using: string) => void;
}): void {
  if (params.quiet) return;
  if (params.activeIndex === 0) return;

  const using = params.selection.bases[params.activeIndex];
  if (!using) return;
  if (!params.selection.claimWarning()) return;

  params.printBanner(params.selection.primary.display, using.display);
}
