/**
 * REST / tRPC client 的公共部分。
 *
 * 关键点（中文）
 * - 每个 client 实例持有自己的 `BaseSelection`（候选 base + 当前下标 + banner 一次性标记）。
 * - 一次 CLI 调用只构造一个 client；测试里每个用例新建 client，状态不会串。
 * - fetch / sleep 可注入，测试不触网也不真实等待。
 */

import { CliError } from "../errors.js";
import { DEFAULT_UI, printHostAutofixBanner, type ClientUi } from "./banner.js";
import { printDryRun } from "./dry-run.js";
import {
  executeWithRetry,
  type FetchLike,
  type HttpMethod,
  type SleepFn,
  type TransportRequest,
} from "./executor.js";
import { BaseSelection, maybeWarnHostAutofix, tryWithBaseFallback } from "./multi-base.js";

export interface ClientOptions {
  host: string;
  token?: string;
  timeoutMs: number;
  retries: number;
  dryRun?: boolean;
  ui?: ClientUi;
  fetchImpl?: FetchLike;
  sleep?: SleepFn;
}

const INVALID_HEADER_CHARS = /[\r\n\0]/;

export function assertHeaderValue(name: string, value: string): string {
  if (INVALID_HEADER_CHARS.test(value)) {
    throw CliError.invalidArgument(`${name} contains invalid characters`);
  }
  return value;
}

export abstract class TransportClient {
  readonly selection: BaseSelection;
  protected readonly token: string | undefined;
  protected readonly timeoutMs: number;
  protected readonly retries: number;
  protected readonly dryRun: boolean;
  protected readonly ui: ClientUi;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly sleep: SleepFn | undefined;

  constructor(options: ClientOptions) {
    this.selection = BaseSelection.fromHost(options.host);
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.retries = options.retries;
    this.dryRun = options.dryRun ?? false;
    this.ui = options.ui ?? DEFAULT_UI;
    this.fetchImpl = options.fetchImpl;
    this.sleep = options.sleep;
  }

  /**
   * 用户配置的 base（候选下标 0）。
   */
  get configuredBase(): string {
    return this.selection.primary.display;
  }

  /**
   * 当前生效的 base（回退后会变化）。
   */
  get activeBase(): string {
    const base = this.selection.bases[this.selection.active];
    return base ? base.display : this.configuredBase;
  }

  /**
   * dry-run：按当前 base 拼出 URL 打印，然后以 `dry-run-printed` 结束调用。
   */
  protected printDryRunAndStop(params: {
    method: HttpMethod;
    path: string;
    allowAbsolute: boolean;
    headers: Record<string, string>;
    token?: string;
    body?: string | Uint8Array;
  }): never {
    printDryRun({
      method: params.method,
      url: this.selection.urlFor(params.path, params.allowAbsolute),
      headers: params.headers,
      token: params.token,
      body: params.body,
    });
    throw CliError.dryRunPrinted();
  }

  protected send(request: Omit<TransportRequest, "timeoutMs">): Promise<Response> {
    return executeWithRetry(
      { ...request, timeoutMs: this.timeoutMs },
      { retries: this.retries, sleep: this.sleep },
      this.fetchImpl,
    );
  }

  protected withBaseFallback<T>(
    path: string,
    allowAbsolute: boolean,
    attempt: (url: URL) => Promise<T>,
  ): Promise<T> {
    return tryWithBaseFallback({
      selection: this.selection,
      path,
      allowAbsolute,
      attempt,
      onSwitch: (index) => this.warnHostAutofix(index),
    });
  }

  private warnHostAutofix(index: number): void {
    maybeWarnHostAutofix({
      quiet: this.ui.quiet,
      selection: this.selection,
      activeIndex: index,
      printBanner: (configured, using) => printHostAutofixBanner(this.ui, configured, using),
    });
  }
}
