/**
 * CLI 错误模型。
 *
 * 关键点（中文）
 * - 所有可预期的失败都收敛为 `CliError`，`kind` 是封闭的判别联合。
 * - 退出码只由 `kind`（以及 http 状态码）决定，入口处统一处理。
 * - 与 fetch / URL 等底层库的异常类型解耦：base 回退判定只看 `kind`。
 */

export type CliErrorDetail =
  | { kind: "invalid-argument"; message: string }
  | { kind: "missing-config"; key: string }
  | { kind: "config"; message: string; path?: string }
  | { kind: "http-status"; status: number; message: string; body?: string }
  | { kind: "rate-limited" }
  | { kind: "session-required" }
  | { kind: "dry-run-printed" }
  | { kind: "transport"; message: string; timeout: boolean }
  | { kind: "decode"; message: string; body?: string }
  | { kind: "io"; message: string; path?: string };

export type CliErrorKind = CliErrorDetail["kind"];

function describe(detail: CliErrorDetail): string {
  switch (detail.kind) {
    case "invalid-argument":
      return `invalid argument: ${detail.message}`;
    case "missing-config":
      return `missing required configuration: ${detail.key}`;
    case "config":
      return detail.path ? `${detail.message}: ${detail.path}` : detail.message;
    case "http-status":
      return `http ${detail.status}: ${detail.message}`;
    case "rate-limited":
      return "rate limited (429) after retries exhausted";
    case "session-required":
      return "session required: run `ztnet auth set-session` (or log in again) for this profile";
    case "dry-run-printed":
      return "dry-run: request printed";
    case "transport":
      return `request failed: ${detail.message}`;
    case "decode":
      return `failed to decode response: ${detail.message}`;
    case "io":
      return detail.path ? `I/O error: ${detail.message} (${detail.path})` : `I/O error: ${detail.message}`;
  }
}

export class CliError extends Error {
  readonly detail: CliErrorDetail;

  constructor(detail: CliErrorDetail, options?: { cause?: unknown }) {
    super(describe(detail), options);
    this.name = "CliError";
    this.detail = detail;
  }

  get kind(): CliErrorKind {
    return this.detail.kind;
  }

  static invalidArgument(message: string): CliError {
    return new CliError({ kind: "invalid-argument", message });
  }

  static missingConfig(key: string): CliError {
    return new CliError({ kind: "missing-config", key });
  }

  static httpStatus(status: number, message: string, body?: string): CliError {
    return new CliError({ kind: "http-status", status, message, body });
  }

  static dryRunPrinted(): CliError {
    return new CliError({ kind: "dry-run-printed" });
  }

  /**
   * 进程退出码。
   *
   * 约定（中文）
   * - 2：用户输入/配置缺失；3：鉴权；4：不存在；5：冲突/校验；6：限流。
   */
  exitCode(): number {
    const detail = this.detail;
    switch (detail.kind) {
      case "dry-run-printed":
        return 0;
      case "invalid-argument":
      case "missing-config":
        return 2;
      case "session-required":
        return 3;
      case "rate-limited":
        return 6;
      case "http-status":
        return exitCodeForStatus(detail.status);
      default:
        return 1;
    }
  }
}

export function exitCodeForStatus(status: number): number {
  if (status === 401 || status === 403) return 3;
  if (status === 404) return 4;
  if (status === 409 || status === 422) return 5;
  if (status === 429) return 6;
  return 1;
}

export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}

/**
 * 把任意异常折叠成 CliError（入口兜底用）。
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CliError({ kind: "io", message }, { cause: error });
}
