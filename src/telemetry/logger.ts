/**
 * Unified diagnostic logger for the CLI.
 *
 * Design goals:
 * - stdout is reserved for machine-readable command output, so every log line goes to stderr.
 * - Only diagnostics go through here; user-facing notices and errors are printed by the commands.
 * - `-v` lowers the threshold to `debug`, `--quiet` raises it to `warn`.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  private logLevel: LogLevel;
  private color = true;

  constructor(logLevel: LogLevel = "info") {
    this.logLevel = logLevel;
  }

  /**
   * 由 CLI 入口在解析完全局参数后调用。
   */
  configure(options: { level?: LogLevel; color?: boolean }): void {
    if (options.level) this.logLevel = options.level;
    if (typeof options.color === "boolean") this.color = options.color;
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  debug(message: string, details?: Record<string, unknown>): void {
    if (LEVEL_ORDER.debug < LEVEL_ORDER[this.logLevel]) return;

    const suffix = details && Object.keys(details).length > 0 ? ` ${JSON.stringify(details)}` : "";
    const line = `[DEBUG] ${message}${suffix}`;
    console.error(this.color ? `\x1b[90m${line}\x1b[0m` : line);
  }
}

export function parseLogLevel(input: string | undefined): LogLevel | undefined {
  const s = String(input || "")
    .trim()
    .toLowerCase();
  if (s === "debug" || s === "trace") return "debug";
  if (s === "info") return "info";
  if (s === "warn" || s === "warning") return "warn";
  if (s === "error" || s === "err") return "error";
  return undefined;
}

export const logger = new Logger(parseLogLevel(process.env.ZTNET_LOG_LEVEL) ?? "info");
