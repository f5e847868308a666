/**
 * commander 程序装配。
 *
 * 关键点（中文）
 * - 全局参数挂在根命令上，子命令通过 `optsWithGlobals()` 读取（位置不限）。
 * - `preAction` 钩子在任何子命令执行前配置 logger（-v / --quiet / --no-color）。
 * - 依赖可注入：测试传入 fetch / store / stdin，CLI 入口使用默认值。
 */

import { Command, InvalidArgumentError } from "commander";
import { CliError } from "../errors.js";
import { OUTPUT_FORMATS, parseOutputFormat } from "../output/format.js";
import { logger, parseLogLevel, type LogLevel } from "../telemetry/logger.js";
import { registerApiCommand } from "./api.js";
import { registerAuthCommand } from "./auth.js";
import { registerConfigCommand } from "./config.js";
import { registerMemberCommand } from "./member.js";
import { registerNetworkCommand } from "./network.js";
import { registerOrgCommand } from "./org.js";
import { readGlobalOptions, type ProgramDeps } from "./shared.js";
import { registerStatsCommand } from "./stats.js";
import { registerTrpcCommand } from "./trpc.js";

export interface CreateProgramOptions extends ProgramDeps {
  version?: string;
}

/**
 * commander 的参数解析器需要抛 `InvalidArgumentError` 才会给出标准提示。
 */
function commanderParser<T>(parse: (value: string) => T): (value: string) => T {
  return (value) => {
    try {
      return parse(value);
    } catch (error) {
      if (error instanceof CliError) throw new InvalidArgumentError(error.message);
      throw error;
    }
  };
}

export function parseRetriesOption(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw CliError.invalidArgument(`invalid retries value: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

function resolveLogLevel(params: { verbose: boolean; quiet: boolean; envLevel: string | undefined }): LogLevel {
  if (params.verbose) return "debug";
  if (params.quiet) return "warn";
  return parseLogLevel(params.envLevel) ?? "info";
}

export function createProgram(options: CreateProgramOptions = {}): Command {
  const program = new Command();

  program
    .name("ztnet")
    .description("Command-line client for the ZTNet network controller")
    .version(options.version ?? "0.0.0", "-V, --version")
    .helpOption("--help", "display help for command")
    .option("-H, --host <url>", "ZTNet base URL (env: ZTNET_HOST, API_ADDRESS)")
    .option("-t, --token <token>", "API token (env: ZTNET_API_TOKEN, ZTNET_TOKEN)")
    .option("--profile <name>", "config profile (env: ZTNET_PROFILE)")
    .option("--org <org>", "organization id or name (org-scoped network/member commands)")
    .option("--network <network>", "network id or name (default NETWORK for network/member commands)")
    .option("--json", "shorthand for --output json")
    .option(
      "-o, --output <format>",
      `output format: ${OUTPUT_FORMATS.join(" | ")} (env: ZTNET_OUTPUT)`,
      commanderParser(parseOutputFormat),
    )
    .option("--no-color", "disable ANSI colors")
    .option("--quiet", "suppress notices and the host auto-fix banner")
    .option("-v, --verbose", "enable debug logging")
    .option("--timeout <duration>", "per-request timeout, e.g. 30s, 1m30s, 500ms")
    .option("--retries <n>", "retry attempts for transient failures", commanderParser(parseRetriesOption))
    .option("--dry-run", "print requests instead of sending them")
    .option("-y, --yes", "skip confirmation prompts");

  program.hook("preAction", (_thisCommand, actionCommand) => {
    const global = readGlobalOptions(actionCommand);
    const env = options.env ?? process.env;
    logger.configure({
      level: resolveLogLevel({
        verbose: global.verbose === true,
        quiet: global.quiet === true,
        envLevel: env.ZTNET_LOG_LEVEL,
      }),
      color: global.noColor !== true,
    });
  });

  registerConfigCommand(program, options);
  registerAuthCommand(program, options);
  registerOrgCommand(program, options);
  registerNetworkCommand(program, options);
  registerMemberCommand(program, options);
  registerStatsCommand(program, options);
  registerApiCommand(program, options);
  registerTrpcCommand(program, options);

  return program;
}
