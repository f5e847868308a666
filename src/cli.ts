#!/usr/bin/env node

import dotenv from "dotenv";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { createProgram } from "./commands/index.js";
import { toCliError } from "./errors.js";
import { logger } from "./telemetry/logger.js";

// 在 ES 模块中获取 __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const packageJson: { version?: unknown } = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));
  return typeof packageJson.version === "string" ? packageJson.version : "0.0.0";
}

/**
 * CLI 入口。
 *
 * 关键点（中文）
 * - 工作目录下的 `.env` 先加载（不覆盖已存在的环境变量）。
 * - 所有失败在这里收敛：stderr 打一行错误，退出码由错误类型决定；dry-run 不打印、退出码 0。
 */
async function main(): Promise<void> {
  try {
    dotenv.config({ path: join(process.cwd(), ".env") });
    const program = createProgram({ version: readVersion() });
    await program.parseAsync(process.argv);
  } catch (error) {
    const cliError = toCliError(error);
    const exitCode = cliError.exitCode();
    if (exitCode !== 0) {
      console.error(`error: ${cliError.message}`);
      logger.debug("command failed", { kind: cliError.kind, stack: cliError.stack });
    }
    process.exitCode = exitCode;
  }
}

await main();
