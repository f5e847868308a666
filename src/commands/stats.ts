/**
 * `ztnet stats`：实例统计（需要管理员 token）。
 */

import type { Command } from "commander";
import { printHumanOrMachine } from "../output/render.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

export function registerStatsCommand(program: Command, deps: ProgramDeps): void {
  const stats = program
    .command("stats")
    .description("Instance statistics")
    .helpOption("--help", "display help for command");

  stats
    .command("get")
    .description("Show instance statistics (GET /api/v1/stats)")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const client = await runtime.httpClient();
      printHumanOrMachine(await client.requestJson("GET", "/api/v1/stats"), effective.output);
    });
}
