/**
 * `ztnet org` 命令组（只读）。
 */

import type { Command } from "commander";
import { CliError } from "../errors.js";
import { printHumanOrMachine, printValue } from "../output/render.js";
import { collectIds, fetchDetails, printIds } from "./network.js";
import { extractOrgId, resolveOrgId } from "./resolve.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

export function requireOrgArgument(org: string | undefined, fallback: string | undefined): string {
  const value = org?.trim() || fallback?.trim();
  if (!value) throw CliError.missingConfig("org (pass ORG or --org)");
  return value;
}

export function registerOrgCommand(program: Command, deps: ProgramDeps): void {
  const org = program
    .command("org")
    .description("List and inspect organizations")
    .helpOption("--help", "display help for command");

  org
    .command("list")
    .description("List organizations")
    .option("--details", "fetch full details for every organization")
    .option("--ids-only", "print organization ids only")
    .action(async (opts: { details?: boolean; idsOnly?: boolean }, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const client = await runtime.httpClient();

      let response = await client.requestJson("GET", "/api/v1/org");
      if (opts.details) {
        response = await fetchDetails(client, response, extractOrgId, (id) => `/api/v1/org/${encodeURIComponent(id)}`);
      }
      if (opts.idsOnly) {
        printIds(collectIds(response, extractOrgId), effective.output);
        return;
      }
      printValue(response, effective.output);
    });

  org
    .command("get [org]")
    .description("Show one organization by id or name (default: --org)")
    .action(async (orgArg: string | undefined, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const client = await runtime.httpClient();
      const orgId = await resolveOrgId(client, requireOrgArgument(orgArg, effective.org));

      const response = await client.requestJson("GET", `/api/v1/org/${encodeURIComponent(orgId)}`);
      printHumanOrMachine(response, effective.output);
    });
}
