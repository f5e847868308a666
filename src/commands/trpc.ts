/**
 * `ztnet trpc`：调用 ZTNet 的 tRPC 过程（session cookie 鉴权）。
 */

import fs from "fs-extra";
import type { Command } from "commander";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CliError } from "../errors.js";
import { cookieFromEffective } from "../http/trpc-client.js";
import { printHumanOrMachine, printValue } from "../output/render.js";
import { CommandRuntime, readJsonArgument, readTextFile, type ProgramDeps } from "./shared.js";

const ProcedureCatalogSchema = z.object({
  routers: z.record(z.array(z.string())),
});

export type ProcedureCatalog = z.infer<typeof ProcedureCatalogSchema>;

export const PROCEDURE_CATALOG_PATH = fileURLToPath(new URL("../../data/trpc-procedures.json", import.meta.url));

export async function loadProcedureCatalog(filePath: string = PROCEDURE_CATALOG_PATH): Promise<ProcedureCatalog> {
  let raw: unknown;
  try {
    raw = await fs.readJson(filePath);
  } catch (error) {
    throw new CliError(
      { kind: "io", message: error instanceof Error ? error.message : String(error), path: filePath },
      { cause: error },
    );
  }
  const parsed = ProcedureCatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError({ kind: "io", message: "invalid tRPC procedure catalog", path: filePath });
  }
  return parsed.data;
}

const PROCEDURE_NAME = /^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)+$/;

export function parseProcedureName(raw: string): string {
  const name = raw.trim();
  if (!PROCEDURE_NAME.test(name)) {
    throw CliError.invalidArgument(`invalid procedure name (expected router.procedure): ${raw}`);
  }
  return name;
}

interface TrpcCallOptions {
  input?: string;
  inputFile?: string;
  cookie?: string;
  cookieFile?: string;
}

export function registerTrpcCommand(program: Command, deps: ProgramDeps): void {
  const trpc = program
    .command("trpc")
    .description("Call ZTNet tRPC procedures with a session cookie")
    .helpOption("--help", "display help for command");

  trpc
    .command("list")
    .description("List known routers and procedures")
    .action(async (_opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const catalog = await loadProcedureCatalog();
      printHumanOrMachine(catalog, runtime.outputFormat);
    });

  trpc
    .command("call <procedure>")
    .description("Call ROUTER.PROCEDURE and print the unwrapped result")
    .option("--input <json>", "procedure input as JSON")
    .option("--input-file <path>", "read the procedure input from a file (`-` for STDIN)")
    .option("--cookie <cookie>", "Cookie header to send instead of the stored session")
    .option("--cookie-file <path>", "read the Cookie header from a file")
    .action(async (procedure: string, opts: TrpcCallOptions, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const name = parseProcedureName(procedure);
      if (opts.cookie !== undefined && opts.cookieFile !== undefined) {
        throw CliError.invalidArgument("cannot combine --cookie with --cookie-file");
      }

      const input =
        (await readJsonArgument({
          inline: opts.input,
          file: opts.inputFile,
          inlineFlag: "--input",
          fileFlag: "--input-file",
          runtime,
        })) ?? null;

      const effective = await runtime.effective();
      let cookie: string | undefined;
      if (opts.cookie !== undefined) {
        cookie = opts.cookie.trim();
      } else if (opts.cookieFile !== undefined) {
        cookie = (await readTextFile(opts.cookieFile)).trim();
      } else {
        cookie = cookieFromEffective(effective);
      }

      const client = await runtime.trpcClient(cookie || undefined);
      const response = await client.call(name, input);
      printValue(response, effective.output);
    });
}
