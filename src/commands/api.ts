/**
 * `ztnet api`：直接调用 REST 接口。
 *
 * 关键点（中文）
 * - 只有 `/api/v1` 开头的路径默认带 token（`--no-auth` 关闭）。
 * - `--raw` 原样把响应字节写到 stdout，不做 JSON 解析与渲染。
 * - `api delete` 需要确认（`--yes` / `--dry-run` 跳过）。
 */

import type { Command } from "commander";
import { CliError } from "../errors.js";
import type { RequestHeaders } from "../http/client.js";
import { parseHttpMethod, type HttpMethod } from "../http/executor.js";
import { printValue } from "../output/render.js";
import { CommandRuntime, readJsonArgument, type ProgramDeps } from "./shared.js";

interface ApiRequestOptions {
  body?: string;
  bodyFile?: string;
  header: string[];
  auth: boolean;
  raw?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseHeaders(values: readonly string[]): RequestHeaders {
  const headers: RequestHeaders = {};
  for (const raw of values) {
    const index = raw.indexOf(":");
    if (index === -1) {
      throw CliError.invalidArgument(`invalid header (expected K:V): ${raw}`);
    }
    const name = raw.slice(0, index).trim();
    if (!/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/.test(name)) {
      throw CliError.invalidArgument(`invalid header name: ${name}`);
    }
    const value = raw.slice(index + 1).trim();
    if (/[\r\n\0]/.test(value)) {
      throw CliError.invalidArgument(`invalid header value for: ${name}`);
    }
    headers[name.toLowerCase()] = value;
  }
  return headers;
}

export function includesAuth(path: string, noAuth: boolean): boolean {
  return !noAuth && path.trimStart().startsWith("/api/v1");
}

async function execApiRequest(params: {
  runtime: CommandRuntime;
  method: HttpMethod;
  path: string;
  options: ApiRequestOptions;
}): Promise<void> {
  const { runtime, method, path, options } = params;
  const headers = parseHeaders(options.header);
  const includeAuth = includesAuth(path, !options.auth);
  const body = await readJsonArgument({
    inline: options.body,
    file: options.bodyFile,
    inlineFlag: "--body",
    fileFlag: "--body-file",
    runtime,
  });

  const effective = await runtime.effective();
  const client = await runtime.httpClient();

  if (options.raw) {
    const bytes = await client.requestBytes(
      method,
      path,
      body === undefined ? undefined : new TextEncoder().encode(JSON.stringify(body)),
      headers,
      includeAuth,
      body === undefined ? undefined : "application/json",
    );
    process.stdout.write(bytes);
    return;
  }

  const response = await client.requestJson(method, path, body, headers, includeAuth);
  printValue(response, effective.output);
}

export function registerApiCommand(program: Command, deps: ProgramDeps): void {
  const api = program
    .command("api")
    .description("Send raw REST requests to the ZTNet API")
    .helpOption("--help", "display help for command");

  api
    .command("request <method> <path>")
    .description("Send a request with any HTTP method")
    .option("--body <json>", "JSON request body")
    .option("--body-file <path>", "read the JSON request body from a file (`-` for STDIN)")
    .option("--header <K:V>", "extra request header (repeatable)", collect, [])
    .option("--no-auth", "do not send the API token")
    .option("--raw", "write the response bytes to stdout unchanged")
    .action(async (method: string, path: string, opts: ApiRequestOptions, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      await execApiRequest({ runtime, method: parseHttpMethod(method), path, options: opts });
    });

  api
    .command("get <path>")
    .description("GET a path")
    .action(async (path: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      await execApiRequest({ runtime, method: "GET", path, options: { header: [], auth: true } });
    });

  api
    .command("post <path>")
    .description("POST a JSON body to a path")
    .option("--body <json>", "JSON request body")
    .option("--body-file <path>", "read the JSON request body from a file (`-` for STDIN)")
    .action(async (path: string, opts: { body?: string; bodyFile?: string }, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      await execApiRequest({
        runtime,
        method: "POST",
        path,
        options: { body: opts.body, bodyFile: opts.bodyFile, header: [], auth: true },
      });
    });

  api
    .command("delete <path>")
    .description("DELETE a path (asks for confirmation)")
    .action(async (path: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      if (!(await runtime.confirm(`Delete ${path.trim()}?`))) {
        runtime.notice("Aborted.");
        return;
      }
      await execApiRequest({ runtime, method: "DELETE", path, options: { header: [], auth: true } });
    });
}
