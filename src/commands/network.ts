/**
 * `ztnet network` 命令组（只读）。
 *
 * 关键点（中文）
 * - 全局 `--org` 或 profile 的默认 org 存在时走 `/api/v1/org/<id>/network`，否则走个人网络。
 * - NETWORK 参数可省略，省略时使用 `--network` / profile 的默认 network。
 * - org 与 network 都可以传名称，请求前先解析为 id。
 */

import type { Command } from "commander";
import { CliError } from "../errors.js";
import type { HttpClient } from "../http/client.js";
import type { OutputFormat } from "../output/format.js";
import { printHumanOrMachine, printValue } from "../output/render.js";
import { isJsonObject, type JsonValue } from "../types/json.js";
import {
  extractNetworkId,
  networkCollectionPath,
  networkPath,
  resolveNetworkId,
  resolveOptionalOrgId,
} from "./resolve.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

interface NetworkListOptions {
  details?: boolean;
  idsOnly?: boolean;
  filter?: string;
}

export interface NetworkFilter {
  nameContains?: string;
  private?: boolean;
}

/**
 * 解析 `--filter`：逗号分隔，支持 `name~=<子串>` 与 `private==<bool>`，其余条件忽略。
 */
export function parseNetworkFilter(expr: string): NetworkFilter {
  const filter: NetworkFilter = {};
  for (const raw of expr.split(",")) {
    const clause = raw.trim();
    if (!clause) continue;

    const contains = clause.indexOf("~=");
    if (contains !== -1) {
      if (clause.slice(0, contains).trim().toLowerCase() === "name") {
        filter.nameContains = clause.slice(contains + 2).trim();
      }
      continue;
    }

    const equals = clause.indexOf("==");
    if (equals !== -1 && clause.slice(0, equals).trim().toLowerCase() === "private") {
      filter.private = ["true", "1", "yes"].includes(clause.slice(equals + 2).trim().toLowerCase());
    }
  }
  return filter;
}

export function filterNetworks(list: JsonValue, filter: NetworkFilter): JsonValue {
  if (!Array.isArray(list)) return list;

  const needle = filter.nameContains?.toLowerCase();
  return list.filter((item) => {
    if (!isJsonObject(item)) return false;
    if (needle !== undefined) {
      const name = typeof item.name === "string" ? item.name : typeof item.nwname === "string" ? item.nwname : "";
      if (!name.toLowerCase().includes(needle)) return false;
    }
    if (filter.private !== undefined) {
      const actual = item.private === true;
      if (actual !== filter.private) return false;
    }
    return true;
  });
}

/**
 * 只输出 id：table 模式每行一个，其余格式输出数组。
 */
export function printIds(ids: string[], format: OutputFormat): void {
  if (format === "table") {
    for (const id of ids) console.log(id);
    return;
  }
  printValue(ids, format);
}

export function collectIds(list: JsonValue, idOf: (item: JsonValue) => string | undefined): string[] {
  if (!Array.isArray(list)) return [];
  const ids: string[] = [];
  for (const item of list) {
    const id = idOf(item);
    if (id !== undefined) ids.push(id);
  }
  return ids;
}

/**
 * 逐个拉取详情（列表接口只返回摘要字段）。
 */
export async function fetchDetails(
  client: HttpClient,
  list: JsonValue,
  idOf: (item: JsonValue) => string | undefined,
  pathFor: (id: string) => string,
): Promise<JsonValue> {
  if (!Array.isArray(list)) {
    throw CliError.invalidArgument("expected array response");
  }
  const detailed: JsonValue[] = [];
  for (const id of collectIds(list, idOf)) {
    detailed.push(await client.requestJson("GET", pathFor(id)));
  }
  return detailed;
}

/**
 * NETWORK 参数优先，其次是 `--network` / profile 默认值。
 */
export function requireNetworkArgument(network: string | undefined, fallback: string | undefined): string {
  const value = network?.trim() || fallback?.trim();
  if (!value) throw CliError.missingConfig("network (pass NETWORK or --network)");
  return value;
}

export function registerNetworkCommand(program: Command, deps: ProgramDeps): void {
  const network = program
    .command("network")
    .description("List and inspect networks")
    .helpOption("--help", "display help for command");

  network
    .command("list")
    .description("List networks (personal, or the org's with --org)")
    .option("--details", "fetch full details for every network")
    .option("--ids-only", "print network ids only")
    .option("--filter <expr>", "filter, e.g. 'name~=lab,private==true'")
    .action(async (opts: NetworkListOptions, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const client = await runtime.httpClient();
      const orgId = await resolveOptionalOrgId(client, effective.org);

      let response = await client.requestJson("GET", networkCollectionPath(orgId));
      if (opts.filter !== undefined) {
        response = filterNetworks(response, parseNetworkFilter(opts.filter));
      }
      if (opts.details) {
        response = await fetchDetails(client, response, extractNetworkId, (id) => networkPath(orgId, id));
      }
      if (opts.idsOnly) {
        printIds(collectIds(response, extractNetworkId), effective.output);
        return;
      }
      printValue(response, effective.output);
    });

  network
    .command("get [network]")
    .description("Show one network by id or name")
    .action(async (networkArg: string | undefined, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const wanted = requireNetworkArgument(networkArg, effective.network);
      const client = await runtime.httpClient();
      const orgId = await resolveOptionalOrgId(client, effective.org);
      const networkId = await resolveNetworkId(client, orgId, wanted);

      const response = await client.requestJson("GET", networkPath(orgId, networkId));
      printHumanOrMachine(response, effective.output);
    });
}
