/**
 * `ztnet member` 命令组（只读）。
 *
 * 关键点（中文）
 * - 成员总是挂在某个 network 下；network 与 org 都先解析为 id。
 * - `member get` 在 org 下优先按 id 直接取；部分部署不支持该接口（400/405），退回列表过滤。
 * - 个人网络没有按 id 取成员的接口，直接列表过滤。
 */

import type { Command } from "commander";
import { CliError } from "../errors.js";
import type { HttpClient } from "../http/client.js";
import { printHumanOrMachine, printValue } from "../output/render.js";
import { isJsonObject, type JsonValue } from "../types/json.js";
import { requireNetworkArgument } from "./network.js";
import { networkPath, resolveNetworkId, resolveOptionalOrgId } from "./resolve.js";
import { CommandRuntime, type ProgramDeps } from "./shared.js";

interface MemberListOptions {
  authorized?: boolean;
  unauthorized?: boolean;
  name?: string;
  id?: string;
}

export function memberCollectionPath(orgId: string | undefined, networkId: string): string {
  return `${networkPath(orgId, networkId)}/member`;
}

export function filterMembers(list: JsonValue, options: MemberListOptions): JsonValue {
  if (options.authorized && options.unauthorized) {
    throw CliError.invalidArgument("cannot combine --authorized with --unauthorized");
  }
  const filtering =
    options.authorized === true || options.unauthorized === true || options.name !== undefined || options.id !== undefined;
  if (!filtering) return list;
  if (!Array.isArray(list)) {
    throw CliError.invalidArgument("expected array response");
  }

  const needle = options.name?.toLowerCase();
  return list.filter((item) => {
    if (!isJsonObject(item)) return false;
    if (options.authorized && item.authorized !== true) return false;
    if (options.unauthorized && item.authorized !== false) return false;
    if (needle !== undefined) {
      const name = typeof item.name === "string" ? item.name : "";
      if (!name.toLowerCase().includes(needle)) return false;
    }
    if (options.id !== undefined && item.id !== options.id) return false;
    return true;
  });
}

async function getMemberViaList(
  client: HttpClient,
  orgId: string | undefined,
  networkId: string,
  memberId: string,
): Promise<JsonValue> {
  const list = await client.requestJson("GET", memberCollectionPath(orgId, networkId));
  if (!Array.isArray(list)) {
    throw CliError.invalidArgument("expected array response");
  }
  const found = list.find((item) => isJsonObject(item) && item.id === memberId);
  if (found === undefined) {
    throw CliError.httpStatus(404, "member not found");
  }
  return found;
}

export async function getMember(
  client: HttpClient,
  orgId: string | undefined,
  networkId: string,
  memberId: string,
): Promise<JsonValue> {
  if (orgId === undefined) {
    return getMemberViaList(client, orgId, networkId, memberId);
  }

  try {
    return await client.requestJson(
      "GET",
      `${memberCollectionPath(orgId, networkId)}/${encodeURIComponent(memberId)}`,
    );
  } catch (error) {
    const unsupported =
      error instanceof CliError &&
      error.detail.kind === "http-status" &&
      (error.detail.status === 400 || error.detail.status === 405);
    if (!unsupported) throw error;
    return getMemberViaList(client, orgId, networkId, memberId);
  }
}

export function registerMemberCommand(program: Command, deps: ProgramDeps): void {
  const member = program
    .command("member")
    .description("List and inspect network members")
    .helpOption("--help", "display help for command");

  member
    .command("list [network]")
    .description("List members of NETWORK (default: --network)")
    .option("--authorized", "only authorized members")
    .option("--unauthorized", "only unauthorized members")
    .option("--name <substring>", "only members whose name contains SUBSTRING")
    .option("--id <nodeid>", "only the member with this node id")
    .action(async (networkArg: string | undefined, opts: MemberListOptions, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const wanted = requireNetworkArgument(networkArg, effective.network);
      const client = await runtime.httpClient();
      const orgId = await resolveOptionalOrgId(client, effective.org);
      const networkId = await resolveNetworkId(client, orgId, wanted);

      const response = await client.requestJson("GET", memberCollectionPath(orgId, networkId));
      printValue(filterMembers(response, opts), effective.output);
    });

  member
    .command("get <network> <member>")
    .description("Show one member of NETWORK by node id")
    .action(async (networkArg: string, memberId: string, _opts: unknown, command: Command) => {
      const runtime = CommandRuntime.fromCommand(command, deps);
      const effective = await runtime.effective();
      const client = await runtime.httpClient();
      const orgId = await resolveOptionalOrgId(client, effective.org);
      const networkId = await resolveNetworkId(client, orgId, networkArg);

      const response = await getMember(client, orgId, networkId, memberId.trim());
      printHumanOrMachine(response, effective.output);
    });
}
