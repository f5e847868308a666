/**
 * org / network 名称到 id 的解析。
 *
 * 关键点（中文）
 * - 用户可以传 id 也可以传名称；先按 id 精确匹配，再按名称（忽略大小写）匹配。
 * - 名称匹配到多个时报错；一个都没匹配到时原样返回，交给服务端报 404。
 * - 列表接口返回的不是数组时同样原样返回（老版本服务端）。
 */

import { CliError } from "../errors.js";
import type { HttpClient } from "../http/client.js";
import { isJsonObject, type JsonObject, type JsonValue } from "../types/json.js";

function stringField(item: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

export function extractOrgId(value: JsonValue): string | undefined {
  return isJsonObject(value) ? stringField(value, "id") : undefined;
}

export function extractNetworkId(value: JsonValue): string | undefined {
  return isJsonObject(value) ? stringField(value, "id", "nwid") : undefined;
}

/**
 * 在列表里找 id 或名称匹配的条目。
 */
export function matchIdOrName(params: {
  list: JsonValue;
  wanted: string;
  label: string;
  idOf: (item: JsonValue) => string | undefined;
  nameKeys: readonly string[];
}): string {
  const { list, wanted, label, idOf } = params;
  if (!Array.isArray(list)) return wanted;
  if (list.some((item) => idOf(item) === wanted)) return wanted;

  const needle = wanted.toLowerCase();
  const matches: string[] = [];
  for (const item of list) {
    const id = idOf(item);
    const name = isJsonObject(item) ? stringField(item, ...params.nameKeys) : undefined;
    if (id !== undefined && name !== undefined && name.toLowerCase() === needle) {
      matches.push(id);
    }
  }

  if (matches.length > 1) {
    throw CliError.invalidArgument(`${label} name '${wanted}' is ambiguous`);
  }
  return matches[0] ?? wanted;
}

export async function resolveOrgId(client: HttpClient, org: string): Promise<string> {
  const wanted = org.trim();
  if (!wanted) throw CliError.invalidArgument("org cannot be empty");

  const list = await client.requestJson("GET", "/api/v1/org");
  return matchIdOrName({ list, wanted, label: "org", idOf: extractOrgId, nameKeys: ["orgName", "name"] });
}

export function networkCollectionPath(orgId: string | undefined): string {
  return orgId === undefined ? "/api/v1/network" : `/api/v1/org/${encodeURIComponent(orgId)}/network`;
}

export function networkPath(orgId: string | undefined, networkId: string): string {
  return `${networkCollectionPath(orgId)}/${encodeURIComponent(networkId)}`;
}

export async function resolveNetworkId(
  client: HttpClient,
  orgId: string | undefined,
  network: string,
): Promise<string> {
  const wanted = network.trim();
  if (!wanted) throw CliError.invalidArgument("network cannot be empty");

  const list = await client.requestJson("GET", networkCollectionPath(orgId));
  return matchIdOrName({ list, wanted, label: "network", idOf: extractNetworkId, nameKeys: ["name", "nwname"] });
}

/**
 * `--org`（或 profile 的默认 org）存在时解析为 id，否则走个人网络接口。
 */
export async function resolveOptionalOrgId(client: HttpClient, org: string | undefined): Promise<string | undefined> {
  return org === undefined ? undefined : resolveOrgId(client, org);
}
