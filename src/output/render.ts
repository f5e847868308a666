/**
 * 响应渲染。
 *
 * 关键点（中文）
 * - 只接收已经解码好的 JSON 值；网络与错误处理不在这里。
 * - table 模式下：对象数组按优先列渲染成表格，单个对象渲染为 `key: value`，
 *   其余形状回退为格式化 JSON。
 */

import yaml from "js-yaml";
import { isJsonObject, type JsonValue } from "../types/json.js";
import type { OutputFormat } from "./format.js";

const PREFERRED_COLUMNS = [
  "id",
  "name",
  "orgName",
  "nwid",
  "nwname",
  "authorized",
  "memberCount",
  "host",
  "default_profile",
  "profiles",
] as const;

export function renderScalar(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export function formatTable(value: JsonValue): string | undefined {
  if (!Array.isArray(value)) return undefined;

  const rows = value.filter(isJsonObject);
  const columns = PREFERRED_COLUMNS.filter((col) => rows.some((row) => col in row));
  if (columns.length === 0) return undefined;

  const body = value.map((row) =>
    columns.map((col) => (isJsonObject(row) ? renderScalar(row[col]) : "")),
  );
  const widths = columns.map((col, i) =>
    Math.max(col.length, ...body.map((cells) => cells[i].length)),
  );

  const renderLine = (cells: readonly string[]): string =>
    cells
      .map((cell, i) => cell.padEnd(widths[i]))
      .join("  ")
      .trimEnd();

  return [renderLine(columns), ...body.map(renderLine)].join("\n");
}

export function formatKeyValue(value: JsonValue): string {
  if (!isJsonObject(value)) return renderScalar(value);
  return Object.keys(value)
    .sort()
    .map((key) => `${key}: ${renderScalar(value[key])}`)
    .join("\n");
}

export function formatValue(value: JsonValue, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(value, null, 2);
    case "yaml":
      return yaml.dump(value, { noRefs: true }).trimEnd();
    case "raw":
      return JSON.stringify(value);
    case "table":
      return formatTable(value) ?? JSON.stringify(value, null, 2);
  }
}

export function printValue(value: JsonValue, format: OutputFormat): void {
  console.log(formatValue(value, format));
}

/**
 * 面向人的输出（table 模式走 key/value），其余格式与 `printValue` 一致。
 */
export function printHumanOrMachine(value: JsonValue, format: OutputFormat): void {
  if (format === "table") {
    console.log(formatKeyValue(value));
    return;
  }
  printValue(value, format);
}
