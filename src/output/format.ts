import { CliError } from "../errors.js";

export const OUTPUT_FORMATS = ["table", "json", "yaml", "raw"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * 解析输出格式（flag / 环境变量 / 配置值共用）。
 */
export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case "table":
    case "json":
    case "raw":
      return normalized;
    case "yaml":
    case "yml":
      return "yaml";
    default:
      throw CliError.invalidArgument(`invalid output format: ${value}`);
  }
}
