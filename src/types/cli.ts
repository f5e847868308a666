import type { OutputFormat } from "../output/format.js";

/**
 * 全局 CLI 参数（所有子命令共享）。
 *
 * 说明（中文）
 * - 由 commander 解析后归一化得到；解析器与各命令只依赖这个形状。
 */
export interface GlobalOptions {
  host?: string;
  token?: string;
  profile?: string;
  org?: string;
  network?: string;
  json?: boolean;
  output?: OutputFormat;
  timeout?: string;
  retries?: number;
  noColor?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  dryRun?: boolean;
  yes?: boolean;
}
