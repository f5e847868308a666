/**
 * 时间工具模块。
 *
 * 解析/格式化 `30s`、`1m 30s`、`500ms` 形式的时长（flag 与配置共用同一解析器）。
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  msec: 1,
  msecs: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  second: 1000,
  seconds: 1000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  minute: 60_000,
  minutes: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  hour: 3_600_000,
  hours: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
};

/**
 * 解析时长为毫秒。
 *
 * - 每一段必须是 `<整数><单位>`，段之间可以有空白。
 * - 缺单位、未知单位、小数或尾部垃圾都返回 undefined（拒绝而不是截断）。
 */
export function parseDuration(input: string): number | undefined {
  const text = input.trim().toLowerCase();
  if (!text) return undefined;

  const segment = /(\d+)\s*([a-z]+)\s*/y;
  let total = 0;
  let offset = 0;
  while (offset < text.length) {
    segment.lastIndex = offset;
    const match = segment.exec(text);
    if (!match) return undefined;

    const unit = UNIT_MS[match[2]];
    if (unit === undefined) return undefined;

    total += Number.parseInt(match[1], 10) * unit;
    offset = segment.lastIndex;
  }

  return Number.isSafeInteger(total) ? total : undefined;
}

export function formatDuration(ms: number): string {
  if (ms <= 0) return "0s";

  const parts: string[] = [];
  let rest = Math.floor(ms);
  for (const [unit, size] of [
    ["d", 86_400_000],
    ["h", 3_600_000],
    ["m", 60_000],
    ["s", 1000],
    ["ms", 1],
  ] as const) {
    const count = Math.floor(rest / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      rest -= count * size;
    }
  }
  return parts.join(" ");
}
