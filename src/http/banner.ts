/**
 * host auto-fix banner（stderr）。
 */

export interface ClientUi {
  quiet: boolean;
  noColor: boolean;
  profile?: string;
}

export const DEFAULT_UI: ClientUi = { quiet: false, noColor: false };

/**
 * 让用户把回退后的 base 固化到当前 profile 的命令。
 */
export function fixCommand(ui: ClientUi, host: string): string {
  if (ui.profile && ui.profile !== "default") {
    return `ztnet --profile ${ui.profile} config set host ${host}`;
  }
  return `ztnet config set host ${host}`;
}

export function formatHostAutofixBanner(ui: ClientUi, configured: string, using: string): string[] {
  const fix = fixCommand(ui, using);

  if (ui.noColor) {
    return [
      "==================== HOST AUTO-FIX ====================",
      `Configured: ${configured}`,
      `Using:      ${using}`,
      `Fix:        ${fix}`,
      "======================================================",
    ];
  }

  const yellow = "\x1b[33m";
  const bold = "\x1b[1m";
  const reset = "\x1b[0m";
  return [
    `${yellow}${bold}==================== HOST AUTO-FIX ====================${reset}`,
    `${yellow}${bold}Configured:${reset} ${configured}`,
    `${yellow}${bold}Using:     ${reset} ${using}`,
    `${yellow}${bold}Fix:       ${reset} ${fix}`,
    `${yellow}${bold}======================================================${reset}`,
  ];
}

export function printHostAutofixBanner(ui: ClientUi, configured: string, using: string): void {
  for (const line of formatHostAutofixBanner(ui, configured, using)) {
    console.error(line);
  }
}
