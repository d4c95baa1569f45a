import type { VersionReport } from "@pyvm/updater";

export const NOT_INSTALLED = "not installed";

const REPORT_RULE = "=".repeat(40);

export function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function formatCheckReport(report: VersionReport): string[] {
  const lines = [
    "",
    REPORT_RULE,
    "     Python Version Check Report",
    REPORT_RULE,
    `Your version:   ${report.localVersion ?? NOT_INSTALLED}`,
    `Latest version: ${report.latestVersion}`,
    REPORT_RULE,
  ];
  lines.push(
    report.needsUpdate
      ? `⚠ A new version (${report.latestVersion}) is available!`
      : "✓ You are up-to-date!",
  );
  return lines;
}
