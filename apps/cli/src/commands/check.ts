import type { CliDeps } from "../deps.js";
import { NOT_INSTALLED, formatCheckReport } from "../format.js";

/** Exit 0 when up to date, 1 when an update is available or the lookup failed. */
export async function runCheck(deps: CliDeps): Promise<number> {
  const local = await deps.detectLocalPython();
  deps.out(`Checking Python version... (Current: ${local?.version ?? NOT_INSTALLED})`);

  const report = await deps.checkVersion(local?.version ?? null);
  if (!report.ok) {
    deps.out(`Error: ${report.error.message}`);
    deps.out("Error: Could not fetch latest version information.");
    deps.out("Please check your internet connection and try again.");
    return 1;
  }

  for (const line of formatCheckReport(report.value)) deps.out(line);

  if (report.value.needsUpdate) {
    deps.out("");
    deps.out("Tip: Run 'pyvm update' to upgrade Python");
    return 1;
  }
  return 0;
}
