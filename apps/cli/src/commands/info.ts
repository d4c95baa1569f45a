import type { CliDeps } from "../deps.js";
import { titleCase } from "../format.js";

const RULE = "=".repeat(50);
const NOT_FOUND = "not found";

export async function runInfo(deps: CliDeps): Promise<number> {
  const { os, arch, platform } = deps.platform();
  const python = await deps.detectLocalPython();

  deps.out(RULE);
  deps.out("           System Information");
  deps.out(RULE);
  deps.out(`Operating System: ${titleCase(os ?? platform)}`);
  deps.out(`Architecture:     ${arch}`);
  deps.out(`Python Version:   ${python?.version ?? NOT_FOUND}`);
  deps.out(`Python Path:      ${python?.executable ?? NOT_FOUND}`);
  deps.out(`Platform:         ${deps.systemDescription()}`);
  deps.out("");
  deps.out(`Admin/Sudo:       ${(await deps.isAdmin()) ? "Yes" : "No"}`);

  const python3 = await deps.which("python3");
  if (python3 && python3 !== python?.executable) {
    deps.out(`python3 command:  ${python3}`);
  }

  deps.out(RULE);
  return 0;
}
