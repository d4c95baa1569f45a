import type { OsName } from "@pyvm/core";
import { toChannel } from "./version.js";

const RULE = "-".repeat(60);

function channelOrVersion(version: string): string {
  try {
    return toChannel(version);
  } catch {
    return version;
  }
}

/**
 * How to reach the new interpreter without touching the system default.
 * One entry per output line.
 */
export function usageInstructions(version: string, os: OsName): string[] {
  const channel = channelOrVersion(version);
  const lines = [
    "=".repeat(60),
    "Installation Complete!",
    "=".repeat(60),
    "",
    `Python ${version} has been installed successfully!`,
    "",
    "How to use your new Python version:",
    RULE,
  ];

  switch (os) {
    case "linux":
    case "darwin":
      lines.push(
        "",
        "1. Run scripts with the new version:",
        `    python${channel} your_script.py`,
        "",
        "2. Create a virtual environment:",
        `    python${channel} -m venv myproject`,
        "    source myproject/bin/activate",
        `    python --version  # Will show ${version}`,
        "",
        "3. Check it's installed:",
        `    python${channel} --version`,
      );
      break;
    case "windows":
      lines.push(
        "",
        "1. Use Python Launcher:",
        `    py -${channel} your_script.py`,
        "",
        "2. List all Python versions:",
        "    py --list",
        "",
        "3. Create a virtual environment:",
        `    py -${channel} -m venv myproject`,
        "    myproject\\Scripts\\activate",
      );
      break;
  }

  lines.push(
    RULE,
    "",
    "Important: Your old Python version remains as system default.",
    "    This prevents breaking system tools and existing scripts.",
    "    Use the specific version command when you need the new Python.",
    "",
    "Note: Restart your terminal to ensure PATH is updated.",
  );
  return lines;
}
