import { createInterface } from "node:readline/promises";
import { InterruptedError } from "@pyvm/core";

export function parseConfirmation(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Ask a yes/no question, defaulting to no. End of input declines;
 * Ctrl+C rejects with InterruptedError.
 */
export async function confirm(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
  const rl = createInterface({ input, output });
  try {
    return await new Promise<boolean>((resolve, reject) => {
      rl.once("SIGINT", () => reject(new InterruptedError()));
      rl.once("close", () => resolve(false));
      rl.question(`${question} [y/N]: `).then(
        (answer) => resolve(parseConfirmation(answer)),
        reject,
      );
    });
  } finally {
    rl.close();
  }
}
