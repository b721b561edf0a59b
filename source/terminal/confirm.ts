import { createInterface } from "node:readline/promises";
import type { TextSource } from "./types.ts";

export type ConfirmDefault = "y" | "n";

/**
 * The prompt text, with the default answer's letter in upper case.
 */
export function confirmPrompt(
  prompt: string,
  defaultAnswer: ConfirmDefault,
): string {
  return defaultAnswer === "y" ? `${prompt} [Y/n] ` : `${prompt} [y/N] `;
}

/**
 * Empty input takes the default; `y` and `yes` in any case accept.
 */
export function isAffirmative(
  answer: string,
  defaultAnswer: ConfirmDefault,
): boolean {
  const response = answer.trim() || defaultAnswer;
  return /^(?:y|yes)$/i.test(response);
}

/**
 * Reads a single line. End of input before a line counts as an empty answer.
 */
export async function readLine(input: TextSource): Promise<string> {
  const rl = createInterface({ input, terminal: false });
  try {
    return await new Promise<string>((resolve) => {
      rl.once("line", resolve);
      rl.once("close", () => resolve(""));
    });
  } finally {
    rl.close();
  }
}
