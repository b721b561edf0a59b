import { z } from "zod";
import { logger } from "./logger.ts";
import type { OutputSettings } from "./terminal/types.ts";

export const defaultConfig = {
  width: 79,
  boxWidth: 77,
  indent: 4,
  progress: {
    barWidth: 40,
  },
  spinner: {
    intervalMs: 100,
  },
  settings: {
    useColor: true,
    verbosity: "normal",
    terminalWidth: 80,
  } satisfies OutputSettings,
} as const;

const ColorFlagSchema = z
  .enum(["1", "0", "true", "false"])
  .transform((value) => value === "1" || value === "true");

const VerbosityFlagSchema = z
  .enum(["quiet", "normal", "0", "1"])
  .transform((value) =>
    value === "quiet" || value === "0"
      ? ("quiet" as const)
      : ("normal" as const),
  );

const WidthFlagSchema = z.coerce.number().int().positive();

export const ENV_COLOR = "TERMTEXT_COLOR";
export const ENV_VERBOSITY = "TERMTEXT_VERBOSITY";
export const ENV_WIDTH = "TERMTEXT_WIDTH";

function readEnv<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodType<T>,
): T | undefined {
  const raw = env[name];
  if (raw === undefined || raw.length === 0) {
    return undefined;
  }
  const result = schema.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    logger.warn({ name, value: raw }, "Ignoring invalid environment override");
    return undefined;
  }
  return result.data;
}

/**
 * Reads `TERMTEXT_COLOR`, `TERMTEXT_VERBOSITY` and `TERMTEXT_WIDTH`.
 * Only valid, non-empty values end up in the result.
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
): Partial<OutputSettings> {
  const overrides: Partial<OutputSettings> = {};

  const useColor = readEnv(env, ENV_COLOR, ColorFlagSchema);
  if (useColor !== undefined) {
    overrides.useColor = useColor;
  }

  const verbosity = readEnv(env, ENV_VERBOSITY, VerbosityFlagSchema);
  if (verbosity !== undefined) {
    overrides.verbosity = verbosity;
  }

  const terminalWidth = readEnv(env, ENV_WIDTH, WidthFlagSchema);
  if (terminalWidth !== undefined) {
    overrides.terminalWidth = terminalWidth;
  }

  return overrides;
}
