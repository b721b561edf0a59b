import { parseArgs } from "node:util";
import { z } from "zod";
import { defaultConfig } from "../config.ts";
import { invalidValue, UsageError, unknownOption } from "./errors.ts";

export const COLORS = [
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
] as const;
export const STYLES = ["bold", "dim", "underline"] as const;
export const LEVELS = [
  "info",
  "success",
  "warning",
  "error",
  "internal",
] as const;
export const ALIGNMENTS = ["left", "center", "right"] as const;

export type Color = (typeof COLORS)[number];
export type Style = (typeof STYLES)[number];
export type Level = (typeof LEVELS)[number];

export const TextOptionsSchema = z.strictObject({
  color: z.enum(COLORS).optional(),
  style: z.enum(STYLES).optional(),
  level: z.enum(LEVELS).optional(),
  noNewline: z.boolean().default(false),
  timestamp: z.boolean().default(false),
  file: z.string().min(1).optional(),
  wrap: z.boolean().default(false),
  width: z.number().int().positive().default(defaultConfig.width),
  truncate: z.boolean().default(false),
  align: z.enum(ALIGNMENTS).default("left"),
  indent: z.number().int().nonnegative().optional(),
  prefix: z.string().optional(),
  prefixColorOnly: z.boolean().default(false),
});

/** Options as callers pass them: everything optional. */
export type TextOptions = z.input<typeof TextOptionsSchema>;

/** Options after validation, defaults applied. */
export type ResolvedTextOptions = z.output<typeof TextOptionsSchema>;

/**
 * Validate options up front. Unknown keys and out-of-range values become a
 * {@link UsageError}.
 */
export function resolveTextOptions(options: unknown = {}): ResolvedTextOptions {
  const result = TextOptionsSchema.safeParse(options);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  if (issue?.code === "unrecognized_keys") {
    throw unknownOption(issue.keys[0] ?? "");
  }
  const option = issue?.path.map(String).join(".") || "options";
  throw invalidValue(option, issue?.message ?? "invalid");
}

const FLAGS = {
  color: { type: "string", short: "c" },
  style: { type: "string", short: "s" },
  level: { type: "string", short: "l" },
  "no-newline": { type: "boolean", short: "n" },
  timestamp: { type: "boolean", short: "t" },
  file: { type: "string", short: "f" },
  wrap: { type: "boolean", short: "w" },
  width: { type: "string", short: "W" },
  truncate: { type: "boolean", short: "T" },
  align: { type: "string", short: "a" },
  indent: { type: "string", short: "i" },
  prefix: { type: "string", short: "p" },
  "prefix-color-only": { type: "boolean", short: "P" },
} as const;

type FlagName = keyof typeof FLAGS;

function isFlagName(name: string): name is FlagName {
  return Object.hasOwn(FLAGS, name);
}

function lookupFlag(arg: string): FlagName | undefined {
  if (arg.startsWith("--")) {
    const name = arg.slice(2);
    return isFlagName(name) ? name : undefined;
  }
  const short = arg.slice(1);
  for (const [name, flag] of Object.entries(FLAGS)) {
    if (flag.short === short && isFlagName(name)) {
      return name;
    }
  }
  return undefined;
}

/**
 * Index where the message starts: after `--`, or at the first argument that
 * is neither a flag nor a flag's value.
 */
function splitArgs(args: string[]): { flags: string[]; message: string[] } {
  let index = 0;
  while (index < args.length) {
    const arg = args[index] ?? "";
    if (arg === "--") {
      return { flags: args.slice(0, index), message: args.slice(index + 1) };
    }
    if (!arg.startsWith("-") || arg === "-") {
      break;
    }
    const name = arg.includes("=") ? undefined : lookupFlag(arg);
    index += name && FLAGS[name].type === "string" ? 2 : 1;
  }
  return { flags: args.slice(0, index), message: args.slice(index) };
}

function toInteger(
  option: string,
  value: string | undefined,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw invalidValue(option, `expected an integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

export interface ParsedArgs {
  options: ResolvedTextOptions;
  /** Message text, or undefined when no message arguments were given. */
  message: string | undefined;
}

/**
 * Parse command-line style flags (`-c red -w -- text`) into validated
 * options plus the message.
 */
export function parseTextArgs(args: string[]): ParsedArgs {
  const split = splitArgs(args);

  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(split.flags);
  } catch (error) {
    throw toUsageError(error);
  }

  const options = resolveTextOptions({
    color: values.color,
    style: values.style,
    level: values.level,
    noNewline: values["no-newline"],
    timestamp: values.timestamp,
    file: values.file,
    wrap: values.wrap,
    width: toInteger("--width", values.width),
    truncate: values.truncate,
    align: values.align,
    indent: toInteger("--indent", values.indent),
    prefix: values.prefix,
    prefixColorOnly: values["prefix-color-only"],
  });

  return {
    options,
    message: split.message.length > 0 ? split.message.join(" ") : undefined,
  };
}

function parseFlags(flags: string[]) {
  return parseArgs({
    args: flags,
    options: FLAGS,
    strict: true,
    allowPositionals: false,
  }).values;
}

function toUsageError(error: unknown): UsageError {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && "code" in error ? String(error.code) : "";
  // parseArgs reports the offending flag inside single quotes
  const flag = /'([^']+)'/.exec(message)?.[1] ?? message;
  if (code === "ERR_PARSE_ARGS_UNKNOWN_OPTION") {
    return unknownOption(flag.split(" ")[0] ?? flag);
  }
  return new UsageError(message, flag, { cause: error });
}
