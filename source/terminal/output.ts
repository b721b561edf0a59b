import { appendFileSync } from "node:fs";
import { text as readAll } from "node:stream/consumers";
import { setTimeout as sleep } from "node:timers/promises";
import { Chalk, type ChalkInstance } from "chalk";
import { defaultConfig } from "../config.ts";
import { formatClock, formatDateTime } from "../formatting.ts";
import { logger } from "../logger.ts";
import { getPackageVersion } from "../version.ts";
import * as components from "./components.ts";
import {
  type ConfirmDefault,
  confirmPrompt,
  isAffirmative,
  readLine,
} from "./confirm.ts";
import { OutputContext, type OutputContextOptions } from "./context.ts";
import { isUsageError } from "./errors.ts";
import {
  alignText,
  expandNewlines,
  indentText,
  truncateText,
  wrapText,
} from "./formatting.ts";
import {
  type Color,
  type Level,
  type ParsedArgs,
  parseTextArgs,
  type ResolvedTextOptions,
  resolveTextOptions,
  type Style,
  type TextOptions,
} from "./options.ts";
import {
  clearSpinnerLine,
  SPINNER_FRAMES,
  type SpinnerOptions,
  type SpinnerTask,
  spinnerFrame,
  toLivenessCheck,
} from "./spinner.ts";
import stripAnsi, { visibleLength } from "./strip-ansi.ts";
import type { ExitStatus, OutputStreams, TextSink } from "./types.ts";

type NotificationLevel = Exclude<Level, "internal">;

interface LevelDefaults {
  prefix: string;
  color: Color;
}

const LEVEL_DEFAULTS: Record<NotificationLevel, LevelDefaults> = {
  info: { prefix: "[INFO]", color: "blue" },
  success: { prefix: "[SUCCESS]", color: "green" },
  warning: { prefix: "[WARNING]", color: "yellow" },
  error: { prefix: "[ERROR]", color: "red" },
};

const LIBRARY_FUNCTIONS: ReadonlyArray<readonly [string, string]> = [
  ["text", "Main output function with options"],
  ["info", "Information messages"],
  ["success", "Success messages"],
  ["warning", "Warning messages"],
  ["error", "Error messages"],
  ["internal", "Internal logging (cleanup, traps)"],
  ["printBox", "Box around text"],
  ["printHeader", "Section headers"],
  ["printTable", "Formatted tables"],
  ["confirm", "Y/N prompts"],
  ["printProgress", "Progress bars"],
  ["spinner", "Loading spinners"],
  ["printSeparator", "Line separators"],
  ["printIndented", "Indented text"],
];

function isNotification(level: Level | undefined): level is NotificationLevel {
  return level !== undefined && level !== "internal";
}

/** Options for the level shortcuts, which fix the level themselves. */
export type MessageOptions = Omit<TextOptions, "level">;

export interface PrinterOptions extends OutputContextOptions {
  streams?: Partial<OutputStreams>;
  context?: OutputContext;
  /** Clock used for timestamps. */
  now?: () => Date;
}

/**
 * Leveled, optionally colored console output.
 *
 * A printer owns an {@link OutputContext}: the settings it renders with and
 * the kind of its last emission, which decides whether a notification gets
 * a blank line in front of it.
 */
export class Printer {
  readonly context: OutputContext;
  private readonly streams: OutputStreams;
  private readonly now: () => Date;

  constructor(options: PrinterOptions = {}) {
    this.streams = {
      stdout: options.streams?.stdout ?? process.stdout,
      stderr: options.streams?.stderr ?? process.stderr,
      stdin: options.streams?.stdin ?? process.stdin,
    };
    this.context = options.context ?? new OutputContext(options);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Detect color support and width from stdout. Safe to call repeatedly.
   */
  initialize(): this {
    this.context.initialize(this.streams.stdout);
    return this;
  }

  /**
   * Print a message. Returns 1 for error-level messages and rejected
   * options, 0 for everything else (including output silenced by quiet
   * verbosity).
   */
  text(message: string, options: TextOptions = {}): ExitStatus {
    let resolved: ResolvedTextOptions;
    try {
      resolved = resolveTextOptions(options);
    } catch (error) {
      return this.reject(error);
    }
    return this.emit(message, resolved);
  }

  /**
   * Command-line form of {@link text}: flags, then the message. Without a
   * message, piped stdin is read in full.
   */
  async run(args: string[]): Promise<ExitStatus> {
    let parsed: ParsedArgs;
    try {
      parsed = parseTextArgs(args);
    } catch (error) {
      return this.reject(error);
    }

    let message = parsed.message ?? "";
    if (message.length === 0 && !this.streams.stdin.isTTY) {
      message = (await readAll(this.streams.stdin)).replace(/\n+$/, "");
    }
    return this.emit(message, parsed.options);
  }

  info(message: string, options: MessageOptions = {}): ExitStatus {
    return this.text(message, { ...options, level: "info" });
  }

  success(message: string, options: MessageOptions = {}): ExitStatus {
    return this.text(message, { ...options, level: "success" });
  }

  warning(message: string, options: MessageOptions = {}): ExitStatus {
    return this.text(message, { ...options, level: "warning" });
  }

  error(message: string, options: MessageOptions = {}): ExitStatus {
    return this.text(message, { ...options, level: "error" });
  }

  /**
   * Uncolored, fully timestamped diagnostics on stderr (cleanup handlers,
   * traps). Any custom prefix is replaced by the timestamp.
   */
  internal(message: string, options: MessageOptions = {}): ExitStatus {
    return this.text(message, { ...options, level: "internal" });
  }

  /**
   * Record that an input prompt was just shown, so the next notification
   * is separated from it.
   */
  markInputContext(): void {
    this.context.lastOutput = "input";
  }

  /**
   * Write a blank line and forget the previous emission.
   */
  contextBreak(): void {
    this.streams.stdout.write("\n");
    this.context.reset();
  }

  resetContext(): void {
    this.context.reset();
  }

  box(text: string, width?: number): void {
    this.writePlain(`${components.box(text, width)}\n`);
  }

  header(title: string, width?: number): void {
    const paint = this.painter("cyan", "bold");
    this.writePlain(`${components.header(title, width, paint)}\n`);
  }

  separator(char?: string, width?: number): void {
    this.writePlain(`${components.separator(char, width)}\n`);
  }

  indent(text: string, spaces?: number): void {
    this.writePlain(`${indentText(text, spaces)}\n`);
  }

  table(rows: string[]): void {
    if (rows.length === 0) {
      return;
    }
    this.writePlain(`${components.table(rows)}\n`);
  }

  progress(current: number, total: number, label?: string): void {
    this.writePlain(components.progressBar(current, total, label));
  }

  /**
   * Animate a spinner until `task` finishes, then clear its line.
   */
  async spinner(
    task: SpinnerTask,
    message = "Working",
    options: SpinnerOptions = {},
  ): Promise<void> {
    const isAlive = toLivenessCheck(task);
    const intervalMs = options.intervalMs ?? defaultConfig.spinner.intervalMs;
    let frame = 0;

    while (isAlive()) {
      frame = (frame + 1) % SPINNER_FRAMES.length;
      this.text(`\r${spinnerFrame(frame)} ${message}`, {
        color: "cyan",
        noNewline: true,
      });
      await sleep(intervalMs);
    }

    this.writePlain(clearSpinnerLine(message));
  }

  /**
   * Ask a yes/no question on stdin. Empty input takes the default.
   */
  async confirm(
    prompt: string,
    defaultAnswer: ConfirmDefault = "n",
  ): Promise<boolean> {
    this.text(confirmPrompt(prompt, defaultAnswer), {
      color: "yellow",
      noNewline: true,
    });
    const answer = await readLine(this.streams.stdin);
    this.markInputContext();
    return isAffirmative(answer, defaultAnswer);
  }

  /**
   * Print a header with the package version and the list of helpers.
   */
  libraryInfo(): void {
    this.header(`termtext v${getPackageVersion()}`);
    this.text("Terminal text formatting for Node.js scripts and CLIs");
    this.separator();
    this.text("Available functions:");
    for (const [name, summary] of LIBRARY_FUNCTIONS) {
      this.text(`  * ${name.padEnd(15)}- ${summary}`);
    }
  }

  private emit(message: string, options: ResolvedTextOptions): ExitStatus {
    const { level } = options;
    if (this.context.isQuiet && level !== "error") {
      return 0;
    }

    let { prefix, color } = options;
    let timestamp = options.timestamp;
    if (level === "internal") {
      color = undefined;
      timestamp = true;
    } else if (level !== undefined) {
      prefix = prefix || LEVEL_DEFAULTS[level].prefix;
      color = color ?? LEVEL_DEFAULTS[level].color;
    }

    if (timestamp) {
      const now = this.now();
      if (level === "internal") {
        prefix = `[${formatDateTime(now)}]`;
      } else {
        const clock = `[${formatClock(now)}]`;
        prefix = prefix ? `${clock} ${prefix}` : clock;
      }
    }

    const paint = this.painter(color, options.style);
    let text = expandNewlines(message);
    let indent = options.indent ?? 0;
    let skipFirstIndent = false;

    if (prefix) {
      if (options.prefixColorOnly) {
        text = `${paint(prefix)} ${text}`;
        // Continuation lines line up under the message, not the prefix
        if (options.wrap && indent === 0) {
          indent = visibleLength(prefix) + 1;
        }
        skipFirstIndent = indent > 0;
      } else {
        text = `${prefix} ${text}`;
      }
    }

    if (options.wrap) {
      text = wrapText(text, indent, options.width, skipFirstIndent);
    } else if (options.truncate) {
      text = truncateText(text, options.width);
    }

    if (options.align !== "left") {
      text = alignText(text, options.align, options.width);
    }

    const stream = this.streamFor(level);
    const previous = this.context.lastOutput;
    if (
      isNotification(level) &&
      previous !== "unset" &&
      previous !== "notification"
    ) {
      stream.write("\n");
    }

    const newline = options.noNewline ? "" : "\n";
    const output = options.prefixColorOnly ? text : paint(text);
    stream.write(`${output}${newline}`);

    if (options.file) {
      this.appendLog(options.file, `${stripAnsi(text)}${newline}`);
    }

    this.context.lastOutput = isNotification(level) ? "notification" : "text";
    return level === "error" ? 1 : 0;
  }

  private streamFor(level: Level | undefined): TextSink {
    return level === "error" || level === "internal"
      ? this.streams.stderr
      : this.streams.stdout;
  }

  private painter(
    color: Color | undefined,
    style: Style | undefined,
  ): (text: string) => string {
    let painter: ChalkInstance = new Chalk({ level: this.context.level });
    if (style) {
      painter = painter[style];
    }
    if (color) {
      painter = painter[color];
    }
    return (text) => painter(text);
  }

  // Decorations print regardless of verbosity
  private writePlain(chunk: string): void {
    this.streams.stdout.write(chunk);
    this.context.lastOutput = "text";
  }

  private appendLog(file: string, line: string): void {
    logger.debug(
      { file, bytes: Buffer.byteLength(line) },
      "Appending to log file",
    );
    appendFileSync(file, line, "utf8");
  }

  private reject(error: unknown): ExitStatus {
    if (!isUsageError(error)) {
      throw error;
    }
    logger.warn({ option: error.option }, error.message);
    this.streams.stderr.write(`${error.message}\n`);
    return 1;
  }
}
