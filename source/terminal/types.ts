/**
 * Output verbosity. `quiet` suppresses everything except error-level messages.
 */
export type Verbosity = "quiet" | "normal";

/**
 * Process-wide output configuration
 */
export interface OutputSettings {
  /**
   * Whether to use colors in output
   */
  useColor: boolean;

  /**
   * Output verbosity
   */
  verbosity: Verbosity;

  /**
   * Detected (or overridden) terminal width in columns
   */
  terminalWidth: number;
}

/**
 * Kind of the most recent emission, used for blank-line spacing
 * before notifications.
 */
export type OutputKind = "unset" | "notification" | "text" | "input";

export type ExitStatus = 0 | 1;

/**
 * Anything output can be written to. `process.stdout` and `process.stderr`
 * qualify, as do in-memory stand-ins.
 */
export interface TextSink {
  write(chunk: string): unknown;
  isTTY?: boolean | undefined;
  columns?: number | undefined;
}

/**
 * Input side used for piped messages and confirmation prompts.
 */
export type TextSource = NodeJS.ReadableStream & {
  isTTY?: boolean | undefined;
};

export interface OutputStreams {
  stdout: TextSink;
  stderr: TextSink;
  stdin: TextSource;
}
