/**
 * Terminal Output Module
 *
 * Leveled messages, escape-aware text layout and simple decorations
 * (boxes, tables, progress bars, spinners, prompts).
 */

export {
  BOX,
  box,
  header,
  progressBar,
  separator,
  table,
} from "./components.ts";
export {
  type ConfirmDefault,
  confirmPrompt,
  isAffirmative,
} from "./confirm.ts";
export {
  type Capabilities,
  type ColorLevel,
  type ColorProbe,
  detectCapabilities,
  OutputContext,
  type OutputContextOptions,
} from "./context.ts";
export {
  isTermtextError,
  isUsageError,
  TermtextError,
  UsageError,
} from "./errors.ts";
export {
  type Alignment,
  alignText,
  ELLIPSIS,
  expandNewlines,
  indentText,
  padVisible,
  truncateText,
  wrapText,
} from "./formatting.ts";
export {
  ALIGNMENTS,
  COLORS,
  type Color,
  LEVELS,
  type Level,
  parseTextArgs,
  type ResolvedTextOptions,
  resolveTextOptions,
  STYLES,
  type Style,
  type TextOptions,
} from "./options.ts";
export { type MessageOptions, Printer, type PrinterOptions } from "./output.ts";
export {
  SPINNER_FRAMES,
  type SpinnerOptions,
  type SpinnerTask,
} from "./spinner.ts";
export { default as stripAnsi, visibleLength } from "./strip-ansi.ts";
export type {
  ExitStatus,
  OutputKind,
  OutputSettings,
  OutputStreams,
  TextSink,
  TextSource,
  Verbosity,
} from "./types.ts";
