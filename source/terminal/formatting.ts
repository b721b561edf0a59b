/**
 * Text Layout Utilities
 *
 * Wrapping, truncation and alignment of text that may carry color codes.
 * Widths are always measured on the visible text; the codes themselves
 * travel along untouched.
 */
import { defaultConfig } from "../config.ts";
import { ansiSequenceLengthAt, visibleLength } from "./strip-ansi.ts";

export type Alignment = "left" | "center" | "right";

export const ELLIPSIS = "...";

/**
 * Converts literal `\n` escape sequences into real line breaks.
 */
export function expandNewlines(text: string): string {
  return text.replaceAll("\\n", "\n");
}

/**
 * Word wrap text so no output line is wider than `maxWidth` columns.
 *
 * Every output line is indented by `indent` spaces and gets a budget of
 * `maxWidth - indent`, except the first one when `skipFirstIndent` is set:
 * that line has no indent and the full `maxWidth`, because whatever sits in
 * front of the wrapped text (a colored prefix) already occupies it.
 *
 * Blank lines are kept. Words are never split; a word wider than the budget
 * gets a line of its own.
 */
export function wrapText(
  text: string,
  indent = 0,
  maxWidth: number = defaultConfig.width,
  skipFirstIndent = false,
): string {
  const indentStr = " ".repeat(Math.max(0, indent));
  const output: string[] = [];
  let isFirstLine = true;

  const budgetFor = (first: boolean) =>
    first && skipFirstIndent ? maxWidth : maxWidth - indent;
  const emit = (line: string) => {
    output.push(isFirstLine && skipFirstIndent ? line : `${indentStr}${line}`);
    isFirstLine = false;
  };

  for (const inputLine of expandNewlines(text).split("\n")) {
    if (inputLine.length === 0) {
      output.push("");
      isFirstLine = false;
      continue;
    }

    if (visibleLength(inputLine) <= budgetFor(isFirstLine)) {
      emit(inputLine);
      continue;
    }

    let currentLine = "";
    for (const word of inputLine.split(/\s+/)) {
      if (word.length === 0) {
        continue;
      }
      if (currentLine.length === 0) {
        currentLine = word;
        continue;
      }
      const candidate = `${currentLine} ${word}`;
      if (visibleLength(candidate) <= budgetFor(isFirstLine)) {
        currentLine = candidate;
      } else {
        emit(currentLine);
        currentLine = word;
      }
    }

    if (currentLine.length > 0) {
      emit(currentLine);
    }
  }

  return output.join("\n");
}

/**
 * Cut text down to `maxWidth` visible columns, ending in "...".
 *
 * The cut happens at a visible position; color codes inside the kept part
 * are copied whole and never split. Codes from the cut-off rest are kept
 * after the ellipsis, so a color opened before the cut is still closed.
 * Below three columns the ellipsis itself is shortened.
 */
export function truncateText(
  text: string,
  maxWidth: number = defaultConfig.width,
): string {
  if (visibleLength(text) <= maxWidth) {
    return text;
  }

  const ellipsis = ELLIPSIS.slice(0, Math.max(0, maxWidth));
  const keep = maxWidth - ellipsis.length;
  let visible = 0;
  let kept = "";
  let trailingCodes = "";

  let index = 0;
  while (index < text.length) {
    const sequenceLength = ansiSequenceLengthAt(text, index);
    if (sequenceLength > 0) {
      const sequence = text.slice(index, index + sequenceLength);
      if (visible < keep) {
        kept += sequence;
      } else {
        trailingCodes += sequence;
      }
      index += sequenceLength;
      continue;
    }
    if (visible < keep) {
      kept += text.charAt(index);
    }
    visible++;
    index++;
  }

  return `${kept}${ellipsis}${trailingCodes}`;
}

function alignLine(line: string, alignment: Alignment, width: number): string {
  const length = visibleLength(line);
  let padding = 0;
  switch (alignment) {
    case "center":
      padding = Math.floor((width - length) / 2);
      break;
    case "right":
      padding = width - length;
      break;
    default:
      return line;
  }
  return padding > 0 ? `${" ".repeat(padding)}${line}` : line;
}

/**
 * Align text within `width` columns by prepending spaces. Multi-line text
 * is aligned line by line; nothing is ever appended on the right.
 */
export function alignText(
  text: string,
  alignment: Alignment = "left",
  width: number = defaultConfig.width,
): string {
  if (alignment === "left") {
    return text;
  }
  return text
    .split("\n")
    .map((line) => alignLine(line, alignment, width))
    .join("\n");
}

/**
 * Pads a string on the right to the given visible width, accounting for
 * color codes. Strings already as wide are returned unchanged.
 */
export function padVisible(text: string, width: number): string {
  const length = visibleLength(text);
  if (length >= width) {
    return text;
  }
  return text + " ".repeat(width - length);
}

/**
 * Prefix every non-blank line with `spaces` spaces. Literal `\n` sequences
 * are expanded first; blank lines stay empty.
 */
export function indentText(
  text: string,
  spaces: number = defaultConfig.indent,
): string {
  const indentStr = " ".repeat(Math.max(0, spaces));
  return expandNewlines(text)
    .split("\n")
    .map((line) => (line.length === 0 ? line : `${indentStr}${line}`))
    .join("\n");
}
