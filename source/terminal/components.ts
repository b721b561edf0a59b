/**
 * Decorative renderers. Each returns the finished string without a trailing
 * newline; the printer decides where it goes.
 */
import { defaultConfig } from "../config.ts";
import { expandNewlines, padVisible } from "./formatting.ts";
import { visibleLength } from "./strip-ansi.ts";

export const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  cross: "┼",
  left: "├",
  right: "┤",
} as const;

type Paint = (text: string) => string;

const identity: Paint = (text) => text;

/**
 * A three-line box with `text` centered on the middle line. The inner width
 * is `width`; when the padding is odd the extra space goes to the right.
 */
export function box(
  text: string,
  width: number = defaultConfig.boxWidth,
): string {
  const length = visibleLength(text);
  const left = Math.max(0, Math.floor((width - length) / 2));
  const right = Math.max(0, width - length - left);
  const rule = BOX.horizontal.repeat(width);
  const body = `${" ".repeat(left)}${text}${" ".repeat(right)}`;
  return [
    `${BOX.topLeft}${rule}${BOX.topRight}`,
    `${BOX.vertical}${body}${BOX.vertical}`,
    `${BOX.bottomLeft}${rule}${BOX.bottomRight}`,
  ].join("\n");
}

/**
 * Section header: blank line, box around the painted title, blank line.
 */
export function header(
  title: string,
  width: number = defaultConfig.boxWidth,
  paint: Paint = identity,
): string {
  return ["", box(paint(title), width), ""].join("\n");
}

export function separator(
  char: string = BOX.horizontal,
  width: number = defaultConfig.width,
): string {
  return char.repeat(Math.max(0, width));
}

/**
 * Renders pipe-delimited rows as a table. Column widths come from the widest
 * visible cell in each column; a rule follows the first (header) row.
 */
export function table(rows: string[]): string {
  if (rows.length === 0) {
    return "";
  }

  const cells = rows.map((row) => expandNewlines(row).split("|"));
  const columnCount = Math.max(...cells.map((row) => row.length));
  const widths: number[] = [];
  for (let column = 0; column < columnCount; column++) {
    widths.push(
      Math.max(...cells.map((row) => visibleLength(row[column] ?? ""))),
    );
  }

  const renderRow = (row: string[]) =>
    `${BOX.vertical} ${widths
      .map((width, column) => padVisible(row[column] ?? "", width))
      .join(` ${BOX.vertical} `)} ${BOX.vertical}`;
  const rule = `${BOX.left}${widths
    .map((width) => BOX.horizontal.repeat(width + 2))
    .join(BOX.cross)}${BOX.right}`;

  const lines: string[] = [];
  cells.forEach((row, index) => {
    lines.push(renderRow(row));
    if (index === 0) {
      lines.push(rule);
    }
  });
  return lines.join("\n");
}

/**
 * One frame of an in-place progress bar: `\rlabel: [====>    ]  75%`.
 * The frame ends in a newline only once `current` reaches `total`.
 */
export function progressBar(
  current: number,
  total: number,
  label = "Progress",
  barWidth: number = defaultConfig.progress.barWidth,
): string {
  const complete = total <= 0 || current >= total;
  const value = Math.min(Math.max(current, 0), Math.max(total, 0));
  const filled = total <= 0 ? barWidth : Math.floor((value * barWidth) / total);
  const percentage = total <= 0 ? 100 : Math.floor((value * 100) / total);

  let bar = "=".repeat(filled);
  if (filled < barWidth) {
    bar += `>${" ".repeat(barWidth - filled - 1)}`;
  }

  const percent = `${String(percentage).padStart(3)}%`;
  return `\r${label}: [${bar}] ${percent}${complete ? "\n" : ""}`;
}
