import { fileURLToPath } from "node:url";
import { isExecutedDirectly, libraryUsage } from "./guard.ts";
import {
  type ConfirmDefault,
  type ExitStatus,
  type MessageOptions,
  Printer,
  type SpinnerOptions,
  type SpinnerTask,
  type TextOptions,
} from "./terminal/index.ts";

export * from "./terminal/index.ts";
export { formatClock, formatDateTime } from "./formatting.ts";
export { isExecutedDirectly } from "./guard.ts";

if (isExecutedDirectly(import.meta.url)) {
  process.stderr.write(libraryUsage(fileURLToPath(import.meta.url)));
  process.exit(1);
}

/**
 * Printer behind the module-level helpers, bound to the process streams.
 */
export const printer = new Printer().initialize();

export function text(message: string, options?: TextOptions): ExitStatus {
  return printer.text(message, options);
}

export function run(args: string[]): Promise<ExitStatus> {
  return printer.run(args);
}

export function info(message: string, options?: MessageOptions): ExitStatus {
  return printer.info(message, options);
}

export function success(message: string, options?: MessageOptions): ExitStatus {
  return printer.success(message, options);
}

export function warning(message: string, options?: MessageOptions): ExitStatus {
  return printer.warning(message, options);
}

export function error(message: string, options?: MessageOptions): ExitStatus {
  return printer.error(message, options);
}

export function internal(
  message: string,
  options?: MessageOptions,
): ExitStatus {
  return printer.internal(message, options);
}

export function markInputContext(): void {
  printer.markInputContext();
}

export function contextBreak(): void {
  printer.contextBreak();
}

export function resetContext(): void {
  printer.resetContext();
}

export function printBox(message: string, width?: number): void {
  printer.box(message, width);
}

export function printHeader(title: string, width?: number): void {
  printer.header(title, width);
}

export function printSeparator(char?: string, width?: number): void {
  printer.separator(char, width);
}

export function printIndented(message: string, spaces?: number): void {
  printer.indent(message, spaces);
}

export function printTable(rows: string[]): void {
  printer.table(rows);
}

export function printProgress(
  current: number,
  total: number,
  label?: string,
): void {
  printer.progress(current, total, label);
}

export function spinner(
  task: SpinnerTask,
  message?: string,
  options?: SpinnerOptions,
): Promise<void> {
  return printer.spinner(task, message, options);
}

export function confirm(
  prompt: string,
  defaultAnswer?: ConfirmDefault,
): Promise<boolean> {
  return printer.confirm(prompt, defaultAnswer);
}

export function printLibraryInfo(): void {
  printer.libraryInfo();
}
