import { Readable } from "node:stream";
import { Printer } from "../../source/terminal/output.ts";
import type {
  OutputSettings,
  TextSink,
  TextSource,
} from "../../source/terminal/types.ts";

/**
 * In-memory stand-in for stdout/stderr that records every write
 */
export class CaptureSink implements TextSink {
  readonly chunks: string[] = [];
  isTTY: boolean | undefined;
  columns: number | undefined;

  constructor(options: { isTTY?: boolean; columns?: number } = {}) {
    this.isTTY = options.isTTY;
    this.columns = options.columns;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get output(): string {
    return this.chunks.join("");
  }
}

/**
 * Creates a stdin stand-in that yields the given chunks and then ends
 */
export function createMockStdin(chunks: string[] = [], isTTY = false): TextSource {
  return Object.assign(
    Readable.from(chunks.map((chunk) => Buffer.from(chunk))),
    { isTTY },
  );
}

/** 2025-10-19 14:05:09 local time */
export const FIXED_DATE = new Date(2025, 9, 19, 14, 5, 9);

export interface TestPrinter {
  printer: Printer;
  stdout: CaptureSink;
  stderr: CaptureSink;
}

/**
 * Creates a printer wired to capture sinks, a fixed clock and basic colors
 */
export function createTestPrinter(
  settings: Partial<OutputSettings> = {},
  stdin: TextSource = createMockStdin(),
): TestPrinter {
  const stdout = new CaptureSink();
  const stderr = new CaptureSink();
  const printer = new Printer({
    streams: { stdout, stderr, stdin },
    settings: { useColor: false, ...settings },
    colorLevel: 1,
    env: {},
    now: () => FIXED_DATE,
  });
  return { printer, stdout, stderr };
}
