/**
 * Liveness tracking and frames for the in-place spinner
 */

export const SPINNER_FRAMES = [
  "⠋",
  "⠙",
  "⠹",
  "⠸",
  "⠼",
  "⠴",
  "⠦",
  "⠧",
  "⠇",
  "⠏",
] as const;

/**
 * What a spinner waits on: a process id, a promise, or a callback that
 * reports whether the work is still running.
 */
export type SpinnerTask = number | PromiseLike<unknown> | (() => boolean);

export interface SpinnerOptions {
  intervalMs?: number;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

/**
 * Turns a task into a liveness check.
 */
export function toLivenessCheck(task: SpinnerTask): () => boolean {
  if (typeof task === "number") {
    return () => isProcessAlive(task);
  }
  if (typeof task === "function") {
    return task;
  }

  let settled = false;
  const markSettled = () => {
    settled = true;
  };
  // Only settlement matters here; the caller awaits the outcome itself
  void Promise.resolve(task).then(markSettled, markSettled);
  return () => !settled;
}

export function spinnerFrame(index: number): string {
  return SPINNER_FRAMES[index % SPINNER_FRAMES.length] ?? SPINNER_FRAMES[0];
}

/**
 * Blanks out a spinner line for `message` and returns the cursor to column 0.
 */
export function clearSpinnerLine(message: string): string {
  return `\r${" ".repeat(message.length + 3)}\r`;
}
