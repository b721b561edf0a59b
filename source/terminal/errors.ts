/**
 * Custom error classes for the output formatter
 */

export class TermtextError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TermtextError";
  }
}

/**
 * A rejected formatting option: unknown name or invalid value.
 */
export class UsageError extends TermtextError {
  readonly option: string;

  constructor(message: string, option: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
    this.option = option;
  }
}

export function unknownOption(option: string): UsageError {
  return new UsageError(`Unknown option: ${option}`, option);
}

export function invalidValue(option: string, detail: string): UsageError {
  return new UsageError(`Invalid value for ${option}: ${detail}`, option);
}

// Type guards for error handling
export function isUsageError(error: unknown): error is UsageError {
  return error instanceof Error && error.name === "UsageError";
}

export function isTermtextError(error: unknown): error is TermtextError {
  return error instanceof TermtextError;
}
