// SGR sequences only: ESC [ <digits/semicolons> m
// biome-ignore lint/suspicious/noControlCharactersInRegex: ESC is required
const ANSI_REGEX = /\u001B\[[0-9;]*m/g;

export default function stripAnsi(string: string): string {
  if (typeof string !== "string") {
    throw new TypeError(`Expected a \`string\`, got \`${typeof string}\``);
  }
  return string.replace(ANSI_REGEX, "");
}

/**
 * Number of characters left once color and style codes are removed.
 */
export function visibleLength(string: string): number {
  return stripAnsi(string).length;
}

/**
 * Matches an SGR sequence starting exactly at `index`, returning its length
 * or 0 when there is none.
 */
export function ansiSequenceLengthAt(string: string, index: number): number {
  if (string.charCodeAt(index) !== 0x1b || string[index + 1] !== "[") {
    return 0;
  }
  let end = index + 2;
  while (end < string.length && /[0-9;]/.test(string.charAt(end))) {
    end++;
  }
  return string[end] === "m" ? end - index + 1 : 0;
}
