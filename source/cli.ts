#!/usr/bin/env -S node --import tsx
import { logger } from "./logger.ts";
import { isTermtextError } from "./terminal/errors.ts";
import { Printer } from "./terminal/output.ts";
import { getPackageVersion } from "./version.ts";

const helpText = `
Usage
  $ termtext [options] [--] <message>
  $ some-command | termtext [options]

Options
  --color, -c <name>        red|green|yellow|blue|magenta|cyan|white
  --style, -s <name>        bold|dim|underline
  --level, -l <name>        info|success|warning|error|internal
  --no-newline, -n          Suppress the trailing newline
  --timestamp, -t           Add a timestamp to the prefix
  --file, -f <path>         Also append the uncolored text to a file
  --wrap, -w                Word-wrap the message
  --width, -W <columns>     Maximum width (default: 79)
  --truncate, -T            Truncate long messages
  --align, -a <mode>        left|center|right
  --indent, -i <columns>    Indentation for wrapped lines
  --prefix, -p <text>       Custom prefix
  --prefix-color-only, -P   Color only the prefix
  --                        Treat everything after as the message

  --help                    Show help
  --version                 Show version

Exit status is 1 for error-level messages and invalid options, 0 otherwise.

Examples
  $ termtext -l success "Deployment finished"
  $ termtext -l warning -P -w "A long warning that wraps under its label"
`;

async function main(args: string[]): Promise<number> {
  if (args[0] === "--help") {
    console.info(helpText);
    return 0;
  }
  if (args[0] === "--version") {
    console.info(getPackageVersion());
    return 0;
  }

  const printer = new Printer().initialize();
  return printer.run(args);
}

function describeFailure(error: unknown): string {
  if (isTermtextError(error)) {
    return error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `termtext: unexpected failure: ${message}`;
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (error) {
  logger.error({ error }, "termtext failed");
  console.error(describeFailure(error));
  process.exitCode = 1;
}
