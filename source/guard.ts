import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * True when the module at `moduleUrl` is the script Node was started with,
 * as opposed to being imported.
 */
export function isExecutedDirectly(
  moduleUrl: string,
  entry: string | undefined = process.argv[1],
): boolean {
  if (!entry) {
    return false;
  }
  const modulePath = fileURLToPath(moduleUrl);
  const resolved = path.resolve(entry);
  return (
    resolved === modulePath ||
    resolved === modulePath.replace(/\.[cm]?[jt]s$/, "")
  );
}

export function libraryUsage(modulePath: string): string {
  return [
    "Error: This is a library module and should be imported, not executed.",
    "",
    `Usage: import { info, success } from "${modulePath}";`,
    "",
    "Example:",
    '  import { success } from "termtext";',
    '  success("Library loaded!");',
    "",
  ].join("\n");
}
