import { readFileSync } from "node:fs";
import { z } from "zod";
import { logger } from "./logger.ts";

const PackageJsonSchema = z.object({
  version: z.string().min(1),
});

/**
 * Version from the package.json one directory above the sources, falling
 * back to `npm_package_version` and then to `fallback`.
 */
export function getPackageVersion(fallback = "version unavailable"): string {
  try {
    const pkgUrl = new URL("../package.json", import.meta.url);
    const raw = readFileSync(pkgUrl, "utf8");
    const result = PackageJsonSchema.safeParse(JSON.parse(raw));
    if (result.success) {
      return result.data.version;
    }
    logger.debug(
      { issues: result.error.issues },
      "package.json has no version",
    );
  } catch (error) {
    logger.debug({ error }, "Could not read package.json");
  }
  const envVersion = process.env["npm_package_version"];
  if (envVersion && envVersion.length > 0) {
    return envVersion;
  }
  return fallback;
}
