import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    for (const candidate of ["../package.json", "../../package.json"]) {
      try {
        const pkg: unknown = require(candidate);
        if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
          return pkg.version;
        }
      } catch {
        continue;
      }
    }
    return null;
  } catch {
    return null;
  }
}

// Source tree and dist/ sit at different depths below package.json.
export const VERSION = process.env.CHARTWISE_VERSION || readVersionFromPackageJson() || "0.0.0";
