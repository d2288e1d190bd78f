import { createRequire } from "node:module";

// From src/ in development and dist/src/ once built.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg: unknown = require(candidate);
      if (typeof pkg === "object" && pkg !== null && "name" in pkg && pkg.name === "driftscope" && "version" in pkg) {
        return typeof pkg.version === "string" ? pkg.version : null;
      }
    } catch (err) {
      if (!isModuleNotFound(err)) throw err;
    }
  }
  return null;
}

function isModuleNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "MODULE_NOT_FOUND";
}

// Single source of truth for the current driftscope version.
export const VERSION = process.env.DRIFTSCOPE_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
